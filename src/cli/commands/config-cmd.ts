import { readFileSync } from "node:fs";
import { Command, Option } from "clipanion";
import { loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import { errorMessage } from "../context.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults included",
    examples: [["Show config", "quota-monitor config show"]],
  });

  configFile = Option.String("--config,-c", { required: false });

  async execute(): Promise<number> {
    try {
      const config = loadConfig(this.configFile);
      this.context.stdout.write(`${JSON.stringify(config, null, 2)}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "quota-monitor config validate"],
      ["Validate specific file", "quota-monitor config validate ./monitor.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      throw err;
    }

    try {
      const raw: unknown = JSON.parse(substituteEnv(content));
      parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
