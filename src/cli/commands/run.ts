import { Command, Option } from "clipanion";
import { startDaemon } from "../../daemon/lifecycle.js";
import { errorMessage, packageVersion } from "../context.js";

export class RunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Run the usage monitor and its local status server",
    examples: [
      ["Start with default config", "quota-monitor run"],
      ["Start with custom config", "quota-monitor run --config ./monitor.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      const daemon = await startDaemon(this.config, packageVersion());
      await daemon.stopped;
      return 0;
    } catch (err) {
      this.context.stderr.write(`Failed to start monitor: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
