import { Command, Option } from "clipanion";
import { errorMessage, openMonitor } from "../context.js";

export class TokenSetCommand extends Command {
  static override paths = [["token", "set"]];

  static override usage = Command.Usage({
    description: "Store a manual API token",
    examples: [["Store a token", "quota-monitor token set <token>"]],
  });

  config = Option.String("--config,-c", { required: false });

  token = Option.String({ name: "token" });

  async execute(): Promise<number> {
    try {
      const { resolver, store } = openMonitor(this.config);
      await resolver.saveManual(this.token);
      this.context.stdout.write(`Manual token saved (${store.kind})\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Could not save token: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

export class TokenClearCommand extends Command {
  static override paths = [["token", "clear"]];

  static override usage = Command.Usage({
    description: "Remove the stored manual API token",
    examples: [["Remove the token", "quota-monitor token clear"]],
  });

  config = Option.String("--config,-c", { required: false });

  async execute(): Promise<number> {
    try {
      const { resolver } = openMonitor(this.config);
      await resolver.clearManual();
      this.context.stdout.write("Manual token cleared\n");
      return 0;
    } catch (err) {
      this.context.stdout.write(`Could not clear token: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

export class TokenValidateCommand extends Command {
  static override paths = [["token", "validate"]];

  static override usage = Command.Usage({
    description: "Check a token against the usage API without storing it",
    examples: [["Check a token", "quota-monitor token validate <token>"]],
  });

  config = Option.String("--config,-c", { required: false });

  token = Option.String({ name: "token" });

  async execute(): Promise<number> {
    let monitor;
    try {
      monitor = openMonitor(this.config);
    } catch (err) {
      this.context.stdout.write(`Config: INVALID\n  Error: ${errorMessage(err)}\n`);
      return 1;
    }

    const valid = await monitor.service.validateCredential(this.token.trim());
    this.context.stdout.write(valid ? "Token is valid\n" : "Token was rejected\n");
    return valid ? 0 : 1;
  }
}
