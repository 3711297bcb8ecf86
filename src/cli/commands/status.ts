import { Command, Option } from "clipanion";
import { formatStateLines } from "../format.js";
import { errorMessage, openMonitor } from "../context.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Fetch usage once and print it",
    examples: [
      ["Show usage", "quota-monitor status"],
      ["Print the state as JSON", "quota-monitor status --json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  json = Option.Boolean("--json", false, {
    description: "Print the full state as JSON",
  });

  async execute(): Promise<number> {
    let monitor;
    try {
      monitor = openMonitor(this.config);
    } catch (err) {
      this.context.stdout.write(`Config: INVALID\n  Error: ${errorMessage(err)}\n`);
      return 1;
    }

    const { service } = monitor;
    try {
      await service.start();
    } finally {
      await service.shutdown();
    }

    const state = service.state;
    if (this.json) {
      this.context.stdout.write(`${JSON.stringify(state, null, 2)}\n`);
    } else {
      this.context.stdout.write(`${formatStateLines(state, Date.now()).join("\n")}\n`);
    }
    return state.lastError ? 1 : 0;
  }
}
