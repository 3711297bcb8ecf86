import { Command, Option } from "clipanion";
import * as t from "typanion";
import { PREFERRED_PROVENANCE_KEY, loadPreferredProvenance } from "../../monitor/preferences.js";
import { PROVENANCES } from "../../usage/types.js";
import { errorMessage, openMonitor } from "../context.js";

export class SourceCommand extends Command {
  static override paths = [["source"]];

  static override usage = Command.Usage({
    description: "Show or choose which credential the monitor uses",
    details: `
      \`primary\` is the token the Claude CLI keeps; \`manual\` is the one stored with \`token set\`.
      Without an argument, prints the current choice.
    `,
    examples: [
      ["Show the current source", "quota-monitor source"],
      ["Use the manual token", "quota-monitor source manual"],
    ],
  });

  config = Option.String("--config,-c", { required: false });

  provenance = Option.String({ name: "source", required: false, validator: t.isEnum(PROVENANCES) });

  async execute(): Promise<number> {
    try {
      const { preferences, resolver, logger } = openMonitor(this.config);

      if (this.provenance === undefined) {
        const current = await loadPreferredProvenance(preferences, logger);
        const available = await resolver.isAvailable(current);
        this.context.stdout.write(`${current}${available ? "" : " (no credential found)"}\n`);
        return 0;
      }

      await preferences.set(PREFERRED_PROVENANCE_KEY, this.provenance);
      this.context.stdout.write(`Source set to ${this.provenance}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Could not update source: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
