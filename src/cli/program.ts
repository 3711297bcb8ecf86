import { Builtins, Cli } from "clipanion";
import { RunCommand } from "./commands/run.js";
import { StatusCommand } from "./commands/status.js";
import { TokenClearCommand, TokenSetCommand, TokenValidateCommand } from "./commands/token.js";
import { SourceCommand } from "./commands/source.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { packageVersion } from "./context.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Quota Monitor",
    binaryName: "quota-monitor",
    binaryVersion: packageVersion(),
  });

  cli.register(RunCommand);
  cli.register(StatusCommand);

  // Credentials
  cli.register(TokenSetCommand);
  cli.register(TokenClearCommand);
  cli.register(TokenValidateCommand);
  cli.register(SourceCommand);

  // Config
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
