import { Builtins, Cli } from "clipanion";
import { GatewayRunCommand } from "./commands/gateway.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";
import { UserForgetCommand, UserShowCommand } from "./commands/user.js";
import { DueListCommand } from "./commands/due.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Amicus",
    binaryName: "amicus",
    binaryVersion: "0.1.0",
  });

  cli.register(GatewayRunCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Conversation inspection
  cli.register(UserShowCommand);
  cli.register(UserForgetCommand);
  cli.register(DueListCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
