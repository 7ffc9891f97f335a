import { Command, Option } from "clipanion";
import { startGateway } from "../../gateway/lifecycle.js";

export class GatewayRunCommand extends Command {
  static override paths = [["gateway", "run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the adapters, the dispatch loop and the health server",
    examples: [
      ["Start with default config", "amicus gateway run"],
      ["Start with custom config", "amicus gateway run --config ./my-config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      await startGateway(this.config);
    } catch (err) {
      this.context.stderr.write(
        `Failed to start gateway: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
    // Runs until SIGINT/SIGTERM
    await new Promise<never>(() => {});
    return 0;
  }
}
