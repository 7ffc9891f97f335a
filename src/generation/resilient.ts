import type { Logger } from "../logging/logger.js";
import { OfflineResponder } from "./offline.js";
import type { GenerationRequest, TextGenerator } from "./types.js";

/**
 * Wraps a live generator with a deadline. Failures, timeouts and empty
 * answers degrade to the offline responder, which never fails.
 */
export class ResilientGenerator implements TextGenerator {
  readonly name: string;

  constructor(
    private readonly primary: TextGenerator,
    private readonly timeoutMs: number,
    private readonly logger: Logger,
    private readonly fallback: TextGenerator = new OfflineResponder(),
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first so the race settles on the timeout, not an aborted answer
        reject(new Error(`Generation timed out after ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      const text = await Promise.race([
        this.primary.generate({ ...request, signal: controller.signal }),
        deadline,
      ]);
      const trimmed = text.trim();
      if (trimmed === "") throw new Error("Empty generation");
      return trimmed;
    } catch (err) {
      this.logger.warn(
        { err, generator: this.primary.name, mode: request.mode },
        "Generation degraded to offline responder",
      );
      return this.fallback.generate(request);
    } finally {
      clearTimeout(timer);
    }
  }
}
