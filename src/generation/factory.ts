import type { GenerationConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { OfflineResponder } from "./offline.js";
import { OpenAIGenerator } from "./openai.js";
import { ResilientGenerator } from "./resilient.js";
import type { TextGenerator } from "./types.js";

export function createGenerator(config: GenerationConfig, logger: Logger): TextGenerator {
  if (config.provider === "offline" || !config.apiKey) {
    return new OfflineResponder();
  }
  return new ResilientGenerator(new OpenAIGenerator(config), config.timeoutMs, logger);
}
