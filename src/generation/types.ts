import type { Persona, StoredMessage } from "../conversation/types.js";

export type GenerationMode = "reply" | "follow_up";

export interface GenerationRequest {
  readonly persona: Persona;
  /** Oldest first; for replies the latest user message is already included. */
  readonly history: readonly StoredMessage[];
  readonly mode: GenerationMode;
  /** Follow-ups: the template the text should stay close to. */
  readonly hint?: string;
  readonly signal?: AbortSignal;
}

export interface TextGenerator {
  readonly name: string;
  generate(request: GenerationRequest): Promise<string>;
}
