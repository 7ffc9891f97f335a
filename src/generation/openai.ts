import OpenAI from "openai";
import type { GenerationConfig } from "../config/types.js";
import type { GenerationRequest, TextGenerator } from "./types.js";

const FOLLOW_UP_INSTRUCTION =
  "The user has been quiet for a while. Write one short, gentle check-in message " +
  "in your own words. Do not pressure them and do not repeat earlier messages.";

/** Chat completions against any OpenAI-compatible endpoint. */
export class OpenAIGenerator implements TextGenerator {
  readonly name = "openai";
  private readonly client: OpenAI;

  constructor(
    private readonly config: GenerationConfig,
    client?: OpenAI,
  ) {
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
        // Timeouts and fallback are handled by the caller
        maxRetries: 0,
      });
  }

  async generate(request: GenerationRequest): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: buildMessages(request),
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      },
      { signal: request.signal },
    );

    const text = response.choices[0]?.message.content?.trim() ?? "";
    if (text === "") throw new Error("Empty completion");
    return text;
  }
}

export function buildMessages(request: GenerationRequest): OpenAI.ChatCompletionMessageParam[] {
  const messages: OpenAI.ChatCompletionMessageParam[] = [
    { role: "system", content: request.persona.systemPrompt },
  ];

  for (const msg of request.history) {
    messages.push(
      msg.sender === "user"
        ? { role: "user", content: msg.text }
        : { role: "assistant", content: msg.text },
    );
  }

  if (request.mode === "follow_up") {
    const hint = request.hint ? ` For example: "${request.hint}"` : "";
    messages.push({ role: "system", content: `${FOLLOW_UP_INSTRUCTION}${hint}` });
  }
  return messages;
}
