import type { PersonaConfig } from "../config/types.js";
import type { SimilarityPolicy } from "../policy/similarity.js";
import type { Persona } from "./types.js";

export class PersonaCatalog {
  private readonly personas = new Map<string, Persona>();

  constructor(
    configs: Readonly<Record<string, PersonaConfig>>,
    readonly defaultId: string,
  ) {
    for (const [id, config] of Object.entries(configs)) {
      this.personas.set(id, { id, ...config });
    }
    if (!this.personas.has(defaultId)) {
      throw new Error(`Default persona not configured: ${defaultId}`);
    }
  }

  /** Conversations keep the persona they were created with; unknown ids fall back to the default. */
  resolve(id: string): Persona {
    const persona = this.personas.get(id) ?? this.personas.get(this.defaultId);
    if (!persona) throw new Error(`Default persona not configured: ${this.defaultId}`);
    return persona;
  }

  list(): Persona[] {
    return [...this.personas.values()];
  }
}

export function renderIntro(persona: Persona, username: string | null): string {
  const name = username ? `, ${username}` : "";
  return `${persona.intro.replaceAll("{name}", name)}\n\n${persona.consentRequest}`;
}

/** First follow-up template, in configured order, that the similarity policy lets through. */
export function pickFollowUp(
  persona: Persona,
  recentAgentTexts: readonly string[],
  similarity: SimilarityPolicy,
): string {
  const fresh = persona.followUps.find(
    (text) => !similarity.isRepetitive(text, recentAgentTexts),
  );
  return fresh ?? persona.followUps[0] ?? "";
}
