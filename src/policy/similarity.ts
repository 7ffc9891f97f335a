import type { AntiRepetitionConfig } from "../config/types.js";

/** Decides whether a candidate collides with recent agent messages. */
export interface SimilarityPolicy {
  readonly name: string;
  isRepetitive(candidate: string, previous: readonly string[]): boolean;
}

export function normalizeText(text: string): string {
  return text.toLowerCase().trim().split(/\s+/).filter(Boolean).join(" ");
}

/** |A ∩ B| / |A ∪ B| over lowercase word sets; 0 when either side is empty. */
export function jaccardSimilarity(a: string, b: string): number {
  const wordsA = new Set(normalizeText(a).split(" ").filter(Boolean));
  const wordsB = new Set(normalizeText(b).split(" ").filter(Boolean));
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  return intersection / (wordsA.size + wordsB.size - intersection);
}

export const exactMatch: SimilarityPolicy = {
  name: "exact",
  isRepetitive: (candidate, previous) => previous.includes(candidate),
};

export const normalizedMatch: SimilarityPolicy = {
  name: "normalized",
  isRepetitive: (candidate, previous) => {
    const target = normalizeText(candidate);
    return previous.some((text) => normalizeText(text) === target);
  },
};

export function jaccardPolicy(threshold: number): SimilarityPolicy {
  return {
    name: `jaccard>=${threshold}`,
    isRepetitive: (candidate, previous) =>
      previous.some(
        (text) => text === candidate || jaccardSimilarity(text, candidate) >= threshold,
      ),
  };
}

export function createSimilarityPolicy(config: AntiRepetitionConfig): SimilarityPolicy {
  switch (config.similarity) {
    case "exact":
      return exactMatch;
    case "normalized":
      return normalizedMatch;
    case "jaccard":
      return jaccardPolicy(config.threshold);
  }
}
