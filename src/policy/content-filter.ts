import type { ContentFilterConfig } from "../config/types.js";

export type ContentFlag = "forbidden_term" | "forbidden_pattern" | "link" | "spam";

export type ContentVerdict =
  | { readonly clean: true }
  | { readonly clean: false; readonly flag: ContentFlag; readonly match: string };

const CLEAN: ContentVerdict = { clean: true };

const LINK_PATTERN = /\b(?:https?:\/\/|www\.)\S+/iu;
const SPAM_PATTERNS: readonly RegExp[] = [
  // "!!!", "???", "?!?"
  /[!?]{3,}/u,
  // the same character five times in a row
  /(.)\1{4,}/u,
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches the term as a whole word in any script, ignoring case. */
function termPattern(term: string): RegExp {
  const body = escapeRegExp(term).replace(/\s+/g, "\\s+");
  return new RegExp(`(?<![\\p{L}\\p{N}_])${body}(?![\\p{L}\\p{N}_])`, "iu");
}

/**
 * Screens generated text before it is sent. Independent of the policy
 * engine: a flagged text is replaced, not denied.
 */
export class ContentFilter {
  private readonly rules: ReadonlyArray<{ flag: ContentFlag; pattern: RegExp }>;

  constructor(private readonly config: ContentFilterConfig) {
    this.rules = [
      ...config.forbiddenTerms.map((term) => ({
        flag: "forbidden_term" as const,
        pattern: termPattern(term),
      })),
      ...config.forbiddenPatterns.map((source) => ({
        flag: "forbidden_pattern" as const,
        pattern: new RegExp(source, "iu"),
      })),
      ...(config.blockLinks ? [{ flag: "link" as const, pattern: LINK_PATTERN }] : []),
      ...(config.blockSpam
        ? SPAM_PATTERNS.map((pattern) => ({ flag: "spam" as const, pattern }))
        : []),
    ];
  }

  check(text: string): ContentVerdict {
    if (!this.config.enabled) return CLEAN;
    for (const rule of this.rules) {
      const found = rule.pattern.exec(text);
      if (found) return { clean: false, flag: rule.flag, match: found[0] };
    }
    return CLEAN;
  }
}
