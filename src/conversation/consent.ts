export type ConsentSignal = "affirmative" | "negative" | "neutral";

const AFFIRMATIVE = [
  "yes",
  "yeah",
  "yep",
  "sure",
  "ok",
  "okay",
  "fine",
  "of course",
  "go ahead",
  "sounds good",
  "let's talk",
  "да",
  "конечно",
  "давай",
  "ок",
];

const NEGATIVE = [
  "no",
  "nope",
  "nah",
  "stop",
  "no thanks",
  "no thank you",
  "not interested",
  "leave me alone",
  "don't write",
  "do not write",
  "нет",
  "не надо",
  "не пиши",
];

function stripPunctuation(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}'\s]/gu, " ")
    .split(/\s+/)
    .filter(Boolean)
    .join(" ");
}

function startsWithPhrase(text: string, phrase: string): boolean {
  return text === phrase || text.startsWith(`${phrase} `);
}

/**
 * Classifies a reply to the consent request. Single-word refusals must be
 * the whole message ("no problem" is not a refusal); phrases may lead it.
 */
export function classifyConsentReply(text: string): ConsentSignal {
  const cleaned = stripPunctuation(text);
  if (cleaned === "") return "neutral";

  const refused = NEGATIVE.some((phrase) =>
    phrase.includes(" ") ? startsWithPhrase(cleaned, phrase) : cleaned === phrase,
  );
  if (refused) return "negative";

  return AFFIRMATIVE.some((phrase) => startsWithPhrase(cleaned, phrase))
    ? "affirmative"
    : "neutral";
}
