import type { TextToken } from "../shared/types/analysis.types";

const TOKEN_PATTERN = /[a-z0-9]+(?:['-][a-z0-9]+)*/g;
const SENTENCE_BREAK = /[.!?;\n]/;
const SENTENCE_SPLIT = /[.!?;\n]+/;

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[‘’]/g, "'");
}

/**
 * Splits text into lower-cased word tokens. Hyphenated and apostrophised words stay whole
 * ("results-driven", "don't"); sentence-ending punctuation advances the sentence index.
 */
export function tokenize(text: string): TextToken[] {
  const normalized = normalizeText(text);
  const tokens: TextToken[] = [];
  let sentence = 0;
  let lastEnd = 0;

  for (const match of normalized.matchAll(TOKEN_PATTERN)) {
    const offset = match.index ?? 0;
    if (tokens.length > 0 && SENTENCE_BREAK.test(normalized.slice(lastEnd, offset))) {
      sentence += 1;
    }
    tokens.push({
      value: match[0],
      index: tokens.length,
      offset,
      sentence,
    });
    lastEnd = offset + match[0].length;
  }

  return tokens;
}

export function splitSentences(text: string): string[] {
  return normalizeText(text)
    .split(SENTENCE_SPLIT)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) {
    return 0;
  }
  return trimmed.split(/\s+/).length;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Word-bounded matcher for a lower-case phrase. Words may be separated by any run of
 * whitespace but never by punctuation, so a phrase cannot straddle two sentences.
 */
export function compilePhrase(phrase: string, flags = ""): RegExp {
  const words = phrase.trim().split(/\s+/).map(escapeRegExp);
  return new RegExp(`(?<![a-z0-9])${words.join("\\s+")}(?![a-z0-9])`, flags);
}
