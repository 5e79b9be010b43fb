import type { FlaggedTerm, TextToken } from "../shared/types/analysis.types";
import type { WordListEntry } from "../shared/types/reference.types";
import { tokenize } from "./tokenizer";

const VARIANT_SUFFIXES = ["ing", "es", "ed", "ly", "s", "d"];
const MIN_VARIANT_TERM_LENGTH = 4;
const MIN_STEM_LENGTH = 3;

interface MultiWordTerm {
  entry: WordListEntry;
  tokens: string[];
}

export interface CompiledLexicon {
  single: ReadonlyMap<string, WordListEntry>;
  multi: ReadonlyArray<MultiWordTerm>;
}

export function compileLexicon(entries: ReadonlyArray<WordListEntry>): CompiledLexicon {
  const single = new Map<string, WordListEntry>();
  const multi: MultiWordTerm[] = [];

  for (const entry of entries) {
    const tokens = tokenize(entry.term).map((token) => token.value);
    if (tokens.length === 0) {
      continue;
    }
    if (tokens.length === 1) {
      const [value = ""] = tokens;
      if (!single.has(value)) {
        single.set(value, entry);
      }
      continue;
    }
    multi.push({ entry, tokens });
  }

  multi.sort((left, right) => right.tokens.length - left.tokens.length);
  return { single, multi };
}

/**
 * Exact form first, then simple inflections ("leads", "managed", "competing",
 * "independently"). Short terms only match exactly, so "ward" never reads as "war".
 */
export function lookupTerm(
  token: string,
  single: ReadonlyMap<string, WordListEntry>,
): WordListEntry | null {
  const exact = single.get(token);
  if (exact) {
    return exact;
  }

  for (const suffix of VARIANT_SUFFIXES) {
    if (!token.endsWith(suffix) || token.length - suffix.length < MIN_STEM_LENGTH) {
      continue;
    }
    const stem = token.slice(0, token.length - suffix.length);
    for (const candidate of [stem, `${stem}e`]) {
      const entry = single.get(candidate);
      if (entry && candidate.length >= MIN_VARIANT_TERM_LENGTH) {
        return entry;
      }
    }
  }

  return null;
}

export function matchTokens(
  tokens: ReadonlyArray<TextToken>,
  lexicon: CompiledLexicon,
): FlaggedTerm[] {
  const flagged: FlaggedTerm[] = [];
  let index = 0;

  while (index < tokens.length) {
    const token = tokens[index];
    if (!token) {
      break;
    }

    const multi = findMultiWordMatch(tokens, index, lexicon.multi);
    if (multi) {
      const span = tokens.slice(index, index + multi.tokens.length);
      flagged.push({
        term: multi.entry.term,
        matched: span.map((item) => item.value).join(" "),
        category: multi.entry.category,
        position: token.index,
        offset: token.offset,
        sentence: token.sentence,
        tokenCount: multi.tokens.length,
        weight: multi.entry.weight,
      });
      index += multi.tokens.length;
      continue;
    }

    const entry = lookupTerm(token.value, lexicon.single);
    if (entry) {
      flagged.push({
        term: entry.term,
        matched: token.value,
        category: entry.category,
        position: token.index,
        offset: token.offset,
        sentence: token.sentence,
        tokenCount: 1,
        weight: entry.weight,
      });
    }
    index += 1;
  }

  return flagged;
}

export function matchLexicon(text: string, lexicon: CompiledLexicon): FlaggedTerm[] {
  if (!text.trim()) {
    return [];
  }
  return matchTokens(tokenize(text), lexicon);
}

function findMultiWordMatch(
  tokens: ReadonlyArray<TextToken>,
  start: number,
  candidates: ReadonlyArray<MultiWordTerm>,
): MultiWordTerm | null {
  const first = tokens[start];
  if (!first) {
    return null;
  }
  for (const candidate of candidates) {
    if (start + candidate.tokens.length > tokens.length) {
      continue;
    }
    const matches = candidate.tokens.every((value, offset) => {
      const token = tokens[start + offset];
      return token !== undefined && token.value === value && token.sentence === first.sentence;
    });
    if (matches) {
      return candidate;
    }
  }
  return null;
}
