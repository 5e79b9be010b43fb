import type { RewriteChange, RewriteOutput } from "../shared/types/analysis.types";
import type { ReplacementData } from "../shared/types/reference.types";
import { escapeRegExp } from "./tokenizer";

const WORD_PATTERN = /[A-Za-z]+(?:[-'][A-Za-z]+)*/g;
const TITLE_CASE_PATTERN = /^[A-Z][a-z']*(?:-[A-Z][a-z']*)*$/;
const UPPER_CASE_PATTERN = /^[A-Z]+(?:[-'][A-Z]+)*$/;

interface CompiledPhrase {
  from: string;
  to: string;
  regex: RegExp;
}

export interface CompiledReplacements {
  phrases: ReadonlyArray<CompiledPhrase>;
  words: ReadonlyMap<string, string>;
}

interface PhraseMatch {
  start: number;
  end: number;
  rule: CompiledPhrase;
}

export function compileReplacements(
  replacements: Pick<ReplacementData, "phrases" | "words">,
): CompiledReplacements {
  const phrases: CompiledPhrase[] = [];
  const seenPhrases = new Set<string>();
  for (const rule of replacements.phrases) {
    const from = rule.from.trim().toLowerCase();
    if (!from || seenPhrases.has(from)) {
      continue;
    }
    seenPhrases.add(from);
    const body = from.split(/\s+/).map(escapeRegExp).join("\\s+");
    phrases.push({
      from,
      to: rule.to,
      regex: new RegExp(`(?<![A-Za-z0-9])${body}(?![A-Za-z0-9])`, "gi"),
    });
  }

  const words = new Map<string, string>();
  for (const rule of replacements.words) {
    const from = rule.from.trim().toLowerCase();
    if (from && !words.has(from)) {
      words.set(from, rule.to);
    }
  }

  return { phrases, words };
}

/**
 * Phrase rules run first and claim their span of the text; word rules only touch what
 * the phrases left alone. Whitespace and punctuation outside replaced spans are kept.
 */
export function rewriteText(text: string, compiled: CompiledReplacements): RewriteOutput {
  const changes: RewriteChange[] = [];
  const seen = new Set<string>();
  const record = (change: RewriteChange): void => {
    const key = `${change.kind}:${change.from}`;
    if (!seen.has(key)) {
      seen.add(key);
      changes.push(change);
    }
  };

  const selected = selectPhraseMatches(text, compiled.phrases);
  let output = "";
  let cursor = 0;

  for (const match of selected) {
    output += rewriteWords(text.slice(cursor, match.start), compiled.words, record);
    const original = text.slice(match.start, match.end);
    output += startsUpperCase(original) ? capitalizeFirst(match.rule.to) : match.rule.to;
    record({ from: match.rule.from, to: match.rule.to, kind: "phrase" });
    cursor = match.end;
  }
  output += rewriteWords(text.slice(cursor), compiled.words, record);

  return {
    improvedText: output,
    changes,
  };
}

function selectPhraseMatches(
  text: string,
  phrases: ReadonlyArray<CompiledPhrase>,
): PhraseMatch[] {
  const candidates: PhraseMatch[] = [];
  for (const rule of phrases) {
    for (const match of text.matchAll(rule.regex)) {
      const start = match.index ?? 0;
      candidates.push({ start, end: start + match[0].length, rule });
    }
  }

  candidates.sort((left, right) => left.start - right.start || right.end - left.end);

  const selected: PhraseMatch[] = [];
  let lastEnd = 0;
  for (const candidate of candidates) {
    if (candidate.start < lastEnd) {
      continue;
    }
    selected.push(candidate);
    lastEnd = candidate.end;
  }
  return selected;
}

function rewriteWords(
  segment: string,
  words: ReadonlyMap<string, string>,
  record: (change: RewriteChange) => void,
): string {
  return segment.replace(WORD_PATTERN, (word) => {
    const from = word.toLowerCase();
    const replacement = words.get(from);
    if (replacement === undefined) {
      return word;
    }
    record({ from, to: replacement, kind: "word" });
    return matchCase(word, replacement);
  });
}

function matchCase(original: string, replacement: string): string {
  if (TITLE_CASE_PATTERN.test(original)) {
    return toTitleCase(replacement);
  }
  if (UPPER_CASE_PATTERN.test(original)) {
    return replacement.toUpperCase();
  }
  return replacement;
}

function toTitleCase(value: string): string {
  return value.replace(/(^|[\s-])([a-z])/g, (_match, separator: string, letter: string) =>
    `${separator}${letter.toUpperCase()}`,
  );
}

function startsUpperCase(value: string): boolean {
  const first = value.charAt(0);
  return first !== first.toLowerCase();
}

function capitalizeFirst(value: string): string {
  return `${value.charAt(0).toUpperCase()}${value.slice(1)}`;
}
