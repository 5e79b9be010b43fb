import { readFile } from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import { compileLexicon, matchTokens, type CompiledLexicon } from "../analysis/lexicon.matcher";
import { normalizeText, tokenize } from "../analysis/tokenizer";
import type { ReferenceData } from "../shared/types/reference.types";
import {
  benchmarksFileSchema,
  contextFileSchema,
  lexiconFileSchema,
  replacementsFileSchema,
  sentimentFileSchema,
  suggestionsFileSchema,
} from "./reference-data.schemas";

export const REFERENCE_FILES = {
  lexicon: "lexicon.json",
  context: "context.json",
  sentiment: "sentiment.json",
  replacements: "replacements.json",
  suggestions: "suggestions.json",
  benchmarks: "benchmarks.json",
} as const;

export async function loadReferenceData(directory: string): Promise<ReferenceData> {
  const [lexicon, context, sentiment, replacements, suggestions, benchmarks] = await Promise.all([
    readReferenceFile(directory, REFERENCE_FILES.lexicon, lexiconFileSchema),
    readReferenceFile(directory, REFERENCE_FILES.context, contextFileSchema),
    readReferenceFile(directory, REFERENCE_FILES.sentiment, sentimentFileSchema),
    readReferenceFile(directory, REFERENCE_FILES.replacements, replacementsFileSchema),
    readReferenceFile(directory, REFERENCE_FILES.suggestions, suggestionsFileSchema),
    readReferenceFile(directory, REFERENCE_FILES.benchmarks, benchmarksFileSchema),
  ]);

  const data: ReferenceData = { lexicon, context, sentiment, replacements, suggestions, benchmarks };
  assertScoringPreconditions(data);
  return deepFreeze(data);
}

async function readReferenceFile<S extends z.ZodTypeAny>(
  directory: string,
  fileName: string,
  schema: S,
): Promise<z.infer<S>> {
  let raw: string;
  try {
    raw = await readFile(path.join(directory, fileName), "utf8");
  } catch {
    throw new Error(`reference_data_missing:${fileName}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new Error(`reference_data_invalid:${fileName}: ${message}`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new Error(`reference_data_invalid:${fileName}: ${where} ${issue?.message ?? "is invalid"}`);
  }
  return parsed.data;
}

/**
 * Appending a masculine-coded word must never lower the score. That holds only while no
 * feminine-leaning cue contains a masculine-coded word and no idiom damps two terms.
 * Rewrites may not introduce masculine-coded wording either.
 */
export function assertScoringPreconditions(data: ReferenceData): void {
  const seenTerms = new Set<string>();
  for (const entry of data.lexicon.entries) {
    const key = normalizeText(entry.term.trim());
    if (seenTerms.has(key)) {
      throw new Error(`reference_data_invalid:${REFERENCE_FILES.lexicon}: duplicate term "${entry.term}"`);
    }
    seenTerms.add(key);
  }

  const lexicon = compileLexicon(data.lexicon.entries);
  const masculine = compileLexicon(
    data.lexicon.entries.filter((entry) => entry.category === "masculine"),
  );

  for (const pattern of data.context.patterns) {
    if (pattern.weight < 0 && containsMasculineTerm(pattern.phrase, masculine)) {
      throw new Error(
        `reference_data_invalid:${REFERENCE_FILES.context}: negative pattern "${pattern.phrase}" contains a masculine-coded term`,
      );
    }
  }

  for (const rule of data.context.structuralRules) {
    if (rule.weight >= 0) {
      continue;
    }
    const offending = rule.phrases.find((phrase) => containsMasculineTerm(phrase, masculine));
    if (offending) {
      throw new Error(
        `reference_data_invalid:${REFERENCE_FILES.context}: negative rule "${rule.id}" contains a masculine-coded term "${offending}"`,
      );
    }
  }

  for (const idiom of data.context.idioms) {
    if (matchTokens(tokenize(idiom), lexicon).length > 1) {
      throw new Error(
        `reference_data_invalid:${REFERENCE_FILES.context}: idiom "${idiom}" contains more than one lexicon term`,
      );
    }
  }

  for (const marker of data.sentiment.intensityMarkers) {
    if (marker.weight < 0 && containsMasculineTerm(marker.term, masculine)) {
      throw new Error(
        `reference_data_invalid:${REFERENCE_FILES.sentiment}: negative marker "${marker.term}" is a masculine-coded term`,
      );
    }
  }

  for (const rule of [...data.replacements.phrases, ...data.replacements.words]) {
    if (containsMasculineTerm(rule.to, masculine)) {
      throw new Error(
        `reference_data_invalid:${REFERENCE_FILES.replacements}: replacement "${rule.from}" -> "${rule.to}" is masculine-coded`,
      );
    }
  }
}

function containsMasculineTerm(phrase: string, masculine: CompiledLexicon): boolean {
  return matchTokens(tokenize(phrase), masculine).length > 0;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
