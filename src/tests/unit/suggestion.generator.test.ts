import assert from "node:assert/strict";
import { test } from "node:test";
import { generateSuggestions } from "../../analysis/suggestion.generator";
import type { FlaggedTerm } from "../../shared/types/analysis.types";
import type { GenderCoding, SuggestionTemplate } from "../../shared/types/reference.types";

const templates: SuggestionTemplate[] = [
  { category: "masculine", text: "Reword {terms}." },
  { category: "feminine", text: "Balance {terms}." },
  { category: "neutral", text: "Keep {terms}." },
];

function flagged(term: string, category: GenderCoding, position: number): FlaggedTerm {
  return {
    term,
    matched: term,
    category,
    position,
    offset: position * 10,
    sentence: 0,
    tokenCount: 1,
    weight: 1,
  };
}

test("one suggestion per category in fixed order with up to three distinct examples", () => {
  const terms = [
    flagged("caring", "feminine", 0),
    flagged("lead", "masculine", 1),
    flagged("drive", "masculine", 2),
    flagged("lead", "masculine", 3),
    flagged("bold", "masculine", 4),
    flagged("fearless", "masculine", 5),
  ];
  assert.deepEqual(generateSuggestions(terms, templates, 3), [
    'Reword "lead", "drive", "bold".',
    'Balance "caring".',
  ]);
});

test("suggestions are capped", () => {
  const terms = [
    flagged("lead", "masculine", 0),
    flagged("caring", "feminine", 1),
    flagged("skilled", "neutral", 2),
  ];
  assert.deepEqual(generateSuggestions(terms, templates, 2), ['Reword "lead".', 'Balance "caring".']);
});

test("no flagged terms means no suggestions", () => {
  assert.deepEqual(generateSuggestions([], templates, 3), []);
});

test("categories without a template are skipped", () => {
  const terms = [flagged("skilled", "neutral", 0)];
  assert.deepEqual(generateSuggestions(terms, templates.slice(0, 2), 3), []);
});
