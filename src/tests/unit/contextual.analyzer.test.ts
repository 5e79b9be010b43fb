import assert from "node:assert/strict";
import { test } from "node:test";
import {
  adjustTermWeights,
  buildContextPolicy,
  compileContextPatterns,
  scoreContextualPatterns,
  withoutAdjustments,
} from "../../analysis/contextual.analyzer";
import { compileLexicon, matchTokens } from "../../analysis/lexicon.matcher";
import { tokenize } from "../../analysis/tokenizer";
import { loadTestReferenceData } from "../helpers/reference.fixture";

const policyOptions = { negationWindow: 3, negationFactor: 0.5, idiomFactor: 0.25 };

async function adjusted(text: string) {
  const data = await loadTestReferenceData();
  const tokens = tokenize(text);
  const flagged = matchTokens(tokens, compileLexicon(data.lexicon.entries));
  return adjustTermWeights(tokens, flagged, buildContextPolicy(data.context, policyOptions));
}

test("a preceding negator halves the weight", async () => {
  const [term] = await adjusted("We are not aggressive.");
  assert.equal(term?.term, "aggressive");
  assert.equal(term?.weight, 1.5);
  assert.equal(term?.adjustedWeight, 0.75);
  assert.deepEqual(term?.adjustments, ["negation"]);
});

test("negation looks back across commas but not across sentences", async () => {
  const [acrossCommas] = await adjusted("Never, ever, really, aggressive");
  assert.deepEqual(acrossCommas?.adjustments, ["negation"]);

  const [acrossSentences] = await adjusted("Not now. Aggressive.");
  assert.deepEqual(acrossSentences?.adjustments, []);
  assert.equal(acrossSentences?.adjustedWeight, 1.5);
});

test("terms inside a neutral idiom are damped", async () => {
  const terms = await adjusted("Strong strategic planning skills.");
  assert.deepEqual(
    terms.map((term) => [term.term, term.adjustedWeight, term.adjustments]),
    [
      ["strong", 1, []],
      ["strategic", 0.25, ["idiom"]],
    ],
  );
});

test("withoutAdjustments keeps raw weights", () => {
  const tokens = tokenize("lead");
  const flagged = matchTokens(tokens, compileLexicon([{ term: "lead", category: "masculine", weight: 2 }]));
  assert.deepEqual(
    withoutAdjustments(flagged).map((term) => [term.adjustedWeight, term.adjustments]),
    [[2, []]],
  );
});

test("pattern weights and structural cues add up", async () => {
  const data = await loadTestReferenceData();
  const compiled = compileContextPatterns(data.context);

  const result = scoreContextualPatterns("A competitive environment where you will thrive.", compiled);
  assert.equal(result.score, 28);
  assert.equal(result.structuralModifiers, 3);
  assert.deepEqual(result.detectedPatterns, [
    { phrase: "competitive environment", weight: 25, group: "masculine" },
  ]);
});

test("only the first rule of an exclusive group applies per sentence", async () => {
  const data = await loadTestReferenceData();
  const compiled = compileContextPatterns(data.context);

  assert.equal(
    scoreContextualPatterns("We expect you will work independently.", compiled).structuralModifiers,
    3,
  );
  assert.equal(
    scoreContextualPatterns("We work together. You must be the best.", compiled).structuralModifiers,
    6,
  );
});

test("the contextual score is clamped to the scale", async () => {
  const data = await loadTestReferenceData();
  const compiled = compileContextPatterns(data.context);
  const text =
    "Aggressive approach. Dominant position. Take charge. Outperform competitors. Prove yourself. Competitive environment.";
  assert.equal(scoreContextualPatterns(text, compiled).score, 100);
});
