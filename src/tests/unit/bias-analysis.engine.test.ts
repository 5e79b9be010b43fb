import assert from "node:assert/strict";
import { test } from "node:test";
import { NEUTRAL_BASELINE } from "../../analysis/aggregator";
import { BiasAnalysisEngine, type EngineOptions } from "../../analysis/bias-analysis.engine";
import type { AnalysisRequest, AnalysisResult } from "../../shared/types/analysis.types";
import {
  createCapturingLogger,
  loadTestReferenceData,
  silentLogger,
  testEngineOptions,
} from "../helpers/reference.fixture";

const MASCULINE_AD = "We are looking for an aggressive, competitive and dominant leader.";
const NEUTRAL_AD = "The analyst prepares monthly reports.";
const FEMININE_AD =
  "Join our supportive and caring team. We value empathetic, compassionate colleagues who enjoy collaborating and nurturing long-term relationships.";
const LONG_AD =
  "We are looking for an aggressive, competitive and dominant sales rockstar. You must be driven, ambitious and fearless in a fast-paced environment.";
const REPORTING_AD =
  "The analyst prepares monthly reports, maintains the reporting database and presents findings to the finance team.";

async function createEngine(overrides: Partial<EngineOptions> = {}): Promise<BiasAnalysisEngine> {
  const data = await loadTestReferenceData();
  return new BiasAnalysisEngine(data, testEngineOptions(overrides), silentLogger);
}

function analyzeOk(engine: BiasAnalysisEngine, request: AnalysisRequest): AnalysisResult {
  const outcome = engine.analyze(request);
  if (!outcome.ok) {
    assert.fail(`expected a result, got ${outcome.error_code}`);
  }
  return outcome.result;
}

test("empty and whitespace-only text is rejected", async () => {
  const engine = await createEngine();
  for (const text of ["", "   \n\t"]) {
    const outcome = engine.analyze({ text });
    assert.equal(outcome.ok, false);
    assert.equal(!outcome.ok && outcome.error_code, "empty_text");
  }
});

test("over-long text is rejected", async () => {
  const engine = await createEngine({ maxTextLength: 100 });
  const outcome = engine.analyze({ text: "a".repeat(101) });
  assert.deepEqual(outcome, {
    ok: false,
    error_code: "text_too_long",
    message: "Text exceeds 100 characters",
  });
});

test("unknown methods are rejected", async () => {
  const engine = await createEngine();
  const outcome = engine.analyze({ text: MASCULINE_AD, method: "astrology" });
  assert.equal(!outcome.ok && outcome.error_code, "unknown_method");
});

test("lexicon method flags masculine terms above the neutral baseline", async () => {
  const engine = await createEngine();
  const result = analyzeOk(engine, { text: MASCULINE_AD, method: "Lexicon Only" });
  const baseline = analyzeOk(engine, { text: NEUTRAL_AD, method: "lexicon" });

  assert.deepEqual(
    result.flaggedTerms.map((term) => [term.term, term.category]),
    [
      ["aggressive", "masculine"],
      ["competitive", "masculine"],
      ["dominant", "masculine"],
      ["leader", "masculine"],
    ],
  );
  assert.equal(baseline.biasScore, NEUTRAL_BASELINE);
  assert.equal(result.biasScore, 100);
  assert.ok(result.biasScore > baseline.biasScore);
  assert.equal(result.method, "lexicon");
  assert.equal(result.direction, "masculine");
  assert.deepEqual(result.classification, { label: "High Bias", level: "error" });
  assert.equal(result.confidence, 72);
  assert.deepEqual(result.subScores, { lexicon: 100, contextual: -3, sentiment: 45 });
});

test("comprehensive method blends the three sub-scores", async () => {
  const engine = await createEngine();
  const result = analyzeOk(engine, { text: MASCULINE_AD, includeRewrite: false });

  assert.equal(result.method, "comprehensive");
  assert.equal(result.signedScore, 50.2);
  assert.equal(result.biasScore, 75.1);
  assert.equal(result.intensity, 50.2);
  assert.equal(result.confidence, 65);
  assert.deepEqual(result.sentiment, {
    markers: ["aggressive", "competitive"],
    polarity: -0.05,
    subjectivity: 0.8,
  });
  assert.deepEqual(result.textStats, { words: 10, characters: 66 });
  assert.deepEqual(result.suggestions, [
    'Replace masculine-coded terms such as "aggressive", "competitive", "dominant" with wording that describes the work itself rather than the temperament of the person doing it.',
  ]);
  assert.equal(
    result.interpretation,
    "The language is strongly masculine-coded and is likely to discourage applicants who do not identify with it.",
  );
});

test("negation damping applies to the comprehensive method only", async () => {
  const engine = await createEngine();
  const text = "We are not aggressive.";
  const lexicon = analyzeOk(engine, { text, method: "lexicon" });
  const comprehensive = analyzeOk(engine, { text });

  assert.deepEqual(lexicon.flaggedTerms[0]?.adjustments, []);
  assert.equal(lexicon.flaggedTerms[0]?.adjustedWeight, 1.5);
  assert.deepEqual(comprehensive.flaggedTerms[0]?.adjustments, ["negation"]);
  assert.equal(comprehensive.flaggedTerms[0]?.adjustedWeight, 0.75);
});

test("the same request gives the same result", async () => {
  const engine = await createEngine();
  const request = { text: LONG_AD, sector: "Financial Services & Banking", includeResearchContext: true };
  assert.deepEqual(engine.analyze(request), engine.analyze(request));
});

test("bias score stays within 0..100", async () => {
  const engine = await createEngine();
  for (const text of [MASCULINE_AD, NEUTRAL_AD, FEMININE_AD, LONG_AD, REPORTING_AD]) {
    for (const method of ["lexicon", "contextual", "sentiment", "comprehensive"]) {
      const result = analyzeOk(engine, { text, method, includeRewrite: false });
      assert.ok(result.biasScore >= 0 && result.biasScore <= 100, `${method}: ${result.biasScore}`);
    }
  }
});

test("adding a masculine-coded term never lowers the score", async () => {
  const engine = await createEngine();
  for (const text of [MASCULINE_AD, NEUTRAL_AD, FEMININE_AD, LONG_AD, REPORTING_AD]) {
    const before = analyzeOk(engine, { text, includeRewrite: false });
    const variants = [`${text} Aggressive.`, `${text.slice(0, -1)} and aggressive.`];
    for (const variant of variants) {
      const after = analyzeOk(engine, { text: variant, includeRewrite: false });
      assert.ok(after.biasScore >= before.biasScore, `${variant}: ${before.biasScore} -> ${after.biasScore}`);
    }
  }
  const inline = analyzeOk(engine, { text: "The analyst prepares monthly reports and aggressive." });
  assert.equal(inline.biasScore, 73.2);
});

test("sector comparison is attached when the sector is known", async () => {
  const engine = await createEngine();

  const known = analyzeOk(engine, { text: MASCULINE_AD, sector: "Financial Services & Banking" });
  assert.equal(known.benchmark, "available");
  assert.equal(known.sectorComparison?.sector, "Financial Services & Banking");
  assert.equal(known.sectorComparison?.status, "Above Average Bias");

  const unknown = analyzeOk(engine, { text: MASCULINE_AD, sector: "Underwater Basket Weaving" });
  assert.equal(unknown.benchmark, "no_benchmark_available");
  assert.equal(unknown.sectorComparison, undefined);
  assert.equal(unknown.biasScore, known.biasScore);

  const none = analyzeOk(engine, { text: MASCULINE_AD, sector: "  " });
  assert.equal(none.benchmark, "not_requested");
});

test("biased adverts get a rewrite with the score it would reach", async () => {
  const engine = await createEngine();
  const result = analyzeOk(engine, { text: MASCULINE_AD });

  assert.deepEqual(result.improvement, {
    improvedText: "We are looking for an proactive, results-focused and well-regarded leader.",
    changes: [
      { from: "aggressive", to: "proactive", kind: "word" },
      { from: "competitive", to: "results-focused", kind: "word" },
      { from: "dominant", to: "well-regarded", kind: "word" },
    ],
    improvedBiasScore: 69.5,
    improvedIntensity: 39,
    improvedClassification: { label: "Moderate Bias", level: "warning" },
    reductionPoints: 11.2,
    reductionPercent: 22.3,
  });
});

test("rewrites follow the request flag and the threshold", async () => {
  const engine = await createEngine();
  assert.equal(analyzeOk(engine, { text: MASCULINE_AD, includeRewrite: false }).improvement, undefined);
  assert.equal(analyzeOk(engine, { text: NEUTRAL_AD }).improvement, undefined);

  const forced = analyzeOk(engine, { text: NEUTRAL_AD, includeRewrite: true });
  assert.equal(forced.improvement?.improvedText, NEUTRAL_AD);
  assert.deepEqual(forced.improvement?.changes, []);
  assert.equal(forced.improvement?.reductionPoints, 0);
  assert.equal(forced.improvement?.reductionPercent, 0);
});

test("research context is added on request", async () => {
  const engine = await createEngine();
  const result = analyzeOk(engine, { text: MASCULINE_AD, includeResearchContext: true });
  assert.equal(result.researchContext?.intensity, 50.2);
  assert.equal(result.researchContext?.researchAverage, 28.4);
  assert.equal(
    result.researchContext?.insight,
    "Above the research average for comparable adverts; rewording is recommended.",
  );
  assert.equal(analyzeOk(engine, { text: MASCULINE_AD }).researchContext, undefined);
});

test("logs analysis metadata without the advert text", async () => {
  const data = await loadTestReferenceData();
  const { logger, entries } = createCapturingLogger();
  const engine = new BiasAnalysisEngine(data, testEngineOptions(), logger);

  analyzeOk(engine, { text: MASCULINE_AD, method: "lexicon", includeRewrite: false });

  assert.equal(entries.length, 1);
  const [entry] = entries;
  assert.equal(entry?.level, "debug");
  assert.equal(entry?.message, "analysis.completed");
  assert.equal(entry?.meta?.method, "lexicon");
  assert.equal(entry?.meta?.text_length, 66);
  assert.equal(entry?.meta?.bias_score, 100);
  assert.equal(entry?.meta?.flagged_terms, 4);
  assert.equal(
    Object.values(entry?.meta ?? {}).some((value) => value === MASCULINE_AD),
    false,
  );
});

test("rewrite validates its input", async () => {
  const engine = await createEngine();
  assert.deepEqual(engine.rewrite(" "), {
    ok: false,
    error_code: "empty_text",
    message: "Text must not be empty",
  });
  const outcome = engine.rewrite("A fast-paced environment.");
  assert.equal(outcome.ok && outcome.output.improvedText, "A varied work environment.");
});

test("lists methods and sectors", async () => {
  const engine = await createEngine();
  assert.deepEqual(
    engine.listMethods().map((preset) => preset.method),
    ["lexicon", "contextual", "sentiment", "comprehensive"],
  );
  assert.equal(engine.listSectors().length, 15);
});
