import type { EnvConfig, MethodWeights } from "../config/env";
import type { Logger } from "../config/logger";
import { SectorBenchmarkService, type SectorSummary } from "../benchmarks/sector-benchmark.service";
import type {
  AnalysisErrorCode,
  AnalysisMethod,
  AnalysisRequest,
  AnalysisResult,
  AnalyzeOutcome,
  ImprovementReport,
  RewriteOutput,
} from "../shared/types/analysis.types";
import type { ReferenceData } from "../shared/types/reference.types";
import { round1 } from "../shared/utils/score.util";
import {
  buildInterpretation,
  buildMethodPresets,
  classifyIntensity,
  combineSubScores,
  computeConfidence,
  directionOf,
  parseAnalysisMethod,
  scoreLexiconBalance,
  toBiasScore,
  type MethodPreset,
} from "./aggregator";
import {
  adjustTermWeights,
  buildContextPolicy,
  compileContextPatterns,
  scoreContextualPatterns,
  withoutAdjustments,
  type CompiledContextPatterns,
  type ContextPolicy,
} from "./contextual.analyzer";
import { compileLexicon, matchTokens, type CompiledLexicon } from "./lexicon.matcher";
import { compileReplacements, rewriteText, type CompiledReplacements } from "./rewrite.service";
import { compileSentiment, scoreSentiment, type CompiledSentiment } from "./sentiment.scorer";
import { generateSuggestions } from "./suggestion.generator";
import { countWords, tokenize } from "./tokenizer";

export interface EngineOptions {
  maxTextLength: number;
  maxSuggestions: number;
  rewriteThreshold: number;
  negationWindow: number;
  negationFactor: number;
  idiomFactor: number;
  comprehensiveWeights: MethodWeights;
}

export type RewriteOutcome =
  | {
      ok: true;
      output: RewriteOutput;
    }
  | {
      ok: false;
      error_code: Exclude<AnalysisErrorCode, "unknown_method">;
      message: string;
    };

type ScoredText = Omit<
  AnalysisResult,
  "suggestions" | "textStats" | "benchmark" | "sectorComparison" | "improvement" | "researchContext"
>;

export function createEngineOptions(env: EnvConfig): EngineOptions {
  return {
    maxTextLength: env.maxTextLength,
    maxSuggestions: env.maxSuggestions,
    rewriteThreshold: env.rewriteThreshold,
    negationWindow: env.negationWindow,
    negationFactor: env.negationFactor,
    idiomFactor: env.idiomFactor,
    comprehensiveWeights: env.comprehensiveWeights,
  };
}

export class BiasAnalysisEngine {
  private readonly lexicon: CompiledLexicon;
  private readonly contextPolicy: ContextPolicy;
  private readonly contextPatterns: CompiledContextPatterns;
  private readonly sentiment: CompiledSentiment;
  private readonly replacements: CompiledReplacements;
  private readonly presets: ReadonlyMap<AnalysisMethod, MethodPreset>;
  private readonly sectors: SectorBenchmarkService;

  constructor(
    private readonly referenceData: ReferenceData,
    private readonly options: EngineOptions,
    private readonly logger: Logger,
  ) {
    this.lexicon = compileLexicon(referenceData.lexicon.entries);
    this.contextPolicy = buildContextPolicy(referenceData.context, options);
    this.contextPatterns = compileContextPatterns(referenceData.context);
    this.sentiment = compileSentiment(referenceData.sentiment, referenceData.context.negators);
    this.replacements = compileReplacements(referenceData.replacements);
    this.presets = new Map(
      buildMethodPresets(options.comprehensiveWeights).map((preset) => [preset.method, preset]),
    );
    this.sectors = new SectorBenchmarkService(referenceData.benchmarks);
  }

  listMethods(): MethodPreset[] {
    return Array.from(this.presets.values());
  }

  listSectors(): SectorSummary[] {
    return this.sectors.listSectors();
  }

  analyze(request: AnalysisRequest): AnalyzeOutcome {
    const startedAt = Date.now();
    const invalid = this.validateText(request.text);
    if (invalid) {
      return { ok: false, ...invalid };
    }
    const method = parseAnalysisMethod(request.method);
    if (!method) {
      return {
        ok: false,
        error_code: "unknown_method",
        message: `Unknown analysis method: ${request.method ?? ""}`,
      };
    }

    const scored = this.scoreText(request.text, method);
    const result: AnalysisResult = {
      ...scored,
      suggestions: generateSuggestions(
        scored.flaggedTerms,
        this.referenceData.suggestions.templates,
        this.options.maxSuggestions,
      ),
      textStats: {
        words: countWords(request.text),
        characters: request.text.length,
      },
      benchmark: "not_requested",
    };

    const sector = request.sector?.trim();
    if (sector) {
      const comparison = this.sectors.compare(scored.intensity, sector);
      if (comparison.ok) {
        result.benchmark = "available";
        result.sectorComparison = comparison.comparison;
      } else {
        result.benchmark = "no_benchmark_available";
      }
    }

    const wantsRewrite =
      request.includeRewrite ?? scored.intensity > this.options.rewriteThreshold;
    if (wantsRewrite) {
      result.improvement = this.buildImprovement(request.text, method, scored.intensity);
    }

    if (request.includeResearchContext) {
      result.researchContext = this.sectors.researchContext(scored.intensity);
    }

    this.logger.debug("analysis.completed", {
      method,
      sector: result.sectorComparison?.sector ?? null,
      benchmark: result.benchmark,
      text_length: request.text.length,
      bias_score: result.biasScore,
      flagged_terms: result.flaggedTerms.length,
      latency_ms: Date.now() - startedAt,
    });

    return { ok: true, result };
  }

  rewrite(text: string): RewriteOutcome {
    const invalid = this.validateText(text);
    if (invalid) {
      return { ok: false, ...invalid };
    }
    return { ok: true, output: rewriteText(text, this.replacements) };
  }

  private validateText(
    text: string,
  ): { error_code: "empty_text" | "text_too_long"; message: string } | null {
    if (!text.trim()) {
      return { error_code: "empty_text", message: "Text must not be empty" };
    }
    if (text.length > this.options.maxTextLength) {
      return {
        error_code: "text_too_long",
        message: `Text exceeds ${this.options.maxTextLength} characters`,
      };
    }
    return null;
  }

  private scoreText(text: string, method: AnalysisMethod): ScoredText {
    const preset = this.presets.get(method);
    const weights = preset ? preset.weights : this.options.comprehensiveWeights;

    const tokens = tokenize(text);
    const flagged = matchTokens(tokens, this.lexicon);
    // Negation and idiom damping belong to the multi-method analysis only.
    const flaggedTerms =
      method === "comprehensive"
        ? adjustTermWeights(tokens, flagged, this.contextPolicy)
        : withoutAdjustments(flagged);
    const contextual = scoreContextualPatterns(text, this.contextPatterns);
    const sentiment = scoreSentiment(tokens, this.sentiment);

    const subScores = {
      lexicon: scoreLexiconBalance(flaggedTerms),
      contextual: contextual.score,
      sentiment: sentiment.score,
    };
    const signedScore = combineSubScores(subScores, weights);
    const intensity = Math.abs(signedScore);
    const direction = directionOf(signedScore);
    const classification = classifyIntensity(intensity);
    const distinctGendered = new Set(
      flaggedTerms.filter((term) => term.category !== "neutral").map((term) => term.term),
    );

    return {
      method,
      biasScore: toBiasScore(signedScore),
      signedScore,
      intensity,
      direction,
      classification,
      confidence: computeConfidence(method, {
        distinctGenderedTerms: distinctGendered.size,
        detectedPatterns: contextual.detectedPatterns.length,
        distinctMarkers: sentiment.markers.length,
      }),
      subScores,
      flaggedTerms,
      detectedPatterns: contextual.detectedPatterns,
      sentiment: {
        markers: sentiment.markers,
        polarity: sentiment.polarity,
        subjectivity: sentiment.subjectivity,
      },
      interpretation: buildInterpretation(classification, direction),
    };
  }

  private buildImprovement(
    text: string,
    method: AnalysisMethod,
    intensity: number,
  ): ImprovementReport {
    const rewritten = rewriteText(text, this.replacements);
    const improved = this.scoreText(rewritten.improvedText, method);
    const reductionPoints = round1(Math.max(0, intensity - improved.intensity));
    return {
      improvedText: rewritten.improvedText,
      changes: rewritten.changes,
      improvedBiasScore: improved.biasScore,
      improvedIntensity: improved.intensity,
      improvedClassification: improved.classification,
      reductionPoints,
      reductionPercent: intensity > 0 ? round1((reductionPoints / intensity) * 100) : 0,
    };
  }
}
