import type { GenderCoding } from "./reference.types";

export type AnalysisMethod = "lexicon" | "contextual" | "sentiment" | "comprehensive";

export type BiasDirection = "masculine" | "feminine" | "neutral";

export type ClassificationLevel = "excellent" | "warning" | "error";

export interface TextToken {
  value: string;
  index: number;
  offset: number;
  sentence: number;
}

export interface FlaggedTerm {
  term: string;
  matched: string;
  category: GenderCoding;
  position: number;
  offset: number;
  sentence: number;
  tokenCount: number;
  weight: number;
}

export type WeightAdjustmentReason = "negation" | "idiom";

export interface AdjustedTerm extends FlaggedTerm {
  adjustedWeight: number;
  adjustments: WeightAdjustmentReason[];
}

export interface DetectedPattern {
  phrase: string;
  weight: number;
  group: GenderCoding;
}

export interface ContextualScore {
  score: number;
  detectedPatterns: DetectedPattern[];
  structuralModifiers: number;
}

export interface SentimentScore {
  score: number;
  markers: string[];
  polarity: number;
  subjectivity: number;
}

export interface SubScores {
  lexicon: number;
  contextual: number;
  sentiment: number;
}

export interface Classification {
  label: "Well Balanced" | "Moderate Bias" | "High Bias";
  level: ClassificationLevel;
}

export interface SectorComparison {
  sector: string;
  description: string;
  sampleSize: number;
  meanScore: number;
  neutralThreshold: number;
  bestPractice: number;
  percentile: number;
  status: SectorStatus;
  statusLevel: ClassificationLevel;
}

export type SectorStatus =
  | "Excellent"
  | "Good"
  | "Industry Average"
  | "Above Average Bias"
  | "High Bias";

export type BenchmarkAvailability = "available" | "no_benchmark_available" | "not_requested";

export interface ResearchContext {
  intensity: number;
  researchAverage: number;
  neutralThreshold: number;
  bestPractice: number;
  insight: string;
}

export interface RewriteChange {
  from: string;
  to: string;
  kind: "phrase" | "word";
}

export interface RewriteOutput {
  improvedText: string;
  changes: RewriteChange[];
}

export interface ImprovementReport extends RewriteOutput {
  improvedBiasScore: number;
  improvedIntensity: number;
  improvedClassification: Classification;
  reductionPoints: number;
  reductionPercent: number;
}

export interface TextStats {
  words: number;
  characters: number;
}

export interface AnalysisResult {
  method: AnalysisMethod;
  biasScore: number;
  signedScore: number;
  intensity: number;
  direction: BiasDirection;
  classification: Classification;
  confidence: number;
  subScores: SubScores;
  flaggedTerms: AdjustedTerm[];
  detectedPatterns: DetectedPattern[];
  sentiment: Omit<SentimentScore, "score">;
  suggestions: string[];
  interpretation: string;
  textStats: TextStats;
  benchmark: BenchmarkAvailability;
  sectorComparison?: SectorComparison;
  improvement?: ImprovementReport;
  researchContext?: ResearchContext;
}

export interface AnalysisRequest {
  text: string;
  method?: string;
  sector?: string;
  includeRewrite?: boolean;
  includeResearchContext?: boolean;
}

export type AnalysisErrorCode = "empty_text" | "text_too_long" | "unknown_method";

export type AnalyzeOutcome =
  | {
      ok: true;
      result: AnalysisResult;
    }
  | {
      ok: false;
      error_code: AnalysisErrorCode;
      message: string;
    };
