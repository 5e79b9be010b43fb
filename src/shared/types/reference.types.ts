export type GenderCoding = "masculine" | "feminine" | "neutral";

export interface WordListEntry {
  term: string;
  category: GenderCoding;
  weight: number;
}

export interface PhrasePattern {
  phrase: string;
  weight: number;
  group: GenderCoding;
}

export interface StructuralRule {
  id: string;
  phrases: string[];
  weight: number;
  exclusiveGroup?: string;
}

export interface IntensityMarker {
  term: string;
  weight: number;
}

export interface PolarityEntry {
  term: string;
  polarity: number;
  subjectivity: number;
}

export interface ReplacementRule {
  from: string;
  to: string;
}

export interface SuggestionTemplate {
  category: GenderCoding;
  text: string;
}

export interface SectorBenchmark {
  sector: string;
  description: string;
  sampleSize: number;
  meanScore: number;
  neutralThreshold: number;
  bestPractice: number;
  masculineTendency: number;
  feminineTendency: number;
  distribution: {
    stdDev: number;
  };
}

export interface ResearchFindings {
  researchAverage: number;
  neutralThreshold: number;
  bestPractice: number;
  datasetSize: number;
  biasDistribution: {
    neutral: number;
    masculine: number;
    feminine: number;
  };
}

export interface LexiconData {
  version: string;
  entries: WordListEntry[];
}

export interface ContextData {
  version: string;
  patterns: PhrasePattern[];
  idioms: string[];
  negators: string[];
  structuralRules: StructuralRule[];
}

export interface SentimentData {
  version: string;
  intensityMarkers: IntensityMarker[];
  polarity: PolarityEntry[];
}

export interface ReplacementData {
  version: string;
  phrases: ReplacementRule[];
  words: ReplacementRule[];
}

export interface SuggestionData {
  version: string;
  templates: SuggestionTemplate[];
}

export interface BenchmarkData {
  version: string;
  sectors: SectorBenchmark[];
  research: ResearchFindings;
}

export interface ReferenceData {
  lexicon: LexiconData;
  context: ContextData;
  sentiment: SentimentData;
  replacements: ReplacementData;
  suggestions: SuggestionData;
  benchmarks: BenchmarkData;
}
