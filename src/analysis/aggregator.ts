import type { MethodWeights } from "../config/env";
import type {
  AdjustedTerm,
  AnalysisMethod,
  BiasDirection,
  Classification,
  SubScores,
} from "../shared/types/analysis.types";
import { round1 } from "../shared/utils/score.util";

/** Bias score of a text with no gender leaning. */
export const NEUTRAL_BASELINE = 50;

export interface MethodPreset {
  method: AnalysisMethod;
  label: string;
  description: string;
  weights: MethodWeights;
}

const METHOD_ALIASES: Record<string, AnalysisMethod> = {
  lexicon: "lexicon",
  "lexicon only": "lexicon",
  "lexicon-based": "lexicon",
  "lexicon-based analysis": "lexicon",
  contextual: "contextual",
  "contextual pattern analysis": "contextual",
  sentiment: "sentiment",
  "sentiment analysis": "sentiment",
  comprehensive: "comprehensive",
  "comprehensive multi-method": "comprehensive",
  "comprehensive multi-method analysis": "comprehensive",
  "multi-method": "comprehensive",
};

export function buildMethodPresets(comprehensiveWeights: MethodWeights): MethodPreset[] {
  return [
    {
      method: "lexicon",
      label: "Lexicon Only",
      description: "Counts masculine- and feminine-coded words from the research word lists.",
      weights: { lexicon: 1, contextual: 0, sentiment: 0 },
    },
    {
      method: "contextual",
      label: "Contextual",
      description: "Scores gendered phrases and sentence structure such as obligation cues.",
      weights: { lexicon: 0, contextual: 1, sentiment: 0 },
    },
    {
      method: "sentiment",
      label: "Sentiment",
      description: "Scores the intensity of the language used to describe the role.",
      weights: { lexicon: 0, contextual: 0, sentiment: 1 },
    },
    {
      method: "comprehensive",
      label: "Comprehensive Multi-Method",
      description: "Weighted combination of the lexicon, contextual and sentiment scores.",
      weights: { ...comprehensiveWeights },
    },
  ];
}

export function parseAnalysisMethod(value: string | undefined): AnalysisMethod | null {
  if (value === undefined) {
    return "comprehensive";
  }
  const key = value.trim().toLowerCase().replace(/\s+/g, " ");
  return METHOD_ALIASES[key] ?? null;
}

/**
 * Signed balance of the gendered hits: +100 when every weighted hit is masculine,
 * -100 when every one is feminine. Neutral hits are reported but carry no direction.
 */
export function scoreLexiconBalance(terms: ReadonlyArray<AdjustedTerm>): number {
  let masculine = 0;
  let feminine = 0;
  for (const term of terms) {
    if (term.category === "masculine") {
      masculine += term.adjustedWeight;
    } else if (term.category === "feminine") {
      feminine += term.adjustedWeight;
    }
  }
  const total = masculine + feminine;
  if (total <= 0) {
    return 0;
  }
  return round1(((masculine - feminine) / total) * 100);
}

export function combineSubScores(subScores: SubScores, weights: MethodWeights): number {
  const total = weights.lexicon + weights.contextual + weights.sentiment;
  if (total <= 0) {
    return 0;
  }
  const combined =
    (subScores.lexicon * weights.lexicon +
      subScores.contextual * weights.contextual +
      subScores.sentiment * weights.sentiment) /
    total;
  return round1(combined);
}

export function toBiasScore(signedScore: number): number {
  return round1(NEUTRAL_BASELINE + signedScore / 2);
}

export function directionOf(signedScore: number): BiasDirection {
  if (signedScore > 0) {
    return "masculine";
  }
  if (signedScore < 0) {
    return "feminine";
  }
  return "neutral";
}

export function classifyIntensity(intensity: number): Classification {
  if (intensity <= 20) {
    return { label: "Well Balanced", level: "excellent" };
  }
  if (intensity <= 40) {
    return { label: "Moderate Bias", level: "warning" };
  }
  return { label: "High Bias", level: "error" };
}

export interface ConfidenceInputs {
  distinctGenderedTerms: number;
  detectedPatterns: number;
  distinctMarkers: number;
}

export function computeConfidence(method: AnalysisMethod, inputs: ConfidenceInputs): number {
  const lexicon = Math.min(90, 60 + 3 * inputs.distinctGenderedTerms);
  const contextual = Math.min(85, 65 + 3 * inputs.detectedPatterns);
  const sentiment = Math.min(80, 50 + 4 * inputs.distinctMarkers);

  switch (method) {
    case "lexicon":
      return lexicon;
    case "contextual":
      return contextual;
    case "sentiment":
      return sentiment;
    case "comprehensive":
      return Math.min(95, round1((lexicon + contextual + sentiment) / 3));
  }
}

export function buildInterpretation(
  classification: Classification,
  direction: BiasDirection,
): string {
  if (classification.level === "excellent") {
    return direction === "neutral"
      ? "The language is well balanced and shows no gender leaning."
      : `The language is well balanced, with a slight ${direction} leaning.`;
  }
  if (classification.level === "warning") {
    return `The language shows moderate ${direction}-coded bias that may discourage some applicants.`;
  }
  return `The language is strongly ${direction}-coded and is likely to discourage applicants who do not identify with it.`;
}
