import type { SentimentScore, TextToken } from "../shared/types/analysis.types";
import type { PolarityEntry, SentimentData } from "../shared/types/reference.types";
import { clampScore, mean, round1, round3 } from "../shared/utils/score.util";
import { normalizeText, tokenize } from "./tokenizer";

const NEGATED_POLARITY_FACTOR = -0.5;

export interface CompiledSentiment {
  markers: ReadonlyMap<string, number>;
  polarity: ReadonlyMap<string, PolarityEntry>;
  negators: ReadonlySet<string>;
}

export function compileSentiment(
  sentiment: Pick<SentimentData, "intensityMarkers" | "polarity">,
  negators: ReadonlyArray<string>,
): CompiledSentiment {
  return {
    markers: new Map(
      sentiment.intensityMarkers.map((marker) => [normalizeText(marker.term.trim()), marker.weight]),
    ),
    polarity: new Map(sentiment.polarity.map((entry) => [normalizeText(entry.term.trim()), entry])),
    negators: new Set(negators.map((item) => normalizeText(item.trim()))),
  };
}

/**
 * Intensity markers drive the score, counted on every occurrence. Polarity and
 * subjectivity only describe tone: a negator directly before a word flips and halves
 * its polarity ("not friendly").
 */
export function scoreSentiment(
  tokens: ReadonlyArray<TextToken>,
  compiled: CompiledSentiment,
): SentimentScore {
  let score = 0;
  const markers: string[] = [];
  const polarities: number[] = [];
  const subjectivities: number[] = [];

  tokens.forEach((token, index) => {
    const weight = compiled.markers.get(token.value);
    if (weight !== undefined) {
      score += weight;
      if (!markers.includes(token.value)) {
        markers.push(token.value);
      }
    }

    const entry = compiled.polarity.get(token.value);
    if (!entry) {
      return;
    }
    const previous = index > 0 ? tokens[index - 1] : undefined;
    const negated =
      previous !== undefined &&
      previous.sentence === token.sentence &&
      compiled.negators.has(previous.value);
    polarities.push(negated ? entry.polarity * NEGATED_POLARITY_FACTOR : entry.polarity);
    subjectivities.push(entry.subjectivity);
  });

  return {
    score: round1(clampScore(score)),
    markers,
    polarity: round3(mean(polarities)),
    subjectivity: round3(mean(subjectivities)),
  };
}

export function scoreSentimentText(text: string, compiled: CompiledSentiment): SentimentScore {
  return scoreSentiment(tokenize(text), compiled);
}
