import type {
  AdjustedTerm,
  ContextualScore,
  DetectedPattern,
  FlaggedTerm,
  TextToken,
  WeightAdjustmentReason,
} from "../shared/types/analysis.types";
import type { ContextData, PhrasePattern, StructuralRule } from "../shared/types/reference.types";
import { clampScore, round1 } from "../shared/utils/score.util";
import { compilePhrase, normalizeText, splitSentences, tokenize } from "./tokenizer";

export interface ContextPolicy {
  negationWindow: number;
  negationFactor: number;
  idiomFactor: number;
  negators: ReadonlySet<string>;
  idioms: ReadonlyArray<ReadonlyArray<string>>;
}

export interface ContextPolicyOptions {
  negationWindow: number;
  negationFactor: number;
  idiomFactor: number;
}

interface CompiledPattern {
  pattern: PhrasePattern;
  regex: RegExp;
}

interface CompiledRule {
  rule: StructuralRule;
  regexes: RegExp[];
}

export interface CompiledContextPatterns {
  patterns: ReadonlyArray<CompiledPattern>;
  rules: ReadonlyArray<CompiledRule>;
}

export function buildContextPolicy(
  context: Pick<ContextData, "negators" | "idioms">,
  options: ContextPolicyOptions,
): ContextPolicy {
  return {
    negationWindow: options.negationWindow,
    negationFactor: options.negationFactor,
    idiomFactor: options.idiomFactor,
    negators: new Set(context.negators.map((item) => normalizeText(item.trim()))),
    idioms: context.idioms
      .map((idiom) => tokenize(idiom).map((token) => token.value))
      .filter((tokens) => tokens.length > 0),
  };
}

export function compileContextPatterns(
  context: Pick<ContextData, "patterns" | "structuralRules">,
): CompiledContextPatterns {
  return {
    patterns: context.patterns.map((pattern) => ({
      pattern,
      regex: compilePhrase(normalizeText(pattern.phrase)),
    })),
    rules: context.structuralRules.map((rule) => ({
      rule,
      regexes: rule.phrases.map((phrase) => compilePhrase(normalizeText(phrase))),
    })),
  };
}

/**
 * Applies the local-window policy to each flagged term. A negator up to `negationWindow`
 * tokens earlier in the same sentence scales the weight by `negationFactor`; a term that
 * sits inside a neutral idiom ("strategic planning") is scaled by `idiomFactor`.
 */
export function adjustTermWeights(
  tokens: ReadonlyArray<TextToken>,
  flaggedTerms: ReadonlyArray<FlaggedTerm>,
  policy: ContextPolicy,
): AdjustedTerm[] {
  const idiomPositions = findIdiomPositions(tokens, policy.idioms);

  return flaggedTerms.map((term) => {
    const adjustments: WeightAdjustmentReason[] = [];
    let adjustedWeight = term.weight;

    if (isNegated(tokens, term, policy)) {
      adjustments.push("negation");
      adjustedWeight *= policy.negationFactor;
    }

    for (let offset = 0; offset < term.tokenCount; offset += 1) {
      if (idiomPositions.has(term.position + offset)) {
        adjustments.push("idiom");
        adjustedWeight *= policy.idiomFactor;
        break;
      }
    }

    return {
      ...term,
      adjustedWeight,
      adjustments,
    };
  });
}

export function withoutAdjustments(flaggedTerms: ReadonlyArray<FlaggedTerm>): AdjustedTerm[] {
  return flaggedTerms.map((term) => ({
    ...term,
    adjustedWeight: term.weight,
    adjustments: [],
  }));
}

export function scoreContextualPatterns(
  text: string,
  compiled: CompiledContextPatterns,
): ContextualScore {
  const normalized = normalizeText(text);
  const detectedPatterns: DetectedPattern[] = [];
  let patternScore = 0;

  for (const { pattern, regex } of compiled.patterns) {
    if (regex.test(normalized)) {
      patternScore += pattern.weight;
      detectedPatterns.push({
        phrase: pattern.phrase,
        weight: pattern.weight,
        group: pattern.group,
      });
    }
  }

  let structuralModifiers = 0;
  for (const sentence of splitSentences(text)) {
    const usedGroups = new Set<string>();
    for (const { rule, regexes } of compiled.rules) {
      if (rule.exclusiveGroup && usedGroups.has(rule.exclusiveGroup)) {
        continue;
      }
      if (!regexes.some((regex) => regex.test(sentence))) {
        continue;
      }
      structuralModifiers += rule.weight;
      if (rule.exclusiveGroup) {
        usedGroups.add(rule.exclusiveGroup);
      }
    }
  }

  return {
    score: round1(clampScore(patternScore + structuralModifiers)),
    detectedPatterns,
    structuralModifiers,
  };
}

function isNegated(
  tokens: ReadonlyArray<TextToken>,
  term: FlaggedTerm,
  policy: ContextPolicy,
): boolean {
  const start = Math.max(0, term.position - policy.negationWindow);
  for (let index = term.position - 1; index >= start; index -= 1) {
    const token = tokens[index];
    if (!token || token.sentence !== term.sentence) {
      return false;
    }
    if (policy.negators.has(token.value)) {
      return true;
    }
  }
  return false;
}

function findIdiomPositions(
  tokens: ReadonlyArray<TextToken>,
  idioms: ReadonlyArray<ReadonlyArray<string>>,
): Set<number> {
  const positions = new Set<number>();
  for (const idiom of idioms) {
    for (let start = 0; start + idiom.length <= tokens.length; start += 1) {
      const first = tokens[start];
      if (!first) {
        continue;
      }
      const matches = idiom.every((value, offset) => {
        const token = tokens[start + offset];
        return token !== undefined && token.value === value && token.sentence === first.sentence;
      });
      if (!matches) {
        continue;
      }
      for (let offset = 0; offset < idiom.length; offset += 1) {
        positions.add(start + offset);
      }
    }
  }
  return positions;
}
