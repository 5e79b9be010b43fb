import type { FlaggedTerm } from "../shared/types/analysis.types";
import type { GenderCoding, SuggestionTemplate } from "../shared/types/reference.types";

const CATEGORY_ORDER: GenderCoding[] = ["masculine", "feminine", "neutral"];
const MAX_EXAMPLE_TERMS = 3;

export function generateSuggestions(
  flaggedTerms: ReadonlyArray<FlaggedTerm>,
  templates: ReadonlyArray<SuggestionTemplate>,
  maxCount: number,
): string[] {
  const suggestions: string[] = [];

  for (const category of CATEGORY_ORDER) {
    if (suggestions.length >= maxCount) {
      break;
    }
    const examples = distinctTerms(flaggedTerms, category).slice(0, MAX_EXAMPLE_TERMS);
    if (examples.length === 0) {
      continue;
    }
    const template = templates.find((item) => item.category === category);
    if (!template) {
      continue;
    }
    const suggestion = template.text.replace(
      "{terms}",
      examples.map((term) => `"${term}"`).join(", "),
    );
    if (!suggestions.includes(suggestion)) {
      suggestions.push(suggestion);
    }
  }

  return suggestions;
}

function distinctTerms(flaggedTerms: ReadonlyArray<FlaggedTerm>, category: GenderCoding): string[] {
  const seen: string[] = [];
  for (const term of flaggedTerms) {
    if (term.category === category && !seen.includes(term.term)) {
      seen.push(term.term);
    }
  }
  return seen;
}
