import { z } from "zod";

const genderCodingSchema = z.enum(["masculine", "feminine", "neutral"]);
const versionSchema = z.string().min(1);
const termSchema = z.string().trim().min(1);

export const lexiconFileSchema = z.object({
  version: versionSchema,
  entries: z
    .array(
      z.object({
        term: termSchema,
        category: genderCodingSchema,
        weight: z.number().positive(),
      }),
    )
    .min(1),
});

export const contextFileSchema = z.object({
  version: versionSchema,
  patterns: z.array(
    z.object({
      phrase: termSchema,
      weight: z.number().finite(),
      group: genderCodingSchema,
    }),
  ),
  idioms: z.array(termSchema),
  negators: z.array(termSchema),
  structuralRules: z.array(
    z.object({
      id: termSchema,
      phrases: z.array(termSchema).min(1),
      weight: z.number().finite(),
      exclusiveGroup: termSchema.optional(),
    }),
  ),
});

export const sentimentFileSchema = z.object({
  version: versionSchema,
  intensityMarkers: z.array(
    z.object({
      term: termSchema,
      weight: z.number().finite(),
    }),
  ),
  polarity: z.array(
    z.object({
      term: termSchema,
      polarity: z.number().min(-1).max(1),
      subjectivity: z.number().min(0).max(1),
    }),
  ),
});

const replacementRuleSchema = z.object({
  from: termSchema,
  to: termSchema,
});

export const replacementsFileSchema = z.object({
  version: versionSchema,
  phrases: z.array(replacementRuleSchema),
  words: z.array(replacementRuleSchema),
});

export const suggestionsFileSchema = z.object({
  version: versionSchema,
  templates: z.array(
    z.object({
      category: genderCodingSchema,
      text: z.string().includes("{terms}"),
    }),
  ),
});

export const benchmarksFileSchema = z.object({
  version: versionSchema,
  sectors: z
    .array(
      z.object({
        sector: termSchema,
        description: z.string(),
        sampleSize: z.number().int().nonnegative(),
        meanScore: z.number().min(0).max(100),
        neutralThreshold: z.number().min(0).max(100),
        bestPractice: z.number().min(0).max(100),
        masculineTendency: z.number().min(0).max(100),
        feminineTendency: z.number().min(0).max(100),
        distribution: z.object({
          stdDev: z.number().positive(),
        }),
      }),
    )
    .min(1),
  research: z.object({
    researchAverage: z.number().min(0).max(100),
    neutralThreshold: z.number().min(0).max(100),
    bestPractice: z.number().min(0).max(100),
    datasetSize: z.number().int().nonnegative(),
    biasDistribution: z.object({
      neutral: z.number().min(0).max(100),
      masculine: z.number().min(0).max(100),
      feminine: z.number().min(0).max(100),
    }),
  }),
});
