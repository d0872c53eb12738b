import { z } from 'zod/v4';

export const SicCodeSchema = z
  .string()
  .trim()
  .min(1)
  .max(16)
  .regex(/^[A-Za-z0-9.\-]+$/, 'SIC codes are alphanumeric');

export const SicEntrySchema = z.object({
  code: z.string(),
  description: z.string(),
});

export const SicMatchSchema = SicEntrySchema.extend({
  score: z.number().min(0).max(100),
});

export const ActivityCategorySchema = z.enum([
  'food-service',
  'retail',
  'banking',
  'technology',
  'manufacturing',
]);

const MatchOptionsShape = {
  limit: z.number().int().min(1).max(50).default(3),
  minScore: z.number().min(0).max(100).optional(),
};

export const SicMatchInputSchema = z.object({
  description: z.string().max(5_000),
  ...MatchOptionsShape,
});

export const SicBatchMatchInputSchema = z.object({
  descriptions: z.array(z.string().max(5_000)).min(1).max(100),
  ...MatchOptionsShape,
});

export const SicClassificationSchema = z.object({
  description: z.string(),
  extracted: z.string(),
  categories: z.array(ActivityCategorySchema),
  classifiable: z.boolean(),
  matches: z.array(SicMatchSchema),
});

export const SicBatchMatchResponseSchema = z.object({
  results: z.array(SicClassificationSchema),
});

export const SicAssessInputSchema = z.object({
  description: z.string().max(5_000),
  currentCode: z.string().trim().max(16),
});

export const SicAssessmentReasonSchema = z.enum(['missing-input', 'code-found', 'code-not-found']);

export const SicAssessmentSchema = z.object({
  currentCode: z.string(),
  currentDescription: z.string(),
  score: z.number().min(0).max(100),
  accurate: z.boolean(),
  reason: SicAssessmentReasonSchema,
  breakdown: z
    .object({
      ratio: z.number(),
      partialRatio: z.number(),
      tokenSortRatio: z.number(),
      tokenSetRatio: z.number(),
    })
    .nullable(),
  bestMatch: SicMatchSchema.nullable(),
});

export const SicPredictionSchema = z.object({
  code: z.string().nullable(),
  description: z.string(),
  score: z.number().min(0).max(100),
  accurate: z.boolean(),
});

export const SicAssessResponseSchema = z.object({
  current: SicAssessmentSchema,
  predicted: SicPredictionSchema,
});

export const SicCodeParamsSchema = z.object({ code: SicCodeSchema });

export const SicCodesQuerySchema = z.object({
  q: z.string().trim().max(200).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export const SicCodesResponseSchema = z.object({
  total: z.number().int(),
  items: z.array(SicEntrySchema),
});
