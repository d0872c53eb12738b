import { z } from 'zod/v4';
import {
  ActivityCategorySchema,
  SicAssessInputSchema,
  SicAssessmentReasonSchema,
  SicAssessmentSchema,
  SicAssessResponseSchema,
  SicBatchMatchInputSchema,
  SicBatchMatchResponseSchema,
  SicClassificationSchema,
  SicCodesQuerySchema,
  SicCodesResponseSchema,
  SicEntrySchema,
  SicMatchInputSchema,
  SicMatchSchema,
  SicPredictionSchema,
} from '../schemas/index.js';

export type SicEntry = z.infer<typeof SicEntrySchema>;
export type SicMatch = z.infer<typeof SicMatchSchema>;
export type ActivityCategory = z.infer<typeof ActivityCategorySchema>;
export type SicMatchInput = z.input<typeof SicMatchInputSchema>;
export type SicBatchMatchInput = z.input<typeof SicBatchMatchInputSchema>;
export type SicClassification = z.infer<typeof SicClassificationSchema>;
export type SicBatchMatchResponse = z.infer<typeof SicBatchMatchResponseSchema>;
export type SicAssessInput = z.infer<typeof SicAssessInputSchema>;
export type SicAssessmentReason = z.infer<typeof SicAssessmentReasonSchema>;
export type SicAssessment = z.infer<typeof SicAssessmentSchema>;
export type SicPrediction = z.infer<typeof SicPredictionSchema>;
export type SicAssessResponse = z.infer<typeof SicAssessResponseSchema>;
export type SicCodesQuery = z.input<typeof SicCodesQuerySchema>;
export type SicCodesResponse = z.infer<typeof SicCodesResponseSchema>;
