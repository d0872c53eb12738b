export * from './client.js';

export type {
  ErrorResponse,
  Health,
  MatchOptions,
  SDKOptions,
  SicAssessInput,
  SicAssessResponse,
  SicBatchMatchResponse,
  SicClassification,
  SicCodesResponse,
  SicEntry,
  SicMatch,
} from './types.js';
