export type SDKOptions = {
  baseUrl: string;
  fetch?: typeof globalThis.fetch;
};

export type MatchOptions = { limit?: number; minScore?: number };

export type {
  ErrorResponse,
  Health,
  SicAssessInput,
  SicAssessResponse,
  SicBatchMatchResponse,
  SicClassification,
  SicCodesResponse,
  SicEntry,
  SicMatch,
} from '@sicmatch/types';
