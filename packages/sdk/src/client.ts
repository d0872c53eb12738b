import type { z } from 'zod/v4';
import {
  ErrorEnvelopeSchema,
  HealthSchema,
  SicAssessResponseSchema,
  SicBatchMatchResponseSchema,
  SicClassificationSchema,
  SicCodesResponseSchema,
  SicEntrySchema,
} from '@sicmatch/types';
import type {
  Health,
  MatchOptions,
  SDKOptions,
  SicAssessInput,
  SicAssessResponse,
  SicBatchMatchResponse,
  SicClassification,
  SicCodesResponse,
  SicEntry,
} from './types.js';

export class SicApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    readonly details?: unknown
  ) {
    super(`${status} ${message}`);
    this.name = 'SicApiError';
  }
}

// -------------------------------
// Internal HTTP helper
// -------------------------------
function joinUrl(base: string, path: string) {
  const b = base.replace(/\/+$/, '');
  const p = path.startsWith('/') ? path : `/${path}`;
  return `${b}${p}`;
}

function parseJson(text: string): unknown {
  try {
    return text ? JSON.parse(text) : null;
  } catch {
    return null;
  }
}

async function http<S extends z.ZodType>(
  opts: SDKOptions,
  path: string,
  schema: S,
  init: RequestInit = {}
): Promise<z.infer<S>> {
  if (!opts.baseUrl) throw new Error('SDK baseUrl is required');

  const f = opts.fetch ?? fetch;
  const headers: Record<string, string> = {
    accept: 'application/json',
    ...(init.body !== undefined ? { 'content-type': 'application/json' } : {}),
  };

  const res = await f(joinUrl(opts.baseUrl, path), { ...init, headers });
  const text = await res.text();
  const json = parseJson(text);

  if (!res.ok) {
    // Surface the API's error envelope when there is one
    const envelope = ErrorEnvelopeSchema.safeParse(json);
    if (envelope.success) {
      const { code, message, details } = envelope.data.error;
      throw new SicApiError(res.status, code, message, details);
    }
    throw new SicApiError(res.status, 'ERR_REQUEST', text || res.statusText || 'request failed');
  }

  return schema.parse(json);
}

// -------------------------------
// Matching
// -------------------------------
export async function matchSic(
  sdk: SDKOptions,
  description: string,
  opts: MatchOptions = {}
): Promise<SicClassification> {
  return http(sdk, '/v1/sic/match', SicClassificationSchema, {
    method: 'POST',
    body: JSON.stringify({ description, ...opts }),
  });
}

export async function matchSicBatch(
  sdk: SDKOptions,
  descriptions: string[],
  opts: MatchOptions = {}
): Promise<SicBatchMatchResponse> {
  return http(sdk, '/v1/sic/match/batch', SicBatchMatchResponseSchema, {
    method: 'POST',
    body: JSON.stringify({ descriptions, ...opts }),
  });
}

export async function assessSic(
  sdk: SDKOptions,
  body: SicAssessInput
): Promise<SicAssessResponse> {
  return http(sdk, '/v1/sic/assess', SicAssessResponseSchema, {
    method: 'POST',
    body: JSON.stringify(body),
  });
}

// -------------------------------
// Catalog
// -------------------------------
export async function getSicCode(sdk: SDKOptions, code: string): Promise<SicEntry> {
  return http(sdk, `/v1/sic/codes/${encodeURIComponent(code)}`, SicEntrySchema);
}

export async function listSicCodes(
  sdk: SDKOptions,
  params?: { q?: string; limit?: number }
): Promise<SicCodesResponse> {
  const q = new URLSearchParams();
  if (params?.q) q.set('q', params.q);
  if (params?.limit != null) q.set('limit', String(params.limit));
  const qs = q.toString();
  return http(sdk, `/v1/sic/codes${qs ? `?${qs}` : ''}`, SicCodesResponseSchema);
}

export async function getHealth(sdk: SDKOptions): Promise<Health> {
  return http(sdk, '/health', HealthSchema);
}

/** Bind every call to one set of options. */
export function createSicClient(sdk: SDKOptions) {
  return {
    match: (description: string, opts?: MatchOptions) => matchSic(sdk, description, opts),
    matchBatch: (descriptions: string[], opts?: MatchOptions) =>
      matchSicBatch(sdk, descriptions, opts),
    assess: (body: SicAssessInput) => assessSic(sdk, body),
    getCode: (code: string) => getSicCode(sdk, code),
    listCodes: (params?: { q?: string; limit?: number }) => listSicCodes(sdk, params),
    health: () => getHealth(sdk),
  };
}

export type SicClient = ReturnType<typeof createSicClient>;
