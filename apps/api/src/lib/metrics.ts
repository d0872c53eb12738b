import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { SicClassification } from '@sicmatch/types';

export const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: 'sicmatch_' });

export const httpRequestDuration = new Histogram({
  name: 'sicmatch_http_request_duration_seconds',
  help: 'HTTP request duration (seconds)',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [registry],
});

export const httpRequestsTotal = new Counter({
  name: 'sicmatch_http_requests_total',
  help: 'HTTP requests count',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const catalogEntries = new Gauge({
  name: 'sicmatch_catalog_entries',
  help: 'SIC catalog entries loaded at startup.',
  registers: [registry],
});

export const classificationsTotal = new Counter({
  name: 'sicmatch_classifications_total',
  help: 'Descriptions classified, by outcome.',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const classificationDuration = new Histogram({
  name: 'sicmatch_classification_duration_seconds',
  help: 'Time spent extracting and ranking one description.',
  buckets: [0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1],
  registers: [registry],
});

export type ClassificationOutcome = 'matched' | 'unclassifiable' | 'no_match';

export function classificationOutcome(result: SicClassification): ClassificationOutcome {
  if (!result.classifiable) return 'unclassifiable';
  return result.matches.length ? 'matched' : 'no_match';
}

/** Run one classification and record its outcome and duration. */
export function observeClassification<T extends SicClassification>(work: () => T): T {
  const end = classificationDuration.startTimer();
  try {
    const result = work();
    classificationsTotal.inc({ outcome: classificationOutcome(result) });
    return result;
  } finally {
    end();
  }
}
