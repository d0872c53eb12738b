import { fileURLToPath } from 'node:url';

export type ApiRuntimeEnv = {
  nodeEnv: string;
  host: string;
  port: number;
  logLevel: string;
  catalogPath: string;
  webOrigin: string | null;
  rateLimitMax: number;
  rateLimitWindow: string;
  trustProxy: boolean;
};

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../data/sic-codes.csv', import.meta.url)
);

function parsePort(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = (env[name] ?? '').trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    throw new Error(`Invalid ${name}: expected integer port (1-65535), got "${raw}"`);
  }
  return parsed;
}

function parsePositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = (env[name] ?? '').trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got "${raw}"`);
  }
  return parsed;
}

export function resolveCatalogPath(env: NodeJS.ProcessEnv = process.env): string {
  return (env.SIC_CATALOG_PATH ?? '').trim() || DEFAULT_CATALOG_PATH;
}

export function validateApiRuntimeEnv(env: NodeJS.ProcessEnv = process.env): ApiRuntimeEnv {
  const nodeEnv = (env.NODE_ENV ?? 'development').trim();

  const logLevel = (env.LOG_LEVEL ?? '').trim().toLowerCase() || 'info';
  if (!LOG_LEVELS.has(logLevel)) {
    throw new Error(
      `Invalid LOG_LEVEL: expected one of ${[...LOG_LEVELS].join(', ')}, got "${logLevel}"`
    );
  }

  const trustProxy = (env.TRUST_PROXY ?? '').trim();

  return {
    nodeEnv,
    host: (env.HOST ?? '0.0.0.0').trim() || '0.0.0.0',
    port: parsePort(env, 'PORT', 3001),
    logLevel,
    catalogPath: resolveCatalogPath(env),
    webOrigin: (env.WEB_ORIGIN ?? '').trim() || null,
    rateLimitMax: parsePositiveInt(env, 'RATE_LIMIT_MAX', 600),
    rateLimitWindow: (env.RATE_LIMIT_WINDOW ?? '').trim() || '1 minute',
    trustProxy: trustProxy === '1' || trustProxy.toLowerCase() === 'true',
  };
}
