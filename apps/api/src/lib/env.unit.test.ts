import { describe, expect, it } from 'vitest';
import { join } from 'node:path';
import { DEFAULT_CATALOG_PATH, resolveCatalogPath, validateApiRuntimeEnv } from './env.js';

describe('resolveCatalogPath', () => {
  it('falls back to the bundled catalog', () => {
    expect(resolveCatalogPath({})).toBe(DEFAULT_CATALOG_PATH);
    expect(resolveCatalogPath({ SIC_CATALOG_PATH: '  ' })).toBe(DEFAULT_CATALOG_PATH);
    expect(DEFAULT_CATALOG_PATH.endsWith(join('api', 'data', 'sic-codes.csv'))).toBe(true);
  });

  it('uses SIC_CATALOG_PATH when set', () => {
    expect(resolveCatalogPath({ SIC_CATALOG_PATH: ' /srv/sic/codes.xlsx ' })).toBe(
      '/srv/sic/codes.xlsx'
    );
  });
});

describe('validateApiRuntimeEnv', () => {
  it('applies defaults', () => {
    expect(validateApiRuntimeEnv({})).toEqual({
      nodeEnv: 'development',
      host: '0.0.0.0',
      port: 3001,
      logLevel: 'info',
      catalogPath: DEFAULT_CATALOG_PATH,
      webOrigin: null,
      rateLimitMax: 600,
      rateLimitWindow: '1 minute',
      trustProxy: false,
    });
  });

  it('reads explicit values', () => {
    const env = validateApiRuntimeEnv({
      NODE_ENV: 'production',
      HOST: '127.0.0.1',
      PORT: '8080',
      LOG_LEVEL: ' DEBUG ',
      WEB_ORIGIN: 'https://app.example.test',
      RATE_LIMIT_MAX: '50',
      RATE_LIMIT_WINDOW: '10 seconds',
      TRUST_PROXY: 'TRUE',
    });
    expect(env).toMatchObject({
      nodeEnv: 'production',
      host: '127.0.0.1',
      port: 8080,
      logLevel: 'debug',
      webOrigin: 'https://app.example.test',
      rateLimitMax: 50,
      rateLimitWindow: '10 seconds',
      trustProxy: true,
    });
  });

  it('only trusts proxies for 1 or true', () => {
    expect(validateApiRuntimeEnv({ TRUST_PROXY: '1' }).trustProxy).toBe(true);
    expect(validateApiRuntimeEnv({ TRUST_PROXY: 'yes' }).trustProxy).toBe(false);
  });

  it('rejects a bad PORT', () => {
    expect(() => validateApiRuntimeEnv({ PORT: 'abc' })).toThrow(
      'Invalid PORT: expected integer port (1-65535), got "abc"'
    );
    expect(() => validateApiRuntimeEnv({ PORT: '70000' })).toThrow('Invalid PORT');
  });

  it('rejects a non-positive RATE_LIMIT_MAX', () => {
    expect(() => validateApiRuntimeEnv({ RATE_LIMIT_MAX: '0' })).toThrow(
      'Invalid RATE_LIMIT_MAX: expected a positive integer, got "0"'
    );
  });

  it('rejects an unknown LOG_LEVEL', () => {
    expect(() => validateApiRuntimeEnv({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid LOG_LEVEL: .*"loud"$/);
  });
});
