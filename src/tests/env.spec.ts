import { describe, it, expect } from 'vitest';
import { DEFAULT_FLOW, DEFAULT_TIMEOUT_MS, loadSettings } from '../config/env.js';
import { describeError, HttpError, SubstitutionError } from '../index.js';

describe('loadSettings', () => {
  it('falls back to defaults', () => {
    expect(loadSettings({})).toEqual({
      flowPath: DEFAULT_FLOW,
      serverUrl: undefined,
      apiKey: undefined,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      runId: undefined,
      logLevel: undefined,
    });
    expect(DEFAULT_TIMEOUT_MS).toBe(10_000);
  });

  it('trims values and treats blanks as unset', () => {
    const s = loadSettings({
      FLOW_CONFIG: ' flows/custom.yaml ',
      OAUTH_SERVER_URL: 'https://as.test',
      API_KEY: 'test-secret',
      HTTP_TIMEOUT_MS: '2500',
      RUN_ID: '   ',
      LOG_LEVEL: 'DEBUG',
    });
    expect(s).toEqual({
      flowPath: 'flows/custom.yaml',
      serverUrl: 'https://as.test',
      apiKey: 'test-secret',
      timeoutMs: 2500,
      runId: undefined,
      logLevel: 'debug',
    });
  });

  it('ignores an unknown log level', () => {
    expect(loadSettings({ LOG_LEVEL: 'loud' }).logLevel).toBeUndefined();
  });

  it('rejects a bad timeout', () => {
    expect(() => loadSettings({ HTTP_TIMEOUT_MS: 'abc' })).toThrow("HTTP_TIMEOUT_MS must be a positive number, got 'abc'");
    expect(() => loadSettings({ HTTP_TIMEOUT_MS: '0' })).toThrow(Error);
  });
});

describe('describeError', () => {
  it('names the error class and kind', () => {
    expect(describeError(new HttpError(401, 'Unauthorized'))).toBe('HttpError(HttpError): HTTP 401 Unauthorized');
    expect(describeError(new SubstitutionError('UnboundPlaceholder', '<x>', '<x> in url has no substitution rule')))
      .toBe('SubstitutionError(UnboundPlaceholder): <x> in url has no substitution rule');
    expect(describeError('plain')).toBe('plain');
  });
});
