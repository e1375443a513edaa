import { homedir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { configFromEnv, normalizeLmsUrl, resolveConfig } from '../config';
import { slugify, withTimeout } from '../utils';

describe('resolveConfig', () => {
  it('fills every default', () => {
    expect(resolveConfig()).toEqual({
      lmsUrl: 'http://localhost:8000',
      stateDir: join(homedir(), '.lms-sync'),
      decksDir: join(homedir(), '.lms-sync', 'decks'),
      prefix: 'LMS_SYNC',
      requestTimeoutMs: 30_000,
      syncTimeoutMs: 120_000,
      flushReviewThreshold: 50,
      flushAgeMs: 600_000,
      tokenExpirySkewSeconds: 30,
      addonSecret: null
    });
  });

  it('derives the decks directory from the state directory', () => {
    const config = resolveConfig({ stateDir: '/tmp/lms-state', lmsUrl: 'https://lms.example.com/ ' });

    expect(config.decksDir).toBe(join('/tmp/lms-state', 'decks'));
    expect(config.lmsUrl).toBe('https://lms.example.com');
  });

  it('rejects non-positive thresholds', () => {
    expect(() => resolveConfig({ flushReviewThreshold: 0 })).toThrow(
      'Invalid engine config: flushReviewThreshold must be a positive number'
    );
    expect(() => resolveConfig({ requestTimeoutMs: -5 })).toThrow(
      'Invalid engine config: requestTimeoutMs must be a positive number'
    );
  });

  it('reads the environment', () => {
    expect(
      configFromEnv({ LMS_URL: 'https://lms.example.com', LMS_ADDON_SECRET: 'test-secret', LMS_SYNC_STATE_DIR: '' })
    ).toEqual({
      lmsUrl: 'https://lms.example.com',
      stateDir: undefined,
      decksDir: undefined,
      addonSecret: 'test-secret'
    });
  });

  it('strips trailing slashes', () => {
    expect(normalizeLmsUrl('http://lms.test///')).toBe('http://lms.test');
  });
});

describe('utils', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('slugifies deck titles for file names', () => {
    expect(slugify('Từ vựng: Unit 1!')).toBe('tu-vung-unit-1');
    expect(slugify('Đại số')).toBe('dai-so');
    expect(slugify('???')).toBe('deck');
  });

  it('rejects a promise that outlives its timeout', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 2000, 'Sync cycle');
    const assertion = expect(pending).rejects.toThrow('Sync cycle timed out after 2s');

    await vi.advanceTimersByTimeAsync(2000);
    await assertion;
  });

  it('passes through a value that arrives in time', async () => {
    expect(await withTimeout(Promise.resolve('done'), 2000, 'Sync cycle')).toBe('done');
  });
});
