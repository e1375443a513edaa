/**
 * @fileoverview Engine Configuration
 *
 * Central configuration for the sync engine. {@link resolveConfig} takes the
 * partial {@link SyncEngineConfig} a host passes in and fills every omitted
 * field with its documented default, so the rest of the engine reads plain
 * values and never re-checks for `undefined`. It describes:
 *   - Where the LMS lives and where local state is persisted
 *   - Request and sync-cycle timeouts
 *   - The review-count and age thresholds that trigger a progress flush
 *   - The optional shared secret used for single sign-on token exchange
 *
 * {@link configFromEnv} builds the same object from environment variables
 * for the command-line host.
 *
 * @see {@link engine.ts} for the sync lifecycle that consumes this config
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * Configuration accepted by the sync engine.
 *
 * Every field has a default; a host typically sets only `stateDir`.
 *
 * @example
 * new SyncEngine({
 *   stateDir: '/home/student/.lms-sync',
 *   flushReviewThreshold: 50,
 * });
 */
export interface SyncEngineConfig {
  /** LMS base URL used until a login stores another one. */
  lmsUrl?: string;
  /** Directory holding `tokens.json`, `state.json` and `progress-cache.json`. */
  stateDir?: string;
  /** Directory the default installer writes downloaded deck packages into. */
  decksDir?: string;
  /** Prefix for the debug environment flag (`<prefix>_DEBUG_MODE`). */
  prefix?: string;
  /** Per-request timeout (ms). Default: 30000. */
  requestTimeoutMs?: number;
  /** Outer timeout for one whole sync cycle (ms). Default: 120000. */
  syncTimeoutMs?: number;
  /** Pending review count that triggers a flush. Default: 50. */
  flushReviewThreshold?: number;
  /** Age of the oldest pending review that triggers a flush (ms). Default: 600000 (10 min). */
  flushAgeMs?: number;
  /** Seconds of slack before the access token's `exp` at which it is treated as expired. Default: 30. */
  tokenExpirySkewSeconds?: number;
  /** Shared secret for the token-exchange auto-login. Auto-login is disabled when absent. */
  addonSecret?: string;
}

/** {@link SyncEngineConfig} with every default applied. */
export type ResolvedConfig = Required<Omit<SyncEngineConfig, 'addonSecret'>> & {
  addonSecret: string | null;
};

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_LMS_URL = 'http://localhost:8000';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_SYNC_TIMEOUT_MS = 120_000;
export const DEFAULT_FLUSH_REVIEW_THRESHOLD = 50;
export const DEFAULT_FLUSH_AGE_MS = 10 * 60 * 1000;

function defaultStateDir(): string {
  return join(homedir(), '.lms-sync');
}

/**
 * Strip trailing slashes so endpoint paths can be appended directly.
 *
 * @example
 * normalizeLmsUrl('https://lms.example.com/'); // 'https://lms.example.com'
 */
export function normalizeLmsUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Apply defaults to a partial configuration.
 *
 * @throws {Error} If a threshold or timeout is not a positive number.
 */
export function resolveConfig(config: SyncEngineConfig = {}): ResolvedConfig {
  const stateDir = config.stateDir ?? defaultStateDir();
  const resolved: ResolvedConfig = {
    lmsUrl: normalizeLmsUrl(config.lmsUrl ?? DEFAULT_LMS_URL),
    stateDir,
    decksDir: config.decksDir ?? join(stateDir, 'decks'),
    prefix: config.prefix ?? 'LMS_SYNC',
    requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    syncTimeoutMs: config.syncTimeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS,
    flushReviewThreshold: config.flushReviewThreshold ?? DEFAULT_FLUSH_REVIEW_THRESHOLD,
    flushAgeMs: config.flushAgeMs ?? DEFAULT_FLUSH_AGE_MS,
    tokenExpirySkewSeconds: config.tokenExpirySkewSeconds ?? 30,
    addonSecret: config.addonSecret || null
  };

  const positive: Array<keyof ResolvedConfig> = [
    'requestTimeoutMs',
    'syncTimeoutMs',
    'flushReviewThreshold',
    'flushAgeMs'
  ];
  for (const key of positive) {
    const value = resolved[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid engine config: ${key} must be a positive number`);
    }
  }

  return resolved;
}

/**
 * Build a configuration from environment variables.
 *
 * Reads `LMS_URL`, `LMS_SYNC_STATE_DIR`, `LMS_SYNC_DECKS_DIR` and
 * `LMS_ADDON_SECRET`. Unset variables fall back to the defaults.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SyncEngineConfig {
  return {
    lmsUrl: env.LMS_URL || undefined,
    stateDir: env.LMS_SYNC_STATE_DIR || undefined,
    decksDir: env.LMS_SYNC_DECKS_DIR || undefined,
    addonSecret: env.LMS_ADDON_SECRET || undefined
  };
}
