/**
 * @fileoverview Debug Logging Utilities
 *
 * Provides opt-in debug logging gated by an environment flag. When debug
 * mode is enabled (`<PREFIX>_DEBUG_MODE=true`), all debug calls forward to
 * the console. When disabled, they are dropped.
 *
 * The prefix is configurable via {@link _setDebugPrefix} (set by the
 * {@link SyncEngine} constructor) so several hosts sharing one process
 * environment can be toggled independently.
 *
 * @example
 * // Enable debug mode for one run of the CLI:
 * // LMS_SYNC_DEBUG_MODE=true npm run cli -- sync
 *
 * // Or programmatically:
 * import { setDebugMode } from 'lms-deck-sync';
 * setDebugMode(true);
 */

// =============================================================================
// Internal State
// =============================================================================

/** Cached result of the environment check (avoids repeated reads). */
let debugEnabled: boolean | null = null;

/** Configurable prefix for the environment flag (default: `'LMS_SYNC'`). */
let debugPrefix = 'LMS_SYNC';

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Set the prefix used for the debug environment flag.
 *
 * Called internally by the engine constructor. Resets the cached flag so
 * the next check reads the new variable.
 *
 * @param prefix - Application-specific prefix (e.g., `'MYHOST'`).
 * @internal
 */
export function _setDebugPrefix(prefix: string) {
  if (prefix !== debugPrefix) {
    debugPrefix = prefix;
    debugEnabled = null;
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check whether debug mode is currently enabled.
 *
 * Reads `process.env.<PREFIX>_DEBUG_MODE` on the first call and caches the
 * result for subsequent calls.
 */
export function isDebugMode(): boolean {
  if (debugEnabled !== null) return debugEnabled;
  debugEnabled = process.env[`${debugPrefix}_DEBUG_MODE`] === 'true';
  return debugEnabled;
}

/**
 * Enable or disable debug mode at runtime.
 *
 * Only affects the current process; the environment is left untouched.
 */
export function setDebugMode(enabled: boolean) {
  debugEnabled = enabled;
}

/** Log at the `console.log` level. No-op when debug mode is disabled. */
export function debugLog(...args: unknown[]) {
  if (isDebugMode()) console.log(...args);
}

/** Log at the `console.warn` level. No-op when debug mode is disabled. */
export function debugWarn(...args: unknown[]) {
  if (isDebugMode()) console.warn(...args);
}

/** Log at the `console.error` level. No-op when debug mode is disabled. */
export function debugError(...args: unknown[]) {
  if (isDebugMode()) console.error(...args);
}
