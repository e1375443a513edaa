/**
 * @fileoverview Main entry point: `lms-deck-sync`
 *
 * Re-exports the full public API surface:
 *
 * - **Engine**: construct a {@link SyncEngine}, sync, record reviews, tick.
 * - **Configuration**: defaults and environment-based config.
 * - **Building Blocks**: the LMS client, auth manager, deck sync client,
 *   progress cache and uploader, for hosts that compose their own engine.
 * - **Errors**: the LMS error taxonomy and the status-line helpers.
 * - **Reactive Stores**: Svelte-compatible stores for sync and auth state.
 * - **Debug & Utilities**.
 *
 * Subpath entry points (`lms-deck-sync/stores`, `lms-deck-sync/types`) expose
 * focused subsets of this API.
 */

// =============================================================================
//  Engine
// =============================================================================

export { SyncEngine } from './engine';
export type { SyncReport, SyncTrigger, EngineStatus, SyncEngineDeps } from './engine';

// =============================================================================
//  Configuration
// =============================================================================

export {
  resolveConfig,
  configFromEnv,
  normalizeLmsUrl,
  DEFAULT_LMS_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SYNC_TIMEOUT_MS,
  DEFAULT_FLUSH_REVIEW_THRESHOLD,
  DEFAULT_FLUSH_AGE_MS
} from './config';
export type { SyncEngineConfig, ResolvedConfig } from './config';

// =============================================================================
//  Building Blocks
// =============================================================================
// Each piece the engine composes, usable on its own.

export { LmsClient } from './lms/client';
export type { FetchLike, TokenProvider, LmsClientOptions, LoginResult } from './lms/client';
export { AuthManager } from './auth/authManager';
export { Session, decodeJwtExpiry } from './auth/session';
export { DeckSyncClient, resolveLmsDeckId, extractLmsDeckId } from './decks';
export type { DeckSyncResult } from './decks';
export { FileDeckInstaller } from './installer';
export type { DeckInstaller } from './installer';
export { ProgressCache } from './progressCache';
export { ProgressUploader, toReviewWire, batchIdempotencyKey } from './uploader';
export type { FlushResult, FlushReason } from './uploader';
export { LocalStore } from './database';
export type { LocalState } from './database';
export { SyncGate } from './syncGate';

// =============================================================================
//  Errors
// =============================================================================

export {
  LmsError,
  AuthError,
  NetworkError,
  VersionConflictError,
  isTransientError,
  extractErrorMessage,
  parseErrorMessage
} from './errors';

// =============================================================================
//  Reactive Stores
// =============================================================================

export * from './entries/stores';

// =============================================================================
//  Debug & Utilities
// =============================================================================

export { isDebugMode, setDebugMode } from './debug';
export { generateId, now, slugify } from './utils';

// =============================================================================
//  Types
// =============================================================================

export type * from './entries/types';
