/**
 * @fileoverview Stores subpath barrel: `lms-deck-sync/stores`
 *
 * Store factories behind {@link SyncEngine.syncStatus} and
 * {@link SyncEngine.authState}. All follow the Svelte store contract
 * (subscribe/unsubscribe), so a Svelte host can use `$store` syntax and any
 * other host can call `subscribe` directly.
 */

// =============================================================================
//  Sync Status Store
// =============================================================================
// Whether a sync is running or failed, the number of pending reviews, the
// uploader state, the last friendly and raw error, and the last sync time.

export { createSyncStatusStore } from '../stores/sync';
export type { SyncError, SyncState, SyncStatusStore } from '../stores/sync';

// =============================================================================
//  Auth State Store
// =============================================================================
// Session lifecycle, the logged-in email and LMS URL, and the message shown
// when the user has to log in again.

export { createAuthStateStore, isAuthenticated } from '../stores/authState';
export type { AuthState, AuthStateStore } from '../stores/authState';
