/**
 * @fileoverview Types subpath barrel: `lms-deck-sync/types`
 *
 * Aggregates the public type exports into a single entry point. No runtime
 * code is emitted from this file.
 */

// =============================================================================
//  Session
// =============================================================================

export type { SessionStatus, StoredTokens, LmsUser } from '../types';

// =============================================================================
//  Decks
// =============================================================================
// - `DeckAssignmentWire`: one entry of `GET /api/anki/my-decks/` as sent.
// - `DeckAssignment`: the same, in local field names.
// - `DeckPackage`: a downloaded deck and the id/version headers it came with.
// - `LocalDeckInfo`: a host deck offered to the description scan.

export type { DeckAssignmentWire, DeckAssignment, DeckPackage, LocalDeckInfo } from '../types';

// =============================================================================
//  Progress
// =============================================================================

export type {
  Ease,
  ReviewInput,
  ReviewEvent,
  ReviewWire,
  ProgressAck,
  CacheStats,
  UploaderState,
  SyncStatus
} from '../types';
