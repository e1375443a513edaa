/**
 * Shared Types
 *
 * Wire shapes (snake_case, as the LMS sends them) live next to the local
 * shapes (camelCase) they are converted into. Conversion happens at the
 * HTTP boundary in {@link lms/client.ts}.
 */

// ============================================================
// SESSION TYPES
// ============================================================

/**
 * Lifecycle of the explicit session object:
 * - 'uninitialized': no token pair stored
 * - 'valid': access token usable
 * - 'expired': access token past expiry, refresh token still held
 * - 'invalid': refresh token rejected, re-login required
 */
export type SessionStatus = 'uninitialized' | 'valid' | 'expired' | 'invalid';

export interface StoredTokens {
  accessToken: string;
  refreshToken: string;
  email: string | null;
}

/** User object as the LMS returns it (`id`, `email`, `full_name`, `role`, ...). */
export interface LmsUser {
  [key: string]: unknown;
}

// ============================================================
// DECK TYPES
// ============================================================

/** Assignment entry as returned by `GET /api/anki/my-decks/`. */
export interface DeckAssignmentWire {
  lms_deck_id: number;
  title: string;
  version?: number;
  updated_at?: string | null;
}

export interface DeckAssignment {
  lmsDeckId: number;
  title: string;
  version: number;
  updatedAt: string | null;
}

/** A downloaded deck package, before it is installed. */
export interface DeckPackage {
  lmsDeckId: number;
  /** Version reported by the `X-LMS-Deck-Version` header, or null when absent. */
  version: number | null;
  bytes: Uint8Array;
}

/** A deck as the host application knows it, used for description scans. */
export interface LocalDeckInfo {
  name: string;
  description?: string;
}

// ============================================================
// PROGRESS TYPES
// ============================================================

/** 1 = Again, 2 = Hard, 3 = Good, 4 = Easy */
export type Ease = 1 | 2 | 3 | 4;

export interface ReviewInput {
  /** Name of the local deck the card belongs to (may be a `Parent::Child` subdeck). */
  deckName: string;
  cardId: string | number;
  ease: Ease;
  timeTakenMs: number;
  /** Epoch ms; defaults to the time of recording. */
  reviewedAt?: number;
}

export interface ReviewEvent {
  /** UUID, the server-side deduplication key. */
  eventId: string;
  lmsDeckId: number;
  cardId: string;
  ease: Ease;
  timeTakenMs: number;
  reviewedAt: number;
}

/** One review as sent in `POST /api/anki/progress/`. */
export interface ReviewWire {
  event_id: string;
  card_id: string;
  ease: Ease;
  time: number;
  /** Epoch seconds. */
  timestamp: number;
}

export interface ProgressAck {
  status: string;
  synced_count: number;
  session_id?: number | string;
}

export interface CacheStats {
  totalReviews: number;
  deckCounts: Record<string, number>;
  oldestTimestamp: number | null;
}

/** Flush state machine of the progress uploader. */
export type UploaderState = 'idle' | 'accumulating' | 'flushing';

export type SyncStatus = 'idle' | 'syncing' | 'error';
