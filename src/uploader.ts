/**
 * @fileoverview Progress Uploader
 *
 * Records reviews into the {@link ProgressCache} and flushes them to the LMS.
 *
 * ## State Machine
 *
 *   idle ──record──▶ accumulating ──flush──▶ flushing ──▶ idle          (cache empty)
 *                          ▲                      │
 *                          └──────────────────────┘                     (anything left)
 *
 * A flush is due when the cache holds at least `flushReviewThreshold`
 * events or the oldest pending event is at least `flushAgeMs` old
 * ({@link shouldFlush}); an explicit sync flushes regardless.
 *
 * ## Upload Batches
 *
 * The LMS takes progress one deck at a time, so a flush sends one batch per
 * deck. Each batch is all-or-nothing: a 2xx acknowledgment removes exactly
 * that batch's event ids from the cache, anything else leaves it untouched
 * for the next trigger. Every review carries its `event_id` and every batch
 * an `Idempotency-Key` derived from its ids, so a batch the server stored
 * but whose acknowledgment was lost is recognised when it comes again.
 */

import { hashValue } from './auth/crypto';
import type { LocalStore } from './database';
import { resolveLmsDeckId } from './decks';
import { debugLog, debugWarn } from './debug';
import { AuthError, extractErrorMessage } from './errors';
import type { LmsClient } from './lms/client';
import type { ProgressCache } from './progressCache';
import type { ReviewEvent, ReviewInput, ReviewWire, UploaderState } from './types';
import { generateId } from './utils';

export type FlushReason = 'count' | 'age';

export interface FlushResult {
  /** Events acknowledged by the LMS and removed from the cache. */
  acknowledged: number;
  /** Sum of the `synced_count` values the LMS reported. */
  syncedCount: number;
  /** Events still pending after the flush. */
  remaining: number;
  failed: Array<{ lmsDeckId: number; error: unknown }>;
  /** `true` when another flush was already running and this one sent nothing. */
  skipped: boolean;
}

export interface UploaderOptions {
  flushReviewThreshold: number;
  flushAgeMs: number;
  onStateChange?: (state: UploaderState) => void;
}

export function toReviewWire(event: ReviewEvent): ReviewWire {
  return {
    event_id: event.eventId,
    card_id: event.cardId,
    ease: event.ease,
    time: event.timeTakenMs,
    timestamp: event.reviewedAt / 1000
  };
}

/** Deterministic key for a batch: the same events always produce the same key. */
export function batchIdempotencyKey(events: ReviewEvent[]): Promise<string> {
  return hashValue(events.map((e) => e.eventId).join(','));
}

export class ProgressUploader {
  private current: UploaderState = 'idle';

  constructor(
    private readonly cache: ProgressCache,
    private readonly client: LmsClient,
    private readonly store: LocalStore,
    private readonly options: UploaderOptions
  ) {}

  get state(): UploaderState {
    return this.current;
  }

  private setState(state: UploaderState): void {
    if (state === this.current) return;
    debugLog(`[PROGRESS] ${this.current} -> ${state}`);
    this.current = state;
    this.options.onStateChange?.(state);
  }

  /** Align the state with a cache loaded from disk. */
  async load(): Promise<void> {
    await this.cache.load();
    if (this.current !== 'flushing') {
      this.setState(this.cache.size > 0 ? 'accumulating' : 'idle');
    }
  }

  /**
   * Record one review.
   *
   * @returns The cached event, or `null` when the deck is not an LMS deck.
   * @throws {RangeError} On an ease outside 1..4 or a negative duration.
   */
  async record(input: ReviewInput): Promise<ReviewEvent | null> {
    if (!Number.isInteger(input.ease) || input.ease < 1 || input.ease > 4) {
      throw new RangeError(`Invalid ease ${input.ease}; expected 1 (Again) to 4 (Easy)`);
    }
    if (!Number.isFinite(input.timeTakenMs) || input.timeTakenMs < 0) {
      throw new RangeError(`Invalid review duration ${input.timeTakenMs}`);
    }

    const { deckMappings } = await this.store.getState();
    const lmsDeckId = resolveLmsDeckId(deckMappings, input.deckName);
    if (lmsDeckId === null) {
      debugLog(`[PROGRESS] Ignoring review in non-LMS deck "${input.deckName}"`);
      return null;
    }

    const event: ReviewEvent = {
      eventId: generateId(),
      lmsDeckId,
      cardId: String(input.cardId),
      ease: input.ease,
      timeTakenMs: Math.round(input.timeTakenMs),
      reviewedAt: input.reviewedAt ?? Date.now()
    };
    await this.cache.append(event);
    if (this.current === 'idle') this.setState('accumulating');
    return event;
  }

  /** Which threshold, if any, makes a flush due at `nowMs`. */
  shouldFlush(nowMs: number = Date.now()): FlushReason | null {
    if (this.cache.size === 0) return null;
    if (this.cache.size >= this.options.flushReviewThreshold) return 'count';
    const oldest = this.cache.oldestTimestamp();
    if (oldest !== null && nowMs - oldest >= this.options.flushAgeMs) return 'age';
    return null;
  }

  /**
   * Upload every pending event, one batch per deck.
   *
   * Never rejects for upload failures: they are returned in `failed` and the
   * affected events stay cached. An {@link AuthError} stops the remaining
   * batches, since they would be refused the same way. A call made while
   * another flush is running sends nothing and comes back with `skipped`.
   */
  async flush(): Promise<FlushResult> {
    await this.cache.load();
    const result: FlushResult = {
      acknowledged: 0,
      syncedCount: 0,
      remaining: this.cache.size,
      failed: [],
      skipped: false
    };
    if (this.current === 'flushing') {
      debugWarn('[PROGRESS] Flush requested while another flush is running');
      result.skipped = true;
      return result;
    }
    if (this.cache.size === 0) {
      this.setState('idle');
      return result;
    }

    this.setState('flushing');
    try {
      for (const [lmsDeckId, events] of this.cache.groupByDeck()) {
        try {
          const key = await batchIdempotencyKey(events);
          const ack = await this.client.submitProgress(lmsDeckId, events.map(toReviewWire), key);
          const removed = await this.cache.remove(events.map((e) => e.eventId));
          result.acknowledged += removed;
          result.syncedCount += ack.synced_count;
          debugLog(`[PROGRESS] Deck ${lmsDeckId}: ${removed} review(s) acknowledged (${ack.status})`);
        } catch (e) {
          debugWarn(`[PROGRESS] Deck ${lmsDeckId}: upload failed, keeping ${events.length} review(s): ${extractErrorMessage(e)}`);
          result.failed.push({ lmsDeckId, error: e });
          if (e instanceof AuthError) break;
        }
      }
    } finally {
      result.remaining = this.cache.size;
      this.setState(this.cache.size === 0 ? 'idle' : 'accumulating');
    }
    return result;
  }
}
