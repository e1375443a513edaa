/**
 * @fileoverview Progress Cache
 *
 * Ordered, persisted list of review events waiting to be uploaded. The study
 * session appends; only the uploader removes, and only the exact event ids
 * the LMS acknowledged. Nothing else mutates the list.
 *
 * ## Data Integrity
 *
 * - Events are immutable once recorded. `eventId` is assigned at record time
 *   and never regenerated, so a retried upload carries the same ids and the
 *   server can drop duplicates.
 * - Removal is by id, never "clear everything": events recorded while an
 *   upload is in flight survive its acknowledgment.
 * - Every mutation is written through to `progress-cache.json` before the
 *   call resolves.
 */

import type { LocalStore } from './database';
import { debugWarn } from './debug';
import type { CacheStats, Ease, ReviewEvent } from './types';

function isEase(value: unknown): value is Ease {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

function isReviewEvent(value: unknown): value is ReviewEvent {
  if (typeof value !== 'object' || value === null) return false;
  const e = value as Record<string, unknown>;
  return (
    typeof e.eventId === 'string' &&
    typeof e.lmsDeckId === 'number' &&
    typeof e.cardId === 'string' &&
    isEase(e.ease) &&
    typeof e.timeTakenMs === 'number' &&
    typeof e.reviewedAt === 'number'
  );
}

function parseCache(raw: unknown): ReviewEvent[] | undefined {
  if (typeof raw !== 'object' || raw === null || !('events' in raw)) return undefined;
  const events = raw.events;
  if (!Array.isArray(events)) return undefined;
  const valid = events.filter(isReviewEvent);
  if (valid.length !== events.length) {
    debugWarn(`[PROGRESS] Dropped ${events.length - valid.length} malformed cached review(s)`);
  }
  return valid;
}

export class ProgressCache {
  private events: ReviewEvent[] = [];
  private loading: Promise<void> | null = null;

  constructor(private readonly store: LocalStore) {}

  /** Load the persisted events. Safe to call repeatedly. */
  load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.store.read('progress-cache', [], parseCache).then((events) => {
        this.events = events;
      });
    }
    return this.loading;
  }

  private persist(): Promise<void> {
    return this.store.write('progress-cache', { events: this.events });
  }

  get size(): number {
    return this.events.length;
  }

  /** Copy of the pending events in recording order. */
  pending(): ReviewEvent[] {
    return [...this.events];
  }

  async append(event: ReviewEvent): Promise<void> {
    await this.load();
    this.events.push(event);
    await this.persist();
  }

  /**
   * Remove acknowledged events.
   *
   * @returns How many events were removed.
   */
  async remove(eventIds: Iterable<string>): Promise<number> {
    await this.load();
    const ids = new Set(eventIds);
    const before = this.events.length;
    this.events = this.events.filter((e) => !ids.has(e.eventId));
    const removed = before - this.events.length;
    if (removed > 0) await this.persist();
    return removed;
  }

  /** `reviewedAt` of the oldest pending event, or null when empty. */
  oldestTimestamp(): number | null {
    let oldest: number | null = null;
    for (const e of this.events) {
      if (oldest === null || e.reviewedAt < oldest) oldest = e.reviewedAt;
    }
    return oldest;
  }

  /** Pending events grouped by LMS deck, decks in order of their first pending event. */
  groupByDeck(): Map<number, ReviewEvent[]> {
    const groups = new Map<number, ReviewEvent[]>();
    for (const e of this.events) {
      const group = groups.get(e.lmsDeckId);
      if (group) group.push(e);
      else groups.set(e.lmsDeckId, [e]);
    }
    return groups;
  }

  stats(): CacheStats {
    const deckCounts: Record<string, number> = {};
    for (const e of this.events) {
      const key = String(e.lmsDeckId);
      deckCounts[key] = (deckCounts[key] ?? 0) + 1;
    }
    return {
      totalReviews: this.events.length,
      deckCounts,
      oldestTimestamp: this.oldestTimestamp()
    };
  }
}
