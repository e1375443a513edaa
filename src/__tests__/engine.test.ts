import { get } from 'svelte/store';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SyncReport } from '../engine';
import { SyncGate } from '../syncGate';
import { FakeLms, TEST_EMAIL, loggedInEngine, makeEngine, makeTempDir, removeTempDir } from './helpers/fakeLms';

const MY_DECKS = '/api/anki/my-decks/';
const PROGRESS = '/api/anki/progress/';

function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 10));
}

describe('SyncGate', () => {
  it('runs one task at a time and keeps a single follow-up', async () => {
    const gate = new SyncGate<string>();
    const ran: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = gate.run(
      () =>
        new Promise<string>((resolve) => {
          releaseFirst = () => resolve('first');
        }).then((value) => {
          ran.push(value);
          return value;
        })
    );
    const second = gate.run(async () => {
      ran.push('second');
      return 'second';
    });
    const third = gate.run(async () => {
      ran.push('third');
      return 'third';
    });

    expect(gate.busy).toBe(true);
    releaseFirst();

    expect(await first).toBe('first');
    expect(await second).toBe('second');
    expect(await third).toBe('second');
    expect(ran).toEqual(['first', 'second']);
    expect(gate.busy).toBe(false);
  });

  it('lets a higher-priority trigger replace the queued task', async () => {
    const gate = new SyncGate<string>();
    let releaseFirst: () => void = () => undefined;

    const first = gate.run(
      () =>
        new Promise<string>((resolve) => {
          releaseFirst = () => resolve('first');
        })
    );
    const flush = gate.run(async () => 'flush', 0);
    const full = gate.run(async () => 'full', 1);
    releaseFirst();

    expect(await first).toBe('first');
    expect(await flush).toBe('full');
    expect(await full).toBe('full');
  });

  it('stays closed until work held by a finished task settles', async () => {
    const gate = new SyncGate<string>();
    let finishHeld: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      finishHeld = resolve;
    });

    const first = await gate.run(async () => {
      gate.hold(held);
      return 'first';
    });
    const ran: string[] = [];
    const next = gate.run(async () => {
      ran.push('next');
      return 'next';
    });
    await settle();

    expect(first).toBe('first');
    expect(gate.busy).toBe(true);
    expect(ran).toEqual([]);

    finishHeld();
    expect(await next).toBe('next');
    expect(gate.busy).toBe(false);
  });

  it('opens again after a task rejects', async () => {
    const gate = new SyncGate<string>();

    await expect(gate.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await gate.run(async () => 'next')).toBe('next');
  });
});

describe('SyncEngine', () => {
  let lms: FakeLms;
  let dir: string;

  beforeEach(async () => {
    lms = new FakeLms();
    dir = await makeTempDir();
    lms.decks = [{ id: 1, title: 'Kanji N5', version: 1, content: 'kanji' }];
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('serializes concurrent syncs and queues one follow-up', async () => {
    const engine = await loggedInEngine(lms, dir);
    const held = lms.hold(MY_DECKS);

    const first = engine.sync();
    await held.reached;
    const second = engine.sync();
    const third = engine.sync();
    await settle();
    expect(lms.requestsTo(MY_DECKS)).toHaveLength(1);

    held.release();
    const [a, b, c] = await Promise.all([first, second, third]);

    expect(lms.requestsTo(MY_DECKS)).toHaveLength(2);
    expect(b).toBe(c);
    expect(a.decks?.downloaded).toHaveLength(1);
    expect(b.decks?.downloaded).toHaveLength(0);
  });

  it('publishes a successful sync on the status store', async () => {
    const engine = await loggedInEngine(lms, dir);
    await engine.registerDeck('Japanese', 4);
    await engine.recordReview({ deckName: 'Japanese', cardId: 1, ease: 4, timeTakenMs: 1500 });
    await engine.recordReview({ deckName: 'Japanese', cardId: 2, ease: 3, timeTakenMs: 2500 });
    const statuses: string[] = [];
    const unsubscribe = engine.syncStatus.subscribe((state) => {
      if (statuses[statuses.length - 1] !== state.status) statuses.push(state.status);
    });

    await engine.sync();
    unsubscribe();

    const state = get(engine.syncStatus);
    expect(statuses).toEqual(['idle', 'syncing', 'idle']);
    expect(state.syncMessage).toBe('1 deck updated, 2 reviews uploaded');
    expect(state.lastSyncTime).not.toBeNull();
    expect(state.pendingCount).toBe(0);
    expect(state.uploaderState).toBe('idle');
    expect(state.lastError).toBeNull();
  });

  it('reports an unreachable LMS without rejecting', async () => {
    const engine = await loggedInEngine(lms, dir);
    lms.offline = true;

    const report = await engine.sync();

    expect(report.errors).toEqual([
      expect.objectContaining({
        scope: 'decks',
        lmsDeckId: null,
        message: 'Could not reach LMS (GET /api/anki/my-decks/): fetch failed'
      })
    ]);
    expect(report.retryable).toBe(true);
    expect(get(engine.syncStatus).lastError).toBe('Could not reach the LMS. Reviews are kept locally.');
    expect(get(engine.syncStatus).syncErrors).toHaveLength(1);
  });

  it('notifies sync-complete listeners with the report', async () => {
    const engine = await loggedInEngine(lms, dir);
    const listener = vi.fn<(report: SyncReport) => void>();
    const unsubscribe = engine.onSyncComplete(listener);

    const report = await engine.sync();
    unsubscribe();
    await engine.sync();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(report);
  });

  it('describes the session, pending reviews and tracked decks', async () => {
    const engine = await loggedInEngine(lms, dir);
    await engine.sync();
    await engine.registerDeck('Japanese', 4);
    const event = await engine.recordReview({
      deckName: 'Japanese::Kanji',
      cardId: 'c-1',
      ease: 1,
      timeTakenMs: 8000
    });

    const status = await engine.getStatus();

    expect(status).toMatchObject({
      session: 'valid',
      email: TEST_EMAIL,
      lmsUrl: 'http://lms.test',
      pendingReviews: 1,
      pendingByDeck: { '4': 1 },
      oldestPendingAt: event?.reviewedAt,
      uploaderState: 'accumulating',
      trackedDecks: { 'Kanji N5': 1, Japanese: 4 },
      deckVersions: { '1': 1 }
    });
    expect(status.lastSyncTime).not.toBeNull();
  });

  it('keeps later syncs waiting while a timed-out cycle is still uploading', async () => {
    lms.decks = [];
    const engine = await loggedInEngine(lms, dir, { syncTimeoutMs: 50 });
    await engine.registerDeck('Japanese', 4);
    await engine.recordReview({ deckName: 'Japanese', cardId: 1, ease: 3, timeTakenMs: 1000 });
    const held = lms.hold(PROGRESS);

    const first = await engine.sync();

    expect(first.errors).toEqual([
      expect.objectContaining({ scope: 'progress', lmsDeckId: null, message: 'Sync cycle timed out after 0s' })
    ]);
    expect(first.retryable).toBe(true);
    expect(get(engine.syncStatus).status).toBe('error');

    const second = engine.sync();
    await settle();
    expect(lms.requestsTo(MY_DECKS)).toHaveLength(1);

    held.release();
    const report = await second;

    expect(lms.requestsTo(MY_DECKS)).toHaveLength(2);
    expect(lms.batches).toHaveLength(1);
    expect(report.errors).toEqual([]);
    expect(report.progress).toEqual({ acknowledged: 0, syncedCount: 0, remaining: 0, failed: [], skipped: false });
    expect(engine.cache.size).toBe(0);
  });

  it('folds a threshold flush that arrives mid-sync into the one follow-up run', async () => {
    const engine = await loggedInEngine(lms, dir, { flushReviewThreshold: 3 });
    await engine.registerDeck('Japanese', 4);
    await engine.recordReview({ deckName: 'Japanese', cardId: 1, ease: 3, timeTakenMs: 1000 });
    await engine.recordReview({ deckName: 'Japanese', cardId: 2, ease: 3, timeTakenMs: 1000 });
    const held = lms.hold(PROGRESS);

    const first = engine.sync();
    await held.reached;
    const recording = engine.recordReview({ deckName: 'Japanese', cardId: 3, ease: 3, timeTakenMs: 1000 });
    await settle();
    const followUp = engine.sync();
    await settle();
    expect(lms.requestsTo(MY_DECKS)).toHaveLength(1);

    held.release();
    const [, event, report] = await Promise.all([first, recording, followUp]);

    expect(report.trigger).toBe('user');
    expect(lms.requestsTo(MY_DECKS)).toHaveLength(2);
    expect(lms.batches.map((b) => b.reviews.length)).toEqual([2, 1]);
    expect(lms.batches[1].reviews[0].event_id).toBe(event?.eventId);
    expect(engine.cache.size).toBe(0);
  });

  it('keeps every mapping when decks are registered concurrently', async () => {
    const engine = await loggedInEngine(lms, dir);

    await Promise.all([engine.registerDeck('Japanese', 4), engine.registerDeck('Biology', 9)]);

    expect((await engine.getStatus()).trackedDecks).toEqual({ Japanese: 4, Biology: 9 });
  });

  it('checks the LMS saved at login rather than the configured default', async () => {
    await loggedInEngine(lms, dir);
    const restarted = makeEngine(lms, dir, { lmsUrl: 'http://other.test' });

    expect(await restarted.testConnection()).toBe(true);
    expect(lms.requestsTo('/api/').map((r) => r.origin)).toEqual(['http://lms.test']);
    expect((await restarted.getStatus()).lmsUrl).toBe('http://lms.test');
  });

  it('checks the LMS health endpoint', async () => {
    const engine = await loggedInEngine(lms, dir);

    expect(await engine.testConnection()).toBe(true);
    lms.offline = true;
    expect(await engine.testConnection()).toBe(false);
  });
});
