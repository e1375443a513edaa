/**
 * @fileoverview Sync Engine
 *
 * Composition root for the add-on. One {@link SyncEngine} owns:
 *   - the {@link LocalStore} holding tokens, deck state and the progress cache
 *   - the {@link LmsClient} and the {@link AuthManager} that feeds it tokens
 *   - the {@link DeckSyncClient} (server → local deck versions)
 *   - the {@link ProgressUploader} (local reviews → server)
 *   - the svelte stores a host UI subscribes to
 *
 * ## Triggers
 *
 * | Trigger                  | Entry point                     | Work                 |
 * |--------------------------|---------------------------------|----------------------|
 * | explicit sync            | {@link SyncEngine.sync}         | decks, then progress |
 * | review count threshold   | {@link SyncEngine.recordReview} | progress             |
 * | oldest-review age        | {@link SyncEngine.tick}         | progress             |
 *
 * Every trigger goes through one {@link SyncGate}, so cycles never overlap;
 * a trigger during a cycle queues one follow-up. Each cycle is bounded by
 * `syncTimeoutMs`.
 *
 * ## Failure Model
 *
 * Trigger entry points never reject. Failures are returned in the
 * {@link SyncReport} and published on {@link SyncEngine.syncStatus}; nothing
 * that was not acknowledged by the LMS is lost, and the next trigger retries.
 */

import { get } from 'svelte/store';
import { AuthManager } from './auth/authManager';
import { resolveConfig, type ResolvedConfig, type SyncEngineConfig } from './config';
import { LocalStore } from './database';
import { _setDebugPrefix, debugError, debugLog, debugWarn } from './debug';
import { DeckSyncClient, type DeckSyncResult } from './decks';
import { AuthError, LmsError, extractErrorMessage, isTransientError, parseErrorMessage } from './errors';
import { FileDeckInstaller, type DeckInstaller } from './installer';
import { LmsClient, type FetchLike } from './lms/client';
import { ProgressCache } from './progressCache';
import { createAuthStateStore } from './stores/authState';
import { createSyncStatusStore, type SyncError } from './stores/sync';
import { SyncGate } from './syncGate';
import type {
  LmsUser,
  LocalDeckInfo,
  ReviewEvent,
  ReviewInput,
  SessionStatus,
  UploaderState
} from './types';
import { ProgressUploader, type FlushReason, type FlushResult } from './uploader';
import { now, withTimeout } from './utils';

// =============================================================================
// Types
// =============================================================================

export type SyncTrigger = 'user' | FlushReason;

export interface SyncReport {
  trigger: SyncTrigger;
  /** `false` when the trigger found nothing to do by the time it ran. */
  ran: boolean;
  decks: DeckSyncResult | null;
  progress: FlushResult | null;
  errors: SyncError[];
  /** Whether every failure in `errors` is worth retrying on the next trigger. */
  retryable: boolean;
  durationMs: number;
}

export interface EngineStatus {
  session: SessionStatus;
  email: string | null;
  lmsUrl: string;
  pendingReviews: number;
  pendingByDeck: Record<string, number>;
  oldestPendingAt: number | null;
  uploaderState: UploaderState;
  trackedDecks: Record<string, number>;
  deckVersions: Record<string, number>;
  lastSyncTime: string | null;
}

export interface SyncEngineDeps {
  /** Replaces the global `fetch` for every LMS call. */
  fetch?: FetchLike;
  /** Replaces the default file-drop installer. */
  installer?: DeckInstaller;
}

const PRIORITY_FLUSH = 0;
const FLUSH_BUSY_MESSAGE = 'A progress upload is already running';
const PRIORITY_FULL_SYNC = 1;

// =============================================================================
// Engine
// =============================================================================

export class SyncEngine {
  readonly config: ResolvedConfig;
  readonly store: LocalStore;
  readonly client: LmsClient;
  readonly auth: AuthManager;
  readonly decks: DeckSyncClient;
  readonly cache: ProgressCache;
  readonly uploader: ProgressUploader;

  readonly syncStatus = createSyncStatusStore();
  readonly authState = createAuthStateStore();

  private readonly gate = new SyncGate<SyncReport>();
  private readonly syncCompleteCallbacks = new Set<(report: SyncReport) => void>();
  private starting: Promise<SessionStatus> | null = null;

  constructor(config: SyncEngineConfig = {}, deps: SyncEngineDeps = {}) {
    this.config = resolveConfig(config);
    _setDebugPrefix(this.config.prefix);

    this.store = new LocalStore(this.config.stateDir);
    this.client = new LmsClient({
      baseUrl: () => this.auth.lmsUrl,
      timeoutMs: this.config.requestTimeoutMs,
      fetch: deps.fetch
    });
    this.auth = new AuthManager(this.client, this.store, this.config, this.authState);
    this.client.useTokens(this.auth);

    this.decks = new DeckSyncClient(
      this.client,
      this.store,
      deps.installer ?? new FileDeckInstaller(this.config.decksDir)
    );
    this.cache = new ProgressCache(this.store);
    this.uploader = new ProgressUploader(this.cache, this.client, this.store, {
      flushReviewThreshold: this.config.flushReviewThreshold,
      flushAgeMs: this.config.flushAgeMs,
      onStateChange: (state) => this.syncStatus.setUploaderState(state)
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Restore the persisted session and progress cache. Every other entry
   * point calls this first, so calling it explicitly is optional.
   */
  start(): Promise<SessionStatus> {
    if (!this.starting) {
      this.starting = (async () => {
        const status = await this.auth.restore();
        await this.uploader.load();
        this.syncStatus.setPendingCount(this.cache.size);
        debugLog(`[SYNC] Engine started: session ${status}, ${this.cache.size} pending review(s)`);
        return status;
      })();
    }
    return this.starting;
  }

  /** Register a callback fired after each cycle that reached the LMS. */
  onSyncComplete(callback: (report: SyncReport) => void): () => void {
    this.syncCompleteCallbacks.add(callback);
    return () => {
      this.syncCompleteCallbacks.delete(callback);
    };
  }

  private notifySyncComplete(report: SyncReport): void {
    for (const callback of this.syncCompleteCallbacks) {
      try {
        callback(report);
      } catch (e) {
        debugError('[SYNC] Sync callback error:', e);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Authentication
  // ---------------------------------------------------------------------------

  async login(url: string, email: string, password: string): Promise<LmsUser> {
    await this.start();
    return this.auth.login(url, email, password);
  }

  async autoLogin(email: string): Promise<LmsUser | null> {
    await this.start();
    return this.auth.autoLogin(email);
  }

  /** Log out. Pending reviews stay cached for the next login. */
  async logout(): Promise<void> {
    await this.start();
    await this.auth.logout();
  }

  /** Health-check the LMS the persisted session points at. */
  async testConnection(): Promise<boolean> {
    await this.start();
    return this.client.testConnection();
  }

  // ---------------------------------------------------------------------------
  // Triggers
  // ---------------------------------------------------------------------------

  /** Explicit sync: refresh assigned decks, then upload every pending review. */
  async sync(): Promise<SyncReport> {
    await this.start();
    return this.gate.run(() => this.runFullSync(), PRIORITY_FULL_SYNC);
  }

  /**
   * Record one review. When it brings the cache to the count threshold (or
   * the oldest pending review is past the age threshold), the flush runs
   * before this resolves.
   *
   * @returns The cached event, or `null` for a deck that is not linked to the LMS.
   * @throws {RangeError} On an invalid ease or duration.
   */
  async recordReview(input: ReviewInput): Promise<ReviewEvent | null> {
    await this.start();
    const event = await this.uploader.record(input);
    this.syncStatus.setPendingCount(this.cache.size);
    if (!event) return null;

    const reason = this.uploader.shouldFlush();
    if (reason) {
      debugLog(`[SYNC] Flush threshold reached (${reason})`);
      await this.gate.run(() => this.runThresholdFlush(reason), PRIORITY_FLUSH);
    }
    return event;
  }

  /**
   * Periodic check for the age threshold. The host calls this on its own
   * timer (the CLI on demand).
   *
   * @returns The report of the flush it ran, or `null` when none was due.
   */
  async tick(nowMs: number = Date.now()): Promise<SyncReport | null> {
    await this.start();
    const reason = this.uploader.shouldFlush(nowMs);
    if (!reason) return null;
    return this.gate.run(() => this.runThresholdFlush(reason, nowMs), PRIORITY_FLUSH);
  }

  // ---------------------------------------------------------------------------
  // Deck Mappings
  // ---------------------------------------------------------------------------

  async scanDecks(decks: LocalDeckInfo[]): Promise<number> {
    await this.start();
    return this.decks.scanDescriptions(decks);
  }

  async registerDeck(deckName: string, lmsDeckId: number): Promise<void> {
    await this.start();
    await this.decks.registerMapping(deckName, lmsDeckId);
  }

  async getStatus(): Promise<EngineStatus> {
    await this.start();
    const state = await this.store.getState();
    const stats = this.cache.stats();
    return {
      session: this.auth.status,
      email: this.auth.session.email ?? state.userEmail,
      lmsUrl: this.auth.lmsUrl,
      pendingReviews: stats.totalReviews,
      pendingByDeck: stats.deckCounts,
      oldestPendingAt: stats.oldestTimestamp,
      uploaderState: this.uploader.state,
      trackedDecks: { ...state.deckMappings },
      deckVersions: { ...state.deckVersions },
      lastSyncTime: get(this.syncStatus).lastSyncTime
    };
  }

  // ---------------------------------------------------------------------------
  // Cycles
  // ---------------------------------------------------------------------------

  private async runFullSync(): Promise<SyncReport> {
    const startedAt = Date.now();
    const errors: SyncError[] = [];
    const failures: unknown[] = [];
    let reported = false;
    const fail = (scope: SyncError['scope'], lmsDeckId: number | null, error: unknown) => {
      if (reported) {
        debugWarn(`[SYNC] Failure after the cycle timed out: ${extractErrorMessage(error)}`);
        return;
      }
      failures.push(error);
      errors.push({ scope, lmsDeckId, message: extractErrorMessage(error), timestamp: now() });
    };

    this.syncStatus.setStatus('syncing');
    this.syncStatus.setSyncMessage('Checking assigned decks...');
    debugLog('[SYNC] Full sync started');

    let decks: DeckSyncResult | null = null;
    let progress: FlushResult | null = null;
    // A timed-out cycle keeps its requests in flight; the gate waits for it
    const cycle = this.fullCycle(fail);
    this.gate.hold(cycle);
    try {
      const outcome = await withTimeout(cycle, this.config.syncTimeoutMs, 'Sync cycle');
      decks = outcome.decks;
      progress = outcome.progress;
    } catch (e) {
      fail(e instanceof AuthError ? 'auth' : 'progress', null, e);
    }
    reported = true;

    const report = this.finishReport('user', true, decks, progress, errors, failures, startedAt);
    this.syncStatus.setPendingCount(this.cache.size);

    if (errors.length === 0) {
      this.syncStatus.setStatus('idle');
      this.syncStatus.setSyncMessage(summarize(decks, progress));
      this.syncStatus.setLastSyncTime(now());
    } else {
      this.syncStatus.setStatus('error');
      this.syncStatus.setError(parseErrorMessage(failures[0]), errors[0].message);
      for (const error of errors) this.syncStatus.addSyncError(error);
      this.syncStatus.setSyncMessage(null);
      debugWarn(`[SYNC] Full sync finished with ${errors.length} error(s)`);
    }

    if (decks || progress) this.notifySyncComplete(report);
    return report;
  }

  private async fullCycle(
    fail: (scope: SyncError['scope'], lmsDeckId: number | null, error: unknown) => void
  ): Promise<{ decks: DeckSyncResult | null; progress: FlushResult | null }> {
    await this.auth.ensureValidToken();

    let decks: DeckSyncResult | null = null;
    try {
      decks = await this.decks.checkAndSync();
      for (const failure of decks.failed) fail('decks', failure.lmsDeckId, failure.error);
    } catch (e) {
      if (e instanceof AuthError) throw e;
      // Reviews still go up when the assignment list is unavailable
      fail('decks', null, e);
    }

    this.syncStatus.setSyncMessage('Uploading reviews...');
    const progress = await this.uploader.flush();
    for (const failure of progress.failed) {
      fail(failure.error instanceof AuthError ? 'auth' : 'progress', failure.lmsDeckId, failure.error);
    }
    if (progress.skipped) fail('progress', null, new LmsError(FLUSH_BUSY_MESSAGE));
    return { decks, progress };
  }

  /**
   * Threshold-triggered upload. Quieter than a full sync: it does not flip
   * the status to `syncing`, only records errors.
   */
  private async runThresholdFlush(reason: FlushReason, nowMs?: number): Promise<SyncReport> {
    const startedAt = Date.now();
    const errors: SyncError[] = [];
    const failures: unknown[] = [];

    // An earlier run may already have drained what this trigger saw
    if (!this.uploader.shouldFlush(nowMs ?? Date.now())) {
      return this.finishReport(reason, false, null, null, errors, failures, startedAt);
    }

    let progress: FlushResult | null = null;
    const upload = this.auth.ensureValidToken().then(() => this.uploader.flush());
    this.gate.hold(upload);
    try {
      progress = await withTimeout(upload, this.config.syncTimeoutMs, 'Progress upload');
      if (progress.skipped) throw new LmsError(FLUSH_BUSY_MESSAGE);
      for (const failure of progress.failed) {
        failures.push(failure.error);
        errors.push({
          scope: failure.error instanceof AuthError ? 'auth' : 'progress',
          lmsDeckId: failure.lmsDeckId,
          message: extractErrorMessage(failure.error),
          timestamp: now()
        });
      }
    } catch (e) {
      failures.push(e);
      errors.push({
        scope: e instanceof AuthError ? 'auth' : 'progress',
        lmsDeckId: null,
        message: extractErrorMessage(e),
        timestamp: now()
      });
    }

    const report = this.finishReport(reason, true, null, progress, errors, failures, startedAt);
    this.syncStatus.setPendingCount(this.cache.size);
    if (errors.length > 0) {
      this.syncStatus.setError(parseErrorMessage(failures[0]), errors[0].message);
      for (const error of errors) this.syncStatus.addSyncError(error);
    } else if (progress && progress.acknowledged > 0) {
      this.syncStatus.setLastSyncTime(now());
    }
    if (progress) this.notifySyncComplete(report);
    return report;
  }

  private finishReport(
    trigger: SyncTrigger,
    ran: boolean,
    decks: DeckSyncResult | null,
    progress: FlushResult | null,
    errors: SyncError[],
    failures: unknown[],
    startedAt: number
  ): SyncReport {
    const report: SyncReport = {
      trigger,
      ran,
      decks,
      progress,
      errors,
      retryable: failures.every((f) => isTransientError(f)),
      durationMs: Date.now() - startedAt
    };
    debugLog(
      `[SYNC] ${trigger} cycle done in ${report.durationMs}ms: ` +
        `${decks?.downloaded.length ?? 0} deck(s) updated, ` +
        `${progress?.acknowledged ?? 0} review(s) uploaded, ${errors.length} error(s)`
    );
    return report;
  }
}

function summarize(decks: DeckSyncResult | null, progress: FlushResult | null): string {
  const updated = decks?.downloaded.length ?? 0;
  const uploaded = progress?.acknowledged ?? 0;
  if (updated === 0 && uploaded === 0) return 'Everything is up to date.';
  const parts: string[] = [];
  if (updated > 0) parts.push(`${updated} deck${updated === 1 ? '' : 's'} updated`);
  if (uploaded > 0) parts.push(`${uploaded} review${uploaded === 1 ? '' : 's'} uploaded`);
  return parts.join(', ');
}
