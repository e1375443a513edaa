/**
 * In-process sync gate.
 *
 * At most one sync run is in flight. A trigger that arrives while a run is
 * in flight is not dropped: it becomes the single queued follow-up, and any
 * further triggers before that follow-up starts join it. A trigger with a
 * higher priority (an explicit sync over a threshold flush) replaces the
 * queued task, so the follow-up always does the most complete work asked of it.
 *
 * A task may hand work that outlives it to {@link SyncGate.hold} (a cycle
 * that timed out but still has requests in flight). The gate stays closed
 * until that work settles as well.
 */

import { debugLog } from './debug';

interface QueuedRun<R> {
  task: () => Promise<R>;
  priority: number;
  promise: Promise<R>;
}

export class SyncGate<R> {
  // Resolves once the current run and everything it held have settled
  private running: Promise<void> | null = null;
  private queued: QueuedRun<R> | null = null;
  private held: Array<Promise<unknown>> = [];

  get busy(): boolean {
    return this.running !== null || this.queued !== null;
  }

  run(task: () => Promise<R>, priority = 0): Promise<R> {
    if (this.queued) {
      if (priority > this.queued.priority) {
        this.queued.task = task;
        this.queued.priority = priority;
      }
      debugLog('[SYNC] Trigger joined the queued follow-up run');
      return this.queued.promise;
    }

    if (!this.running) return this.start(task);

    const settled = this.running;
    const queued: QueuedRun<R> = {
      task,
      priority,
      promise: settled.then(() => {
        this.queued = null;
        return this.start(queued.task);
      })
    };
    this.queued = queued;
    debugLog('[SYNC] Run in flight, queued one follow-up');
    return queued.promise;
  }

  /** Keep the gate closed until `work` settles, even after the current task returns. */
  hold(work: Promise<unknown>): void {
    this.held.push(work);
  }

  private start(task: () => Promise<R>): Promise<R> {
    const run = (async () => task())();
    const release = (): void | Promise<void> => {
      if (this.held.length > 0) {
        const pending = this.held;
        this.held = [];
        debugLog(`[SYNC] Waiting for ${pending.length} outlived run(s) before opening the gate`);
        return Promise.allSettled(pending).then(release);
      }
      if (this.running === closed) this.running = null;
    };
    const closed: Promise<void> = run.then(release, release);
    this.running = closed;
    return run;
  }
}
