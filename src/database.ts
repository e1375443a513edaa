/**
 * @fileoverview Local Persistence
 *
 * File-backed JSON documents that survive application restarts. Each
 * document is a single file in the configured state directory:
 *
 * - `tokens.json`: the session's token pair (see {@link auth/tokenStore.ts})
 * - `state.json`: LMS URL, user email, deck versions and deck mappings
 * - `progress-cache.json`: pending review events
 *
 * Writes go to a unique temporary file in the same directory and are then
 * renamed over the target, so a crash mid-write leaves the previous version
 * intact. Writes to the same document are chained so a slow earlier write
 * can never land after a later one.
 *
 * Recovery strategy:
 *   A document that fails to parse is moved aside to
 *   `<name>.corrupt-<timestamp>` and the caller's fallback is used, so one
 *   damaged file never blocks startup and its contents stay available for
 *   inspection.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { debugWarn } from './debug';
import { generateId } from './utils';

// =============================================================================
// Types
// =============================================================================

export type DocumentName = 'tokens' | 'state' | 'progress-cache';

export interface LocalState {
  lmsUrl: string | null;
  userEmail: string | null;
  /** `lmsDeckId` (as string key) → locally installed version. */
  deckVersions: Record<string, number>;
  /** Local deck name → `lmsDeckId`. */
  deckMappings: Record<string, number>;
}

export function emptyState(): LocalState {
  return { lmsUrl: null, userEmail: null, deckVersions: {}, deckMappings: {} };
}

// =============================================================================
// Validation Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberRecord(value: unknown): Record<string, number> {
  const out: Record<string, number> = {};
  if (!isRecord(value)) return out;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'number' && Number.isFinite(entry)) out[key] = entry;
  }
  return out;
}

function parseState(raw: unknown): LocalState | undefined {
  if (!isRecord(raw)) return undefined;
  return {
    lmsUrl: typeof raw.lmsUrl === 'string' ? raw.lmsUrl : null,
    userEmail: typeof raw.userEmail === 'string' ? raw.userEmail : null,
    deckVersions: numberRecord(raw.deckVersions),
    deckMappings: numberRecord(raw.deckMappings)
  };
}

// =============================================================================
// Local Store
// =============================================================================

export class LocalStore {
  private readonly writeChains = new Map<DocumentName, Promise<void>>();
  private stateUpdates: Promise<unknown> = Promise.resolve();
  private dirReady: Promise<void> | null = null;

  constructor(readonly dir: string) {}

  private pathFor(doc: DocumentName): string {
    return join(this.dir, `${doc}.json`);
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = mkdir(this.dir, { recursive: true }).then(() => undefined);
    }
    return this.dirReady;
  }

  /**
   * Read a document.
   *
   * @param parse - Converts the parsed JSON into the typed shape, returning
   *                undefined when the shape is wrong.
   * @returns The parsed document, or `fallback` when the file is missing or unreadable.
   */
  async read<T>(doc: DocumentName, fallback: T, parse: (raw: unknown) => T | undefined): Promise<T> {
    const path = this.pathFor(doc);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (e) {
      if (isMissingFile(e)) return fallback;
      throw e;
    }

    let parsed: T | undefined;
    try {
      parsed = parse(JSON.parse(text));
    } catch (e) {
      debugWarn(`[STORE] ${doc}.json is not valid JSON:`, e);
    }
    if (parsed === undefined) {
      const aside = `${path}.corrupt-${Date.now()}`;
      debugWarn(`[STORE] Moving unreadable ${doc}.json aside to ${aside}`);
      await rename(path, aside);
      return fallback;
    }
    return parsed;
  }

  /** Atomically replace a document (temp file + rename). */
  write(doc: DocumentName, value: unknown): Promise<void> {
    const previous = this.writeChains.get(doc) ?? Promise.resolve();
    const next = previous
      .catch(() => undefined)
      .then(async () => {
        await this.ensureDir();
        const target = this.pathFor(doc);
        const temp = `${target}.${generateId()}.tmp`;
        await writeFile(temp, JSON.stringify(value, null, 2), 'utf-8');
        await rename(temp, target);
      });
    this.writeChains.set(doc, next);
    return next;
  }

  /**
   * Delete a document. With `overwrite`, its contents are first replaced by
   * an empty object so the secret does not linger if the unlink fails.
   */
  async remove(doc: DocumentName, overwrite = false): Promise<void> {
    if (overwrite) {
      await this.write(doc, {});
    } else {
      await (this.writeChains.get(doc) ?? Promise.resolve()).catch(() => undefined);
    }
    await rm(this.pathFor(doc), { force: true });
  }

  // ---------------------------------------------------------------------------
  // state.json
  // ---------------------------------------------------------------------------

  getState(): Promise<LocalState> {
    return this.read('state', emptyState(), parseState);
  }

  /**
   * Read-modify-write `state.json`. Updates run one after another, so each
   * one sees the result of the previous.
   *
   * @param mutate - Receives a copy of the current state and edits it in place.
   * @returns The state as written.
   */
  updateState(mutate: (state: LocalState) => void): Promise<LocalState> {
    const next = this.stateUpdates
      .catch(() => undefined)
      .then(async () => {
        const state = await this.getState();
        mutate(state);
        await this.write('state', state);
        return state;
      });
    this.stateUpdates = next;
    return next;
  }
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}
