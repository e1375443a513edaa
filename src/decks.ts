/**
 * @fileoverview Deck Sync Client
 *
 * Keeps locally installed decks at the version the LMS assigns. For every
 * assignment the local version (default 0) is compared with the server's:
 * a deck is downloaded only when `local < server`, so a second run with no
 * server-side change downloads nothing.
 *
 * ## Atomicity
 *
 * A deck moves through download → install → record. The local version and
 * the deck mapping are written only after the installer reports success, so
 * an interrupted download or a failed install leaves both the installed copy
 * and the recorded version as they were; the next trigger simply retries.
 *
 * ## Deck Mappings
 *
 * Reviews are recorded against local deck names. A name maps to an LMS deck
 * id either because the deck was installed from the LMS or because its
 * description carries an `lms_deck_id:<n>` marker (see {@link scanDescriptions}).
 * Subdecks (`Parent::Child`) inherit the mapping of their top-level parent.
 */

import type { LocalStore } from './database';
import { debugLog, debugWarn } from './debug';
import { AuthError, NetworkError, VersionConflictError, extractErrorMessage } from './errors';
import type { DeckInstaller } from './installer';
import type { LmsClient } from './lms/client';
import type { DeckAssignment, LocalDeckInfo } from './types';

// =============================================================================
// Types
// =============================================================================

export interface DeckSyncResult {
  checked: number;
  downloaded: Array<{ lmsDeckId: number; version: number; deckName: string }>;
  upToDate: number[];
  failed: Array<{ lmsDeckId: number; error: unknown }>;
}

// =============================================================================
// Mapping Helpers
// =============================================================================

const DESCRIPTION_MARKER = /lms_deck_id:(\d+)/;

/**
 * Resolve a local deck name to its LMS deck id: exact name first, then the
 * top-level parent of a `Parent::Child` subdeck.
 */
export function resolveLmsDeckId(
  mappings: Record<string, number>,
  deckName: string
): number | null {
  if (Object.prototype.hasOwnProperty.call(mappings, deckName)) {
    return mappings[deckName];
  }
  const separator = deckName.indexOf('::');
  if (separator > 0) {
    const parent = deckName.slice(0, separator);
    if (Object.prototype.hasOwnProperty.call(mappings, parent)) {
      return mappings[parent];
    }
  }
  return null;
}

/** Extract the `lms_deck_id:<n>` marker from a deck description. */
export function extractLmsDeckId(description: string | undefined): number | null {
  if (!description) return null;
  const match = DESCRIPTION_MARKER.exec(description);
  return match ? Number.parseInt(match[1], 10) : null;
}

// =============================================================================
// Deck Sync Client
// =============================================================================

export class DeckSyncClient {
  constructor(
    private readonly client: LmsClient,
    private readonly store: LocalStore,
    private readonly installer: DeckInstaller
  ) {}

  /**
   * Download and install every assigned deck whose server version is newer
   * than the local one.
   *
   * A failure on one deck is logged and reported in the result; the other
   * decks still proceed. An {@link AuthError} aborts the run, since every
   * remaining call would fail the same way.
   *
   * @throws {AuthError} When the session cannot be used.
   * @throws {NetworkError} When the assignment list cannot be fetched.
   */
  async checkAndSync(): Promise<DeckSyncResult> {
    const assignments = await this.client.listAssignments();
    const state = await this.store.getState();
    const result: DeckSyncResult = {
      checked: assignments.length,
      downloaded: [],
      upToDate: [],
      failed: []
    };

    for (const assignment of assignments) {
      const local = state.deckVersions[String(assignment.lmsDeckId)] ?? 0;
      if (!(local < assignment.version)) {
        result.upToDate.push(assignment.lmsDeckId);
        continue;
      }

      debugLog(
        `[DECKS] ${assignment.title} (#${assignment.lmsDeckId}): local v${local} < server v${assignment.version}, downloading`
      );
      try {
        const installed = await this.downloadAndInstall(assignment);
        result.downloaded.push(installed);
      } catch (e) {
        if (e instanceof AuthError) throw e;
        debugWarn(`[DECKS] Deck ${assignment.lmsDeckId} not updated: ${extractErrorMessage(e)}`);
        result.failed.push({ lmsDeckId: assignment.lmsDeckId, error: e });
      }
    }

    return result;
  }

  private async downloadAndInstall(
    assignment: DeckAssignment
  ): Promise<{ lmsDeckId: number; version: number; deckName: string }> {
    const pkg = await this.client.downloadDeck(assignment.lmsDeckId);

    if (pkg.lmsDeckId !== assignment.lmsDeckId) {
      throw new NetworkError(
        `Requested deck ${assignment.lmsDeckId} but the LMS sent deck ${pkg.lmsDeckId}`
      );
    }
    if (pkg.version !== null && pkg.version < assignment.version) {
      throw new VersionConflictError(assignment.lmsDeckId, assignment.version, pkg.version);
    }

    const version = pkg.version ?? assignment.version;
    const deckName = await this.installer.install(assignment, pkg);

    await this.store.updateState((state) => {
      state.deckVersions[String(assignment.lmsDeckId)] = version;
      state.deckMappings[deckName] = assignment.lmsDeckId;
    });
    return { lmsDeckId: assignment.lmsDeckId, version, deckName };
  }

  // ---------------------------------------------------------------------------
  // Mappings
  // ---------------------------------------------------------------------------

  async registerMapping(deckName: string, lmsDeckId: number): Promise<void> {
    await this.store.updateState((state) => {
      state.deckMappings[deckName] = lmsDeckId;
    });
  }

  /**
   * Register every deck whose description carries an `lms_deck_id:<n>` marker.
   *
   * @returns The number of decks registered.
   */
  async scanDescriptions(decks: LocalDeckInfo[]): Promise<number> {
    const found = new Map<string, number>();
    for (const deck of decks) {
      const lmsDeckId = extractLmsDeckId(deck.description);
      if (lmsDeckId !== null) found.set(deck.name, lmsDeckId);
    }
    if (found.size > 0) {
      await this.store.updateState((state) => {
        for (const [name, id] of found) state.deckMappings[name] = id;
      });
    }
    debugLog(`[DECKS] Description scan registered ${found.size} deck(s)`);
    return found.size;
  }
}
