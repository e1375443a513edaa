/**
 * Deck installation.
 *
 * The flashcard application that finally imports a deck is a host concern,
 * so installation sits behind {@link DeckInstaller}. The default
 * {@link FileDeckInstaller} drops each package into a directory the host
 * watches or imports from.
 */

import { mkdir, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { debugLog, debugWarn } from './debug';
import type { DeckAssignment, DeckPackage } from './types';
import { generateId, slugify } from './utils';

export interface DeckInstaller {
  /**
   * Install a fully downloaded package. Must leave the previously installed
   * copy untouched when it fails.
   *
   * @returns The local deck name reviews for this deck will be recorded under.
   */
  install(assignment: DeckAssignment, pkg: DeckPackage): Promise<string>;
}

export class FileDeckInstaller implements DeckInstaller {
  constructor(private readonly decksDir: string) {}

  fileNameFor(assignment: DeckAssignment): string {
    return `${assignment.lmsDeckId}-${slugify(assignment.title)}.apkg`;
  }

  async install(assignment: DeckAssignment, pkg: DeckPackage): Promise<string> {
    await mkdir(this.decksDir, { recursive: true });
    const fileName = this.fileNameFor(assignment);
    const target = join(this.decksDir, fileName);
    const partial = `${target}.${generateId()}.partial`;

    try {
      await writeFile(partial, pkg.bytes);
      await rename(partial, target);
    } catch (e) {
      await rm(partial, { force: true });
      throw e;
    }
    debugLog(`[DECKS] Installed ${fileName} (${pkg.bytes.byteLength} bytes)`);

    // A renamed deck leaves its old file behind under a different slug
    const prefix = `${assignment.lmsDeckId}-`;
    for (const entry of await readdir(this.decksDir)) {
      if (entry !== fileName && entry.startsWith(prefix) && entry.endsWith('.apkg')) {
        try {
          await rm(join(this.decksDir, entry), { force: true });
        } catch (e) {
          debugWarn(`[DECKS] Could not remove stale package ${entry}:`, e);
        }
      }
    }

    return assignment.title;
  }
}
