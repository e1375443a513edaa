/**
 * @fileoverview Command-line host for the LMS sync engine.
 *
 * Usage (`npm run cli -- <command>`):
 *   lms-sync login <url> <email> --password <password>
 *   lms-sync login --auto <email>
 *   lms-sync logout
 *   lms-sync sync
 *   lms-sync status
 *   lms-sync review --deck "Deck Name" --card <id> --ease <1-4> [--time <ms>]
 *   lms-sync tick
 *   lms-sync scan <decks.json>
 *   lms-sync register --deck "Deck Name" --id <lmsDeckId>
 *   lms-sync ping
 *
 * Configuration comes from the environment (see {@link configFromEnv});
 * `LMS_PASSWORD` may stand in for `--password`.
 */

import { readFileSync } from 'fs';
import { configFromEnv } from '../config';
import { SyncEngine, type SyncReport } from '../engine';
import { parseErrorMessage } from '../errors';
import type { Ease, LocalDeckInfo } from '../types';

// =============================================================================
//                                  TYPES
// =============================================================================

interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string>;
}

const USAGE = `Usage:
  lms-sync login <url> <email> --password <password>
  lms-sync login --auto <email>
  lms-sync logout
  lms-sync sync
  lms-sync status
  lms-sync review --deck "Deck Name" --card <id> --ease <1-4> [--time <ms>]
  lms-sync tick
  lms-sync scan <decks.json>
  lms-sync register --deck "Deck Name" --id <lmsDeckId>
  lms-sync ping`;

// =============================================================================
//                              ARG PARSING
// =============================================================================

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const positional: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        flags[arg.slice(2)] = 'true';
      } else {
        flags[arg.slice(2)] = next;
        i++;
      }
    } else {
      positional.push(arg);
    }
  }

  return { command: args[0] ?? '', positional, flags };
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function requireFlag(flags: Record<string, string>, name: string): string {
  const value = flags[name];
  if (!value || value === 'true') fail(`Missing --${name}\n\n${USAGE}`);
  return value;
}

function parseEase(value: string): Ease {
  switch (value) {
    case '1':
      return 1;
    case '2':
      return 2;
    case '3':
      return 3;
    case '4':
      return 4;
    default:
      return fail(`--ease must be 1 (Again), 2 (Hard), 3 (Good) or 4 (Easy), got "${value}"`);
  }
}

function parseDeckList(path: string): LocalDeckInfo[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    return fail(`Could not read ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!Array.isArray(raw)) fail(`${path} must contain a JSON array of { name, description }`);
  const entries: unknown[] = raw;

  const decks: LocalDeckInfo[] = [];
  for (const entry of entries) {
    if (typeof entry === 'object' && entry !== null && 'name' in entry && typeof entry.name === 'string') {
      const description = 'description' in entry ? entry.description : undefined;
      decks.push({
        name: entry.name,
        description: typeof description === 'string' ? description : undefined
      });
    }
  }
  return decks;
}

// =============================================================================
//                                 OUTPUT
// =============================================================================

function printReport(report: SyncReport): void {
  if (report.decks) {
    console.log(`  Decks checked:   ${report.decks.checked}`);
    for (const deck of report.decks.downloaded) {
      console.log(`  [update] ${deck.deckName} (#${deck.lmsDeckId}) -> v${deck.version}`);
    }
  }
  if (report.progress) {
    console.log(`  Reviews sent:    ${report.progress.acknowledged}`);
    console.log(`  Reviews pending: ${report.progress.remaining}`);
  }
  for (const error of report.errors) {
    const deck = error.lmsDeckId === null ? '' : ` deck #${error.lmsDeckId}`;
    console.log(`  [error] ${error.scope}${deck}: ${error.message}`);
  }
}

// =============================================================================
//                                COMMANDS
// =============================================================================

async function run(engine: SyncEngine, args: ParsedArgs): Promise<number> {
  const { command, positional, flags } = args;

  switch (command) {
    case 'login': {
      if (flags.auto) {
        const user = await engine.autoLogin(flags.auto);
        if (!user) fail('Auto-login is not configured or was refused by the LMS');
        console.log(`Logged in as ${flags.auto} (auto-login)`);
        return 0;
      }
      const [url, email] = positional;
      if (!url || !email) fail(USAGE);
      const password = flags.password ?? process.env.LMS_PASSWORD;
      if (!password) fail('Missing --password (or set LMS_PASSWORD)');
      await engine.login(url, email, password);
      console.log(`Logged in as ${email} at ${engine.auth.lmsUrl}`);
      return 0;
    }

    case 'logout':
      await engine.logout();
      console.log('Logged out. Pending reviews are kept for the next login.');
      return 0;

    case 'sync': {
      console.log('Syncing with the LMS...');
      const report = await engine.sync();
      printReport(report);
      if (report.errors.length > 0) {
        console.log(`Sync finished with ${report.errors.length} error(s).`);
        return 1;
      }
      console.log('Sync complete.');
      return 0;
    }

    case 'status': {
      const status = await engine.getStatus();
      console.log(`LMS:             ${status.lmsUrl}`);
      console.log(`Session:         ${status.session}${status.email ? ` (${status.email})` : ''}`);
      console.log(`Pending reviews: ${status.pendingReviews}`);
      for (const [deckId, count] of Object.entries(status.pendingByDeck)) {
        console.log(`  deck #${deckId}: ${count}`);
      }
      if (status.oldestPendingAt !== null) {
        console.log(`Oldest pending:  ${new Date(status.oldestPendingAt).toISOString()}`);
      }
      console.log('Tracked decks:');
      for (const [name, id] of Object.entries(status.trackedDecks)) {
        const version = status.deckVersions[String(id)];
        console.log(`  ${name} -> #${id}${version === undefined ? '' : ` v${version}`}`);
      }
      return 0;
    }

    case 'review': {
      const event = await engine.recordReview({
        deckName: requireFlag(flags, 'deck'),
        cardId: requireFlag(flags, 'card'),
        ease: parseEase(requireFlag(flags, 'ease')),
        timeTakenMs: flags.time ? Number(flags.time) : 0
      });
      if (!event) {
        console.log(`Deck "${flags.deck}" is not linked to the LMS; review not recorded.`);
        return 0;
      }
      console.log(`Recorded review ${event.eventId} for deck #${event.lmsDeckId}`);
      const status = await engine.getStatus();
      console.log(`Pending reviews: ${status.pendingReviews}`);
      return 0;
    }

    case 'tick': {
      const report = await engine.tick();
      if (!report) {
        console.log('No flush due.');
        return 0;
      }
      printReport(report);
      return report.errors.length > 0 ? 1 : 0;
    }

    case 'scan': {
      const [path] = positional;
      if (!path) fail(USAGE);
      const count = await engine.scanDecks(parseDeckList(path));
      console.log(`Registered ${count} deck(s) from lms_deck_id markers.`);
      return 0;
    }

    case 'register': {
      const deck = requireFlag(flags, 'deck');
      const id = Number.parseInt(requireFlag(flags, 'id'), 10);
      if (!Number.isInteger(id) || id <= 0) fail('--id must be a positive integer');
      await engine.registerDeck(deck, id);
      console.log(`Linked "${deck}" to LMS deck #${id}`);
      return 0;
    }

    case 'ping': {
      const ok = await engine.testConnection();
      console.log(ok ? `LMS at ${engine.auth.lmsUrl} is reachable.` : 'LMS is not reachable.');
      return ok ? 0 : 1;
    }

    default:
      console.error(USAGE);
      return 1;
  }
}

// =============================================================================
//                                  MAIN
// =============================================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  const engine = new SyncEngine(configFromEnv());
  try {
    process.exitCode = await run(engine, args);
  } catch (e) {
    console.error(parseErrorMessage(e));
    process.exitCode = 1;
  }
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
