import { readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { withTokenStore, type TokenStoreHandle } from '../auth/tokenStore';
import { LocalStore, emptyState } from '../database';
import { ProgressCache } from '../progressCache';
import { makeTempDir, removeTempDir } from './helpers/fakeLms';

let dir: string;
let store: LocalStore;

beforeEach(async () => {
  dir = await makeTempDir();
  store = new LocalStore(dir);
});

afterEach(async () => {
  await removeTempDir(dir);
});

describe('LocalStore', () => {
  it('starts from an empty state', async () => {
    expect(await store.getState()).toEqual(emptyState());
  });

  it('persists state for the next store over the same directory', async () => {
    await store.updateState((state) => {
      state.lmsUrl = 'http://lms.test';
      state.deckVersions['3'] = 2;
      state.deckMappings.Kanji = 3;
    });

    expect(await new LocalStore(dir).getState()).toEqual({
      lmsUrl: 'http://lms.test',
      userEmail: null,
      deckVersions: { '3': 2 },
      deckMappings: { Kanji: 3 }
    });
  });

  it('moves an unreadable document aside and falls back', async () => {
    await writeFile(join(dir, 'state.json'), '{ not json', 'utf-8');

    expect(await store.getState()).toEqual(emptyState());
    const files = await readdir(dir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^state\.json\.corrupt-\d+$/);
  });

  it('drops fields of the wrong type', async () => {
    await writeFile(
      join(dir, 'state.json'),
      JSON.stringify({ lmsUrl: 7, deckVersions: { '1': 2, '2': 'three' }, deckMappings: [] }),
      'utf-8'
    );

    expect(await store.getState()).toEqual({
      lmsUrl: null,
      userEmail: null,
      deckVersions: { '1': 2 },
      deckMappings: {}
    });
  });

  it('runs overlapping state updates one after another', async () => {
    await Promise.all([
      store.updateState((state) => {
        state.deckMappings.Japanese = 4;
      }),
      store.updateState((state) => {
        state.deckMappings.Biology = 9;
      }),
      store.updateState((state) => {
        state.deckVersions['4'] = 2;
      })
    ]);

    expect(await store.getState()).toEqual({
      lmsUrl: null,
      userEmail: null,
      deckVersions: { '4': 2 },
      deckMappings: { Japanese: 4, Biology: 9 }
    });
  });

  it('applies overlapping writes in call order and leaves no temp files', async () => {
    const writes = [1, 2, 3, 4, 5].map((n) => store.write('state', { ...emptyState(), userEmail: `user-${n}` }));
    await Promise.all(writes);

    expect((await store.getState()).userEmail).toBe('user-5');
    expect(await readdir(dir)).toEqual(['state.json']);
  });
});

describe('token store', () => {
  const tokens = { accessToken: 'test-access', refreshToken: 'test-refresh', email: 'student@example.com' };

  it('saves, loads and erases the token pair', async () => {
    await withTokenStore(store, (handle) => handle.save(tokens));
    expect(await withTokenStore(store, (handle) => handle.load())).toEqual(tokens);

    await withTokenStore(store, (handle) => handle.erase());

    expect(await readdir(dir)).toEqual([]);
    expect(await withTokenStore(store, (handle) => handle.load())).toBeNull();
  });

  it('reads an overwritten token document as no session', async () => {
    await store.write('tokens', {});

    expect(await withTokenStore(store, (handle) => handle.load())).toBeNull();
    expect(JSON.parse(await readFile(join(dir, 'tokens.json'), 'utf-8'))).toEqual({});
  });

  it('refuses a handle used after its scope ended', async () => {
    const leaked: { handle?: TokenStoreHandle } = {};
    await withTokenStore(store, async (handle) => {
      leaked.handle = handle;
    });
    if (!leaked.handle) throw new Error('handle was not captured');

    await expect(leaked.handle.load()).rejects.toThrow('Token store handle used after release');
  });
});

describe('ProgressCache', () => {
  const event = (eventId: string, lmsDeckId: number, reviewedAt: number) => ({
    eventId,
    lmsDeckId,
    cardId: '1',
    ease: 3 as const,
    timeTakenMs: 1000,
    reviewedAt
  });

  it('groups by deck, reports stats and removes only acknowledged ids', async () => {
    const cache = new ProgressCache(store);
    await cache.append(event('e1', 4, 3000));
    await cache.append(event('e2', 9, 1000));
    await cache.append(event('e3', 4, 2000));

    expect([...cache.groupByDeck().keys()]).toEqual([4, 9]);
    expect(cache.stats()).toEqual({ totalReviews: 3, deckCounts: { '4': 2, '9': 1 }, oldestTimestamp: 1000 });

    expect(await cache.remove(['e1', 'e3', 'unknown'])).toBe(2);

    const reloaded = new ProgressCache(new LocalStore(dir));
    await reloaded.load();
    expect(reloaded.pending()).toEqual([event('e2', 9, 1000)]);
  });

  it('skips malformed cached entries', async () => {
    await writeFile(
      join(dir, 'progress-cache.json'),
      JSON.stringify({ events: [event('ok', 4, 1000), { eventId: 'bad', ease: 7 }] }),
      'utf-8'
    );
    const cache = new ProgressCache(store);
    await cache.load();

    expect(cache.pending().map((e) => e.eventId)).toEqual(['ok']);
  });
});
