/**
 * Token Store
 *
 * Scoped access to the persisted token pair. Callers borrow a
 * {@link TokenStoreHandle} through {@link withTokenStore}; the handle stops
 * working once the callback settles, so no code path can hold on to it.
 */

import type { LocalStore } from '../database';
import type { StoredTokens } from '../types';

export interface TokenStoreHandle {
  load(): Promise<StoredTokens | null>;
  save(tokens: StoredTokens): Promise<void>;
  /** Overwrite, then delete, the persisted tokens. */
  erase(): Promise<void>;
}

// null means "no tokens"; undefined means the file is not a token document
function parseTokens(raw: unknown): StoredTokens | null | undefined {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return undefined;
  const record = raw as Record<string, unknown>;
  // An erased store holds `{}`
  if (Object.keys(record).length === 0) return null;
  if (typeof record.accessToken !== 'string' || typeof record.refreshToken !== 'string') {
    return undefined;
  }
  if (!record.accessToken || !record.refreshToken) return null;
  return {
    accessToken: record.accessToken,
    refreshToken: record.refreshToken,
    email: typeof record.email === 'string' ? record.email : null
  };
}

export async function withTokenStore<T>(
  store: LocalStore,
  fn: (handle: TokenStoreHandle) => Promise<T>
): Promise<T> {
  let released = false;
  const guard = () => {
    if (released) throw new Error('Token store handle used after release');
  };

  const handle: TokenStoreHandle = {
    async load() {
      guard();
      return store.read<StoredTokens | null>('tokens', null, parseTokens);
    },
    async save(tokens) {
      guard();
      await store.write('tokens', tokens);
    },
    async erase() {
      guard();
      await store.remove('tokens', true);
    }
  };

  try {
    return await fn(handle);
  } finally {
    released = true;
  }
}
