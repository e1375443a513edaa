/**
 * Auth State Store
 * Mirrors the session lifecycle (uninitialized/valid/expired/invalid) for the host UI
 */

import { writable, derived, type Readable } from 'svelte/store';
import type { SessionStatus } from '../types';

export interface AuthState {
  status: SessionStatus;
  email: string | null;
  lmsUrl: string | null;
  authKickedMessage: string | null; // Message to show when user is sent back to login
}

export function createAuthStateStore() {
  const { subscribe, update } = writable<AuthState>({
    status: 'uninitialized',
    email: null,
    lmsUrl: null,
    authKickedMessage: null
  });

  return {
    subscribe,

    /**
     * Publish the current session. A kicked message survives until the next
     * successful login clears it.
     */
    setSession(
      status: SessionStatus,
      email: string | null,
      lmsUrl: string | null,
      kickedMessage?: string
    ): void {
      update((state) => ({
        status,
        email,
        lmsUrl,
        authKickedMessage:
          kickedMessage ?? (status === 'valid' ? null : state.authKickedMessage)
      }));
    },

    clearKickedMessage(): void {
      update((state) => ({ ...state, authKickedMessage: null }));
    }
  };
}

export type AuthStateStore = ReturnType<typeof createAuthStateStore>;

/** `true` while the session holds a token pair that can still be used or refreshed. */
export function isAuthenticated(store: Readable<AuthState>): Readable<boolean> {
  return derived(store, ($state) => $state.status === 'valid' || $state.status === 'expired');
}
