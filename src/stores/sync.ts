import { writable } from 'svelte/store';
import type { SyncStatus, UploaderState } from '../types';

// Detailed sync error for debugging
export interface SyncError {
  scope: 'auth' | 'decks' | 'progress';
  lmsDeckId: number | null;
  message: string;
  timestamp: string;
}

export interface SyncState {
  status: SyncStatus;
  pendingCount: number;
  uploaderState: UploaderState;
  lastError: string | null; // Friendly error message
  lastErrorDetails: string | null; // Raw technical error
  syncErrors: SyncError[]; // Detailed errors for debugging
  lastSyncTime: string | null;
  syncMessage: string | null; // Human-readable status message
}

// Max errors to keep in history
const MAX_ERROR_HISTORY = 10;

function initialState(): SyncState {
  return {
    status: 'idle',
    pendingCount: 0,
    uploaderState: 'idle',
    lastError: null,
    lastErrorDetails: null,
    syncErrors: [],
    lastSyncTime: null,
    syncMessage: null
  };
}

export function createSyncStatusStore() {
  const { subscribe, set, update } = writable<SyncState>(initialState());

  return {
    subscribe,
    setStatus: (status: SyncStatus) =>
      update((state) => {
        if (status === 'syncing') {
          // Starting sync - clear previous errors
          return { ...state, status, lastError: null, lastErrorDetails: null, syncErrors: [] };
        }
        return { ...state, status, lastError: status === 'idle' ? null : state.lastError };
      }),
    setPendingCount: (count: number) => update((state) => ({ ...state, pendingCount: count })),
    setUploaderState: (uploaderState: UploaderState) =>
      update((state) => ({ ...state, uploaderState })),
    setError: (friendly: string | null, raw?: string | null) =>
      update((state) => ({
        ...state,
        lastError: friendly,
        lastErrorDetails: raw ?? null
      })),
    addSyncError: (error: SyncError) =>
      update((state) => ({
        ...state,
        syncErrors: [...state.syncErrors, error].slice(-MAX_ERROR_HISTORY)
      })),
    setLastSyncTime: (time: string) => update((state) => ({ ...state, lastSyncTime: time })),
    setSyncMessage: (message: string | null) =>
      update((state) => ({ ...state, syncMessage: message })),
    reset: () => set(initialState())
  };
}

export type SyncStatusStore = ReturnType<typeof createSyncStatusStore>;
