/**
 * @fileoverview LMS HTTP Client
 *
 * Thin wrapper around `fetch` for the LMS REST API. Handles:
 *   - bearer authentication through a pluggable {@link TokenProvider}
 *   - a bounded per-request timeout
 *   - one transparent refresh-and-retry when an authenticated call gets 401
 *   - translating failures into the {@link errors.ts} taxonomy
 *   - validating response bodies and converting them to local shapes
 *
 * Endpoints (relative to the LMS base URL):
 *
 * | Operation       | Method | Path                              |
 * |-----------------|--------|-----------------------------------|
 * | login           | POST   | /api/accounts/login/              |
 * | refresh         | POST   | /api/accounts/token/refresh/      |
 * | token exchange  | POST   | /api/anki/token-exchange/         |
 * | list decks      | GET    | /api/anki/my-decks/               |
 * | download deck   | GET    | /api/anki/deck/{id}/download/     |
 * | upload progress | POST   | /api/anki/progress/               |
 * | health check    | GET    | /api/                             |
 */

import { AuthError, LmsError, NetworkError } from '../errors';
import { debugLog, debugWarn } from '../debug';
import type {
  DeckAssignment,
  DeckAssignmentWire,
  DeckPackage,
  LmsUser,
  ProgressAck,
  ReviewWire
} from '../types';

// =============================================================================
// Types
// =============================================================================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Supplies bearer tokens to authenticated calls. Implemented by the auth manager. */
export interface TokenProvider {
  /** A usable access token; rejects with {@link AuthError} when there is none. */
  getAccessToken(): Promise<string>;
  /** Called once after a 401. Resolves `true` when a retry is worth making. */
  handleUnauthorized(): Promise<boolean>;
}

export interface LmsClientOptions {
  /** Read on every request, so a login to another LMS takes effect at once. */
  baseUrl: () => string;
  timeoutMs: number;
  /** Defaults to the global `fetch`. */
  fetch?: FetchLike;
}

export interface TokenPair {
  access: string;
  refresh: string;
}

export interface LoginResult {
  user: LmsUser;
  tokens: TokenPair;
}

export interface TokenExchangeRequest {
  email: string;
  timestamp: string;
  signature: string;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  auth?: boolean;
  accept?: 'json' | 'binary';
  headers?: Record<string, string>;
}

// =============================================================================
// Response Validation
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(endpoint: string): NetworkError {
  return new NetworkError(`Malformed response from ${endpoint}`);
}

function toUser(value: unknown): LmsUser {
  return isRecord(value) ? value : {};
}

function parseHeaderInt(value: string | null): number | null {
  if (value === null) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toDeckAssignment(wire: DeckAssignmentWire): DeckAssignment {
  return {
    lmsDeckId: wire.lms_deck_id,
    title: wire.title,
    version: wire.version ?? 1,
    updatedAt: wire.updated_at ?? null
  };
}

function isAssignmentWire(value: unknown): value is DeckAssignmentWire {
  return (
    isRecord(value) &&
    typeof value.lms_deck_id === 'number' &&
    typeof value.title === 'string' &&
    (value.version === undefined || typeof value.version === 'number')
  );
}

// =============================================================================
// Client
// =============================================================================

export class LmsClient {
  private tokenProvider: TokenProvider | null = null;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: LmsClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Attach the token source used by authenticated calls. */
  useTokens(provider: TokenProvider): void {
    this.tokenProvider = provider;
  }

  get baseUrl(): string {
    return this.options.baseUrl();
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  private async send(path: string, opts: RequestOptions, retried = false): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> =
      opts.accept === 'binary'
        ? { Accept: 'application/octet-stream' }
        : { Accept: 'application/json', 'Content-Type': 'application/json' };
    Object.assign(headers, opts.headers);

    if (opts.auth) {
      if (!this.tokenProvider) {
        throw new AuthError('Not logged in to the LMS');
      }
      headers.Authorization = `Bearer ${await this.tokenProvider.getAccessToken()}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: opts.method ?? 'GET',
        headers,
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (e) {
      const timedOut = e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError');
      const reason = timedOut
        ? `timed out after ${Math.round(this.options.timeoutMs / 1000)}s`
        : e instanceof Error
          ? e.message
          : String(e);
      throw new NetworkError(`Could not reach LMS (${opts.method ?? 'GET'} ${path}): ${reason}`, null, {
        cause: e
      });
    }

    if (response.status === 401 && opts.auth && !retried && this.tokenProvider) {
      debugLog(`[LMS] 401 on ${path}, refreshing token and retrying once`);
      if (await this.tokenProvider.handleUnauthorized()) {
        return this.send(path, opts, true);
      }
    }

    if (!response.ok) {
      throw await errorFromResponse(response, path);
    }
    return response;
  }

  private async requestJson(path: string, opts: RequestOptions = {}): Promise<unknown> {
    const response = await this.send(path, opts);
    try {
      return await response.json();
    } catch (e) {
      throw new NetworkError(`Malformed response from ${path}`, response.status, { cause: e });
    }
  }

  // ---------------------------------------------------------------------------
  // Accounts
  // ---------------------------------------------------------------------------

  async login(email: string, password: string): Promise<LoginResult> {
    const endpoint = '/api/accounts/login/';
    const data = await this.requestJson(endpoint, { method: 'POST', body: { email, password } });
    if (!isRecord(data) || !isRecord(data.tokens)) throw malformed(endpoint);
    const { access, refresh } = data.tokens;
    if (typeof access !== 'string' || typeof refresh !== 'string' || !access || !refresh) {
      throw malformed(endpoint);
    }
    return { user: toUser(data.user), tokens: { access, refresh } };
  }

  /** Exchange a refresh token for a new access token (and a rotated refresh token, when issued). */
  async refresh(refreshToken: string): Promise<{ access: string; refresh?: string }> {
    const endpoint = '/api/accounts/token/refresh/';
    const data = await this.requestJson(endpoint, { method: 'POST', body: { refresh: refreshToken } });
    if (!isRecord(data) || typeof data.access !== 'string' || !data.access) throw malformed(endpoint);
    return {
      access: data.access,
      refresh: typeof data.refresh === 'string' && data.refresh ? data.refresh : undefined
    };
  }

  async tokenExchange(request: TokenExchangeRequest): Promise<LoginResult> {
    const endpoint = '/api/anki/token-exchange/';
    const data = await this.requestJson(endpoint, { method: 'POST', body: request });
    if (!isRecord(data) || typeof data.access !== 'string' || typeof data.refresh !== 'string') {
      throw malformed(endpoint);
    }
    return { user: toUser(data.user), tokens: { access: data.access, refresh: data.refresh } };
  }

  // ---------------------------------------------------------------------------
  // Decks
  // ---------------------------------------------------------------------------

  async listAssignments(): Promise<DeckAssignment[]> {
    const endpoint = '/api/anki/my-decks/';
    const data = await this.requestJson(endpoint, { auth: true });
    if (!Array.isArray(data)) throw malformed(endpoint);
    const assignments: DeckAssignment[] = [];
    for (const entry of data) {
      if (isAssignmentWire(entry)) {
        assignments.push(toDeckAssignment(entry));
      } else {
        debugWarn('[LMS] Skipping malformed deck assignment:', entry);
      }
    }
    return assignments;
  }

  async downloadDeck(lmsDeckId: number): Promise<DeckPackage> {
    const endpoint = `/api/anki/deck/${lmsDeckId}/download/`;
    const response = await this.send(endpoint, { auth: true, accept: 'binary' });
    let bytes: Uint8Array;
    try {
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (e) {
      throw new NetworkError(`Download of deck ${lmsDeckId} was interrupted`, response.status, {
        cause: e
      });
    }

    const declaredLength = parseHeaderInt(response.headers.get('Content-Length'));
    if (declaredLength !== null && declaredLength !== bytes.byteLength) {
      throw new NetworkError(
        `Download of deck ${lmsDeckId} is incomplete (${bytes.byteLength} of ${declaredLength} bytes)`
      );
    }
    debugLog(`[LMS] Downloaded deck ${lmsDeckId}: ${bytes.byteLength} bytes`);

    return {
      lmsDeckId: parseHeaderInt(response.headers.get('X-LMS-Deck-ID')) ?? lmsDeckId,
      version: parseHeaderInt(response.headers.get('X-LMS-Deck-Version')),
      bytes
    };
  }

  // ---------------------------------------------------------------------------
  // Progress
  // ---------------------------------------------------------------------------

  async submitProgress(
    lmsDeckId: number,
    reviews: ReviewWire[],
    idempotencyKey: string
  ): Promise<ProgressAck> {
    const endpoint = '/api/anki/progress/';
    const data = await this.requestJson(endpoint, {
      method: 'POST',
      auth: true,
      body: { lms_deck_id: lmsDeckId, reviews },
      headers: { 'Idempotency-Key': idempotencyKey }
    });
    if (!isRecord(data)) throw malformed(endpoint);
    return {
      status: typeof data.status === 'string' ? data.status : 'synced',
      synced_count: typeof data.synced_count === 'number' ? data.synced_count : reviews.length,
      session_id:
        typeof data.session_id === 'number' || typeof data.session_id === 'string'
          ? data.session_id
          : undefined
    };
  }

  /** Whether the LMS answers at all. Never throws. */
  async testConnection(): Promise<boolean> {
    try {
      await this.send('/api/', {});
      return true;
    } catch (e) {
      debugWarn('[LMS] Connection test failed:', e);
      return false;
    }
  }
}

// =============================================================================
// Error Translation
// =============================================================================

async function errorFromResponse(response: Response, path: string): Promise<LmsError> {
  let message = `LMS responded ${response.status} to ${path}`;
  try {
    const text = await response.text();
    if (text) {
      try {
        const body: unknown = JSON.parse(text);
        if (isRecord(body)) {
          const detail = body.detail ?? body.error;
          message = typeof detail === 'string' ? detail : JSON.stringify(body);
        }
      } catch {
        message = text.length > 200 ? text.substring(0, 200) : text;
      }
    }
  } catch (e) {
    debugWarn(`[LMS] Could not read error body for ${path}:`, e);
  }

  const status = response.status;
  if (status === 401 || status === 403) return new AuthError(message, status);
  if (status === 408 || status === 429 || status >= 500) return new NetworkError(message, status);
  return new LmsError(message, status);
}
