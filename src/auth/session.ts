/**
 * Session
 *
 * The explicitly owned token holder. One instance lives inside the
 * {@link AuthManager}; nothing else keeps token state. The access token's
 * expiry is read from its JWT `exp` claim when the token is a JWT; an opaque
 * token is trusted until the server answers 401.
 */

import type { SessionStatus, StoredTokens } from '../types';

/**
 * Decode the `exp` claim of a JWT, in epoch ms.
 * Returns null for opaque tokens or payloads without a numeric `exp`.
 */
export function decodeJwtExpiry(token: string): number | null {
  const parts = token.split('.');
  if (parts.length !== 3) return null;
  try {
    const base64 = parts[1].replace(/-/g, '+').replace(/_/g, '/');
    const padded = base64 + '='.repeat((4 - (base64.length % 4)) % 4);
    const payload: unknown = JSON.parse(atob(padded));
    if (payload && typeof payload === 'object' && 'exp' in payload) {
      const exp = payload.exp;
      if (typeof exp === 'number' && Number.isFinite(exp)) return exp * 1000;
    }
    return null;
  } catch {
    return null;
  }
}

export class Session {
  private tokens: StoredTokens | null = null;
  private accessExpiresAt: number | null = null;
  private rejected = false;

  constructor(private readonly skewMs: number = 30_000) {}

  /** Install a fresh token pair (login, restore, or auto-login). */
  establish(tokens: StoredTokens): void {
    this.tokens = { ...tokens };
    this.accessExpiresAt = decodeJwtExpiry(tokens.accessToken);
    this.rejected = false;
  }

  /** Replace the access token in place after a refresh. */
  refreshed(accessToken: string, refreshToken?: string): void {
    if (!this.tokens) {
      throw new Error('Cannot refresh a session that was never established');
    }
    this.tokens = {
      ...this.tokens,
      accessToken,
      refreshToken: refreshToken ?? this.tokens.refreshToken
    };
    this.accessExpiresAt = decodeJwtExpiry(accessToken);
    this.rejected = false;
  }

  /** Force the next {@link status} check to report 'expired' (server said 401). */
  markAccessExpired(): void {
    if (this.tokens) this.accessExpiresAt = 0;
  }

  /** The refresh token was rejected; only a new login recovers. */
  invalidate(): void {
    this.rejected = true;
  }

  clear(): void {
    this.tokens = null;
    this.accessExpiresAt = null;
    this.rejected = false;
  }

  status(nowMs: number = Date.now()): SessionStatus {
    if (!this.tokens) return 'uninitialized';
    if (this.rejected) return 'invalid';
    if (this.accessExpiresAt !== null && nowMs >= this.accessExpiresAt - this.skewMs) {
      return 'expired';
    }
    return 'valid';
  }

  get accessToken(): string | null {
    return this.tokens?.accessToken ?? null;
  }

  get refreshToken(): string | null {
    return this.tokens?.refreshToken ?? null;
  }

  get email(): string | null {
    return this.tokens?.email ?? null;
  }

  /** Copy of the token pair for persistence. */
  snapshot(): StoredTokens | null {
    return this.tokens ? { ...this.tokens } : null;
  }
}
