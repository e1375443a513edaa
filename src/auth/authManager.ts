/**
 * @fileoverview Auth Manager
 *
 * Owns the one {@link Session} of the engine and everything that changes it:
 * login, single sign-on token exchange, transparent refresh, restore at
 * startup and logout. It is also the {@link TokenProvider} the HTTP client
 * asks for bearer tokens, so an authenticated call never sees token state
 * directly.
 *
 * Once a valid access token is cached in the session, {@link ensureValidToken}
 * returns it without any network call. A refresh happens only when the JWT
 * `exp` claim has passed or the server answered 401.
 */

import type { ResolvedConfig } from '../config';
import { normalizeLmsUrl } from '../config';
import type { LocalStore } from '../database';
import { debugLog, debugWarn } from '../debug';
import { AuthError, LmsError, NetworkError } from '../errors';
import type { LmsClient, LoginResult, TokenProvider } from '../lms/client';
import type { AuthStateStore } from '../stores/authState';
import type { LmsUser, SessionStatus } from '../types';
import { hmacSha256Hex } from './crypto';
import { Session } from './session';
import { withTokenStore } from './tokenStore';

export class AuthManager implements TokenProvider {
  readonly session: Session;
  private currentUrl: string;
  private refreshing: Promise<string> | null = null;

  constructor(
    private readonly client: LmsClient,
    private readonly store: LocalStore,
    private readonly config: ResolvedConfig,
    private readonly authState: AuthStateStore
  ) {
    this.session = new Session(config.tokenExpirySkewSeconds * 1000);
    this.currentUrl = config.lmsUrl;
  }

  /** Base URL of the LMS this session talks to. */
  get lmsUrl(): string {
    return this.currentUrl;
  }

  get status(): SessionStatus {
    return this.session.status();
  }

  private publish(kickedMessage?: string): void {
    this.authState.setSession(this.session.status(), this.session.email, this.currentUrl, kickedMessage);
  }

  // ---------------------------------------------------------------------------
  // Startup
  // ---------------------------------------------------------------------------

  /**
   * Load the persisted LMS URL and token pair into the session.
   *
   * @returns The session status after loading.
   */
  async restore(): Promise<SessionStatus> {
    const state = await this.store.getState();
    if (state.lmsUrl) this.currentUrl = state.lmsUrl;

    const tokens = await withTokenStore(this.store, (handle) => handle.load());
    if (tokens) {
      this.session.establish(tokens);
      debugLog(`[AUTH] Restored session for ${tokens.email ?? 'unknown user'}`);
    } else {
      this.session.clear();
    }
    this.publish();
    return this.session.status();
  }

  // ---------------------------------------------------------------------------
  // Login / Logout
  // ---------------------------------------------------------------------------

  /**
   * Log in with email and password.
   *
   * @throws {AuthError} On rejected credentials or an unreachable host.
   */
  async login(url: string, email: string, password: string): Promise<LmsUser> {
    const previousUrl = this.currentUrl;
    this.currentUrl = normalizeLmsUrl(url);

    let result: LoginResult;
    try {
      result = await this.client.login(email, password);
    } catch (e) {
      this.currentUrl = previousUrl;
      throw toLoginError(e);
    }

    await this.adopt(result, email);
    debugLog(`[AUTH] Logged in as ${email} at ${this.currentUrl}`);
    return result.user;
  }

  /**
   * Single sign-on: trade the email the host already knows for a token pair,
   * proving possession of the shared add-on secret with an HMAC signature
   * over `"<email>:<timestamp>"`.
   *
   * @returns The user, or `null` when auto-login is not configured or the
   *          LMS refused the exchange.
   */
  async autoLogin(email: string): Promise<LmsUser | null> {
    if (!this.config.addonSecret || !email) return null;

    const timestamp = String(Math.floor(Date.now() / 1000));
    const signature = await hmacSha256Hex(this.config.addonSecret, `${email}:${timestamp}`);
    try {
      const result = await this.client.tokenExchange({ email, timestamp, signature });
      await this.adopt(result, email);
      debugLog(`[AUTH] Auto-login succeeded for ${email}`);
      return result.user;
    } catch (e) {
      if (e instanceof LmsError) {
        debugWarn('[AUTH] Auto-login failed:', e.message);
        return null;
      }
      throw e;
    }
  }

  private async adopt(result: LoginResult, email: string): Promise<void> {
    this.session.establish({
      accessToken: result.tokens.access,
      refreshToken: result.tokens.refresh,
      email
    });
    await this.persistTokens();
    await this.store.updateState((state) => {
      state.lmsUrl = this.currentUrl;
      state.userEmail = email;
    });
    this.publish();
  }

  /** Destroy the session: persisted secrets are overwritten, then removed. */
  async logout(): Promise<void> {
    this.session.clear();
    this.refreshing = null;
    await withTokenStore(this.store, (handle) => handle.erase());
    await this.store.updateState((state) => {
      state.userEmail = null;
    });
    this.publish();
    debugLog('[AUTH] Logged out');
  }

  // ---------------------------------------------------------------------------
  // Token Validity
  // ---------------------------------------------------------------------------

  /**
   * Return a usable access token, refreshing it first when it has expired.
   *
   * @throws {AuthError} When there is no session or the refresh token was rejected.
   * @throws {NetworkError} When the refresh could not reach the LMS.
   */
  async ensureValidToken(): Promise<string> {
    const status = this.session.status();
    const access = this.session.accessToken;

    if (status === 'valid' && access) return access;
    if (status === 'uninitialized') {
      throw new AuthError('Not logged in to the LMS');
    }
    if (status === 'invalid') {
      throw new AuthError('LMS session is no longer valid. Please log in again.');
    }

    if (!this.refreshing) {
      this.refreshing = this.refresh().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async refresh(): Promise<string> {
    const refreshToken = this.session.refreshToken;
    if (!refreshToken) {
      this.session.invalidate();
      this.publish('Please log in to the LMS again.');
      throw new AuthError('No refresh token stored');
    }

    debugLog('[AUTH] Access token expired, refreshing');
    let result: { access: string; refresh?: string };
    try {
      result = await this.client.refresh(refreshToken);
    } catch (e) {
      if (e instanceof LmsError && !(e instanceof NetworkError)) {
        this.session.invalidate();
        this.publish('Your LMS session expired. Please log in again.');
        throw new AuthError('Refresh token rejected by the LMS', e.status, { cause: e });
      }
      throw e;
    }

    this.session.refreshed(result.access, result.refresh);
    await this.persistTokens();
    this.publish();
    return result.access;
  }

  private async persistTokens(): Promise<void> {
    const snapshot = this.session.snapshot();
    if (!snapshot) return;
    await withTokenStore(this.store, (handle) => handle.save(snapshot));
  }

  // ---------------------------------------------------------------------------
  // TokenProvider
  // ---------------------------------------------------------------------------

  getAccessToken(): Promise<string> {
    return this.ensureValidToken();
  }

  async handleUnauthorized(): Promise<boolean> {
    if (this.session.status() === 'uninitialized') return false;
    this.session.markAccessExpired();
    try {
      await this.ensureValidToken();
      return true;
    } catch (e) {
      if (e instanceof AuthError) return false;
      throw e;
    }
  }
}

function toLoginError(error: unknown): AuthError {
  if (error instanceof AuthError) return error;
  if (error instanceof NetworkError) {
    return new AuthError(`Could not reach the LMS: ${error.message}`, error.status, { cause: error });
  }
  if (error instanceof LmsError) {
    const message = error.status === 400 ? 'Invalid email or password' : error.message;
    return new AuthError(message, error.status, { cause: error });
  }
  return new AuthError(error instanceof Error ? error.message : String(error), null, {
    cause: error
  });
}
