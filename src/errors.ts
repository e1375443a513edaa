/**
 * Error taxonomy for LMS calls, plus the helpers that turn any thrown value
 * into a status line for the host.
 *
 * - {@link AuthError}: the user has to log in again.
 * - {@link NetworkError}: transient, retried on the next trigger.
 * - {@link VersionConflictError}: server handed out an older deck than it
 *   advertised; retried like a network error.
 */

export class LmsError extends Error {
  /** HTTP status of the failed response, when there was one. */
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LmsError';
    this.status = status;
  }
}

export class AuthError extends LmsError {
  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, status, options);
    this.name = 'AuthError';
  }
}

export class NetworkError extends LmsError {
  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, status, options);
    this.name = 'NetworkError';
  }
}

export class VersionConflictError extends NetworkError {
  readonly lmsDeckId: number;
  readonly expectedVersion: number;
  readonly receivedVersion: number;

  constructor(lmsDeckId: number, expectedVersion: number, receivedVersion: number) {
    super(
      `Deck ${lmsDeckId}: server advertised version ${expectedVersion} but sent version ${receivedVersion}`
    );
    this.name = 'VersionConflictError';
    this.lmsDeckId = lmsDeckId;
    this.expectedVersion = expectedVersion;
    this.receivedVersion = receivedVersion;
  }
}

// Transient errors are retried on the next trigger without bothering the user
export function isTransientError(error: unknown): boolean {
  if (error instanceof AuthError) return false;
  if (error instanceof NetworkError) return true;
  if (error instanceof LmsError && error.status !== null) {
    return error.status === 429 || error.status >= 500;
  }

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (msg.includes('fetch') || msg.includes('network')) return true;
  if (msg.includes('timeout') || msg.includes('timed out')) return true;
  if (msg.includes('already running')) return true;
  if (msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('connection')) {
    return true;
  }
  return false;
}

// Raw error message, used as the technical detail next to the friendly one
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (error && typeof error === 'object') {
    const err = error as Record<string, unknown>;
    // Django REST framework puts its message under `detail`
    if (typeof err.detail === 'string' && err.detail) {
      return err.detail;
    }
    if (typeof err.error === 'string' && err.error) {
      return err.error;
    }
    if (typeof err.message === 'string' && err.message) {
      return err.message;
    }
    try {
      return JSON.stringify(error);
    } catch {
      return '[Unable to parse error]';
    }
  }

  return String(error);
}

// Parse error into user-friendly message
export function parseErrorMessage(error: unknown): string {
  if (error instanceof AuthError) {
    return 'Session expired. Please log in to the LMS again.';
  }
  if (error instanceof VersionConflictError) {
    return 'The LMS sent an outdated deck. Will retry on the next sync.';
  }
  if (error instanceof NetworkError) {
    const msg = error.message.toLowerCase();
    if (msg.includes('timeout') || msg.includes('timed out')) {
      return 'LMS took too long to respond. Will retry.';
    }
    if (error.status === 429) {
      return 'Too many requests. Will retry shortly.';
    }
    if (error.status !== null && error.status >= 500) {
      return 'LMS is temporarily unavailable.';
    }
    return 'Could not reach the LMS. Reviews are kept locally.';
  }
  if (error instanceof Error) {
    return error.message.length > 100 ? error.message.substring(0, 100) + '...' : error.message;
  }
  return 'An unexpected error occurred';
}
