/**
 * Common utility functions shared by the engine modules.
 */

/**
 * Generate a UUID v4 (random UUID).
 */
export function generateId(): string {
  return crypto.randomUUID();
}

/**
 * Get the current timestamp as an ISO string.
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Turn a deck title into a file-name-safe slug.
 *
 * @example
 * slugify('Từ vựng: Unit 1!'); // 'tu-vung-unit-1'
 */
export function slugify(value: string): string {
  const slug = value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/đ/g, 'd')
    .replace(/Đ/g, 'D')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'deck';
}

/**
 * Race a promise against a timeout.
 *
 * @param label - Included in the rejection message (e.g. `'Sync cycle'`).
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${Math.round(ms / 1000)}s`));
    }, ms);
    promise.then(
      (val) => { clearTimeout(timer); resolve(val); },
      (err) => { clearTimeout(timer); reject(err); }
    );
  });
}
