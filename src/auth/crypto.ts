/**
 * Shared Crypto Utilities
 * SHA-256 hashing and HMAC signing via the Web Crypto API.
 */

function toHex(buffer: ArrayBuffer): string {
  const bytes = Array.from(new Uint8Array(buffer));
  return bytes.map(b => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Hash a value using SHA-256.
 * Returns a 64-character hex string.
 */
export async function hashValue(value: string): Promise<string> {
  const encoder = new TextEncoder();
  const hashBuffer = await crypto.subtle.digest('SHA-256', encoder.encode(value));
  return toHex(hashBuffer);
}

/**
 * Sign a message with HMAC-SHA256.
 * Returns a 64-character hex string.
 */
export async function hmacSha256Hex(secret: string, message: string): Promise<string> {
  const encoder = new TextEncoder();
  const key = await crypto.subtle.importKey(
    'raw',
    encoder.encode(secret),
    { name: 'HMAC', hash: 'SHA-256' },
    false,
    ['sign']
  );
  const signature = await crypto.subtle.sign('HMAC', key, encoder.encode(message));
  return toHex(signature);
}
