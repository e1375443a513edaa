import { describe, expect, it, vi } from 'vitest';
import { AuthError, LmsError, NetworkError } from '../errors';
import { LmsClient, type FetchLike, type TokenProvider } from '../lms/client';

const BASE = 'http://lms.test';

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers }
  });
}

function makeClient(fetch: FetchLike, provider?: TokenProvider): LmsClient {
  const client = new LmsClient({ baseUrl: () => BASE, timeoutMs: 1000, fetch });
  if (provider) client.useTokens(provider);
  return client;
}

const staticTokens: TokenProvider = {
  getAccessToken: async () => 'test-token',
  handleUnauthorized: async () => false
};

describe('LmsClient', () => {
  it('lists assignments with the bearer token and skips malformed entries', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(
      jsonResponse(200, [
        { lms_deck_id: 3, title: 'Kanji', version: 2, updated_at: '2026-01-02T00:00:00Z' },
        { title: 'No id' },
        { lms_deck_id: 4, title: 'Verbs' }
      ])
    );
    const client = makeClient(fetch, staticTokens);

    expect(await client.listAssignments()).toEqual([
      { lmsDeckId: 3, title: 'Kanji', version: 2, updatedAt: '2026-01-02T00:00:00Z' },
      { lmsDeckId: 4, title: 'Verbs', version: 1, updatedAt: null }
    ]);
    expect(fetch).toHaveBeenCalledWith(
      `${BASE}/api/anki/my-decks/`,
      expect.objectContaining({
        method: 'GET',
        headers: expect.objectContaining({ Authorization: 'Bearer test-token' })
      })
    );
  });

  it('refuses an authenticated call when no token source is attached', async () => {
    const fetch = vi.fn<FetchLike>();
    const client = makeClient(fetch);

    await expect(client.listAssignments()).rejects.toThrow(AuthError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('classifies error responses', async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse(503, { detail: 'Maintenance' }))
      .mockResolvedValueOnce(jsonResponse(404, { detail: 'Not found.' }))
      .mockResolvedValueOnce(jsonResponse(403, { error: 'Forbidden' }))
      .mockResolvedValueOnce(new Response('Bad gateway', { status: 502 }));
    const client = makeClient(fetch, staticTokens);

    const unavailable = await client.listAssignments().catch((e: unknown) => e);
    expect(unavailable).toBeInstanceOf(NetworkError);
    expect(unavailable).toMatchObject({ message: 'Maintenance', status: 503 });

    const missing = await client.listAssignments().catch((e: unknown) => e);
    expect(missing).toBeInstanceOf(LmsError);
    expect(missing).not.toBeInstanceOf(NetworkError);
    expect(missing).toMatchObject({ message: 'Not found.', status: 404 });

    const forbidden = await client.listAssignments().catch((e: unknown) => e);
    expect(forbidden).toBeInstanceOf(AuthError);
    expect(forbidden).toMatchObject({ message: 'Forbidden', status: 403 });

    const gateway = await client.listAssignments().catch((e: unknown) => e);
    expect(gateway).toBeInstanceOf(NetworkError);
    expect(gateway).toMatchObject({ message: 'Bad gateway', status: 502 });
  });

  it('wraps transport failures in a NetworkError', async () => {
    const fetch = vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'));
    const client = makeClient(fetch, staticTokens);

    await expect(client.listAssignments()).rejects.toThrow(
      new NetworkError('Could not reach LMS (GET /api/anki/my-decks/): fetch failed')
    );
  });

  it('rejects a body that is not the expected shape', async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response('<html>', { status: 200 }))
      .mockResolvedValueOnce(jsonResponse(200, { results: [] }));
    const client = makeClient(fetch, staticTokens);

    await expect(client.listAssignments()).rejects.toThrow('Malformed response from /api/anki/my-decks/');
    await expect(client.listAssignments()).rejects.toThrow('Malformed response from /api/anki/my-decks/');
  });

  it('downloads a deck and reads its id and version headers', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(
      new Response('deck-bytes', {
        status: 200,
        headers: { 'X-LMS-Deck-ID': '7', 'X-LMS-Deck-Version': '3' }
      })
    );
    const client = makeClient(fetch, staticTokens);

    const pkg = await client.downloadDeck(7);

    expect(pkg.lmsDeckId).toBe(7);
    expect(pkg.version).toBe(3);
    expect(new TextDecoder().decode(pkg.bytes)).toBe('deck-bytes');
    expect(fetch).toHaveBeenCalledWith(
      `${BASE}/api/anki/deck/7/download/`,
      expect.objectContaining({
        headers: expect.objectContaining({ Accept: 'application/octet-stream' })
      })
    );
  });

  it('rejects a download shorter than its Content-Length', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(
      new Response('abc', { status: 200, headers: { 'Content-Length': '10' } })
    );
    const client = makeClient(fetch, staticTokens);

    await expect(client.downloadDeck(7)).rejects.toThrow(
      'Download of deck 7 is incomplete (3 of 10 bytes)'
    );
  });

  it('submits progress with the idempotency key', async () => {
    const fetch = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, { status: 'synced' }));
    const client = makeClient(fetch, staticTokens);
    const reviews = [
      { event_id: 'event-1', card_id: '100', ease: 3 as const, time: 4200, timestamp: 1790000000 }
    ];

    const ack = await client.submitProgress(4, reviews, 'batch-key');

    expect(ack).toEqual({ status: 'synced', synced_count: 1, session_id: undefined });
    const init = fetch.mock.calls[0][1];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ 'Idempotency-Key': 'batch-key' });
    expect(init?.body).toBe(JSON.stringify({ lms_deck_id: 4, reviews }));
  });

  it('reports connection health without throwing', async () => {
    const up = makeClient(vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, { status: 'ok' })));
    const down = makeClient(vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed')));

    expect(await up.testConnection()).toBe(true);
    expect(await down.testConnection()).toBe(false);
  });
});
