import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchPlayerSeasonStats, fetchSquad } from '../../../src/utils/urc/urcClient';

const { warnSpy } = vi.hoisted(() => ({ warnSpy: vi.fn() }));

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: warnSpy,
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const ENDPOINT = 'https://stats.test/graphql';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

function fakeFetch(response: () => Response) {
  return vi.fn<typeof fetch>(async () => response());
}

function requestedUrl(fetchImpl: ReturnType<typeof fakeFetch>): URL {
  const [input] = fetchImpl.mock.calls[0];
  return new URL(input instanceof Request ? input.url : String(input));
}

describe('urcClient', () => {
  beforeEach(() => {
    warnSpy.mockClear();
  });

  // ─── Requests ────────────────────────────────────────────────────

  describe('fetchPlayerSeasonStats', () => {
    it('sends a persisted query for the player and season', async () => {
      const fetchImpl = fakeFetch(() => jsonResponse({ data: { playerseasonstats: [] } }));
      await fetchPlayerSeasonStats('123', 202501, { endpoint: ENDPOINT, fetchImpl });

      const url = requestedUrl(fetchImpl);
      expect(url.origin + url.pathname).toBe(ENDPOINT);
      expect(url.searchParams.get('operationName')).toBe('GetPlayerSeasonStats1');
      expect(url.searchParams.get('variables')).toBe('{"player_id":[123],"season_id":[202501]}');
      expect(JSON.parse(url.searchParams.get('extensions') ?? '')).toEqual({
        persistedQuery: {
          version: 1,
          sha256Hash: '0a0022eeecff7bbdae5667322bd51a42cac3c9260bd116acd4e3e338b314ce28',
        },
      });
    });

    it('passes browser-like headers and a timeout signal', async () => {
      const fetchImpl = fakeFetch(() => jsonResponse({}));
      await fetchPlayerSeasonStats(5, 202501, { endpoint: ENDPOINT, fetchImpl, timeoutMs: 1000 });

      const [, init] = fetchImpl.mock.calls[0];
      expect(init?.headers).toMatchObject({ Accept: 'application/json', Referer: 'https://www.unitedrugby.com/' });
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('returns the parsed body', async () => {
      const body = { data: { playerseasonstats: [{ player_stats: {} }] } };
      const result = await fetchPlayerSeasonStats('1', 202501, {
        endpoint: ENDPOINT,
        fetchImpl: fakeFetch(() => jsonResponse(body)),
      });
      expect(result).toEqual(body);
    });

    it('wraps a non-JSON body', async () => {
      const result = await fetchPlayerSeasonStats('1', 202501, {
        endpoint: ENDPOINT,
        fetchImpl: fakeFetch(() => new Response('<html>maintenance</html>', { status: 200 })),
      });
      expect(result).toEqual({ text: '<html>maintenance</html>' });
    });

    it('returns GraphQL errors that are not rate limits for the caller to handle', async () => {
      const body = { errors: [{ message: 'Player not found' }] };
      const result = await fetchPlayerSeasonStats('1', 202501, {
        endpoint: ENDPOINT,
        fetchImpl: fakeFetch(() => jsonResponse(body)),
      });
      expect(result).toEqual(body);
    });

    it('rejects a non-integer player id without calling upstream', async () => {
      const fetchImpl = fakeFetch(() => jsonResponse({}));
      await expect(fetchPlayerSeasonStats('abc', 202501, { endpoint: ENDPOINT, fetchImpl })).rejects.toMatchObject({
        code: 'BAD_REQUEST',
        message: 'Player id must be an integer, got "abc"',
      });
      await expect(fetchPlayerSeasonStats('', 202501, { endpoint: ENDPOINT, fetchImpl })).rejects.toMatchObject({
        code: 'BAD_REQUEST',
      });
      await expect(fetchPlayerSeasonStats(1.5, 202501, { endpoint: ENDPOINT, fetchImpl })).rejects.toMatchObject({
        code: 'BAD_REQUEST',
      });
      expect(fetchImpl).not.toHaveBeenCalled();
    });
  });

  describe('fetchSquad', () => {
    it('sends the squad persisted query for a club', async () => {
      const fetchImpl = fakeFetch(() => jsonResponse({ data: {} }));
      await fetchSquad('5356', { endpoint: ENDPOINT, fetchImpl });

      const url = requestedUrl(fetchImpl);
      expect(url.searchParams.get('operationName')).toBe('GetPlayerThemeSettingsById');
      expect(url.searchParams.get('variables')).toBe('{"currentClub":["5356"]}');
    });
  });

  // ─── Rate limits ─────────────────────────────────────────────────

  describe('rate-limit detection', () => {
    const call = (response: () => Response) =>
      fetchPlayerSeasonStats('1', 202501, { endpoint: ENDPOINT, fetchImpl: fakeFetch(response) });

    it('signals HTTP 429 with the Retry-After seconds', async () => {
      await expect(
        call(() => jsonResponse({}, { status: 429, headers: { 'Retry-After': '30' } })),
      ).rejects.toMatchObject({
        code: 'RATE_LIMITED',
        message: 'HTTP 429 Too Many Requests',
        details: { retryAfter: 30 },
      });
    });

    it('leaves the retry hint unset when Retry-After is not a number of seconds', async () => {
      await expect(
        call(() => jsonResponse({}, { status: 429, headers: { 'Retry-After': 'Wed, 21 Oct 2026 07:28:00 GMT' } })),
      ).rejects.toMatchObject({ code: 'RATE_LIMITED', details: { retryAfter: undefined } });
    });

    it('signals HTTP 503', async () => {
      await expect(call(() => jsonResponse({}, { status: 503 }))).rejects.toMatchObject({
        code: 'RATE_LIMITED',
        message: 'HTTP 503 Service Unavailable',
      });
    });

    it('signals a GraphQL error that mentions throttling', async () => {
      await expect(
        call(() => jsonResponse({ errors: [{ message: 'Too Many Requests from this client' }] })),
      ).rejects.toMatchObject({
        code: 'RATE_LIMITED',
        message: 'Too Many Requests from this client',
      });
    });

    it('warns when the remaining quota runs low', async () => {
      await call(() => jsonResponse({}, { headers: { 'X-RateLimit-Remaining': '2' } }));
      expect(warnSpy).toHaveBeenCalledWith({ header: 'X-RateLimit-Remaining', remaining: 2 }, 'Rate limit approaching');
    });

    it('does not warn with plenty of quota left', async () => {
      await call(() => jsonResponse({}, { headers: { 'RateLimit-Remaining': '80' } }));
      expect(warnSpy).not.toHaveBeenCalled();
    });
  });

  // ─── Other statuses ──────────────────────────────────────────────

  it('rejects other non-OK statuses as upstream HTTP errors', async () => {
    const fetchImpl = fakeFetch(() =>
      jsonResponse({ message: 'oops' }, { status: 500, statusText: 'Internal Server Error' }),
    );
    await expect(fetchPlayerSeasonStats('1', 202501, { endpoint: ENDPOINT, fetchImpl })).rejects.toMatchObject({
      code: 'UPSTREAM_HTTP_ERROR',
      message: 'HTTP 500 Internal Server Error',
    });
  });
});
