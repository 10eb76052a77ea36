/**
 * United Rugby Championship GraphQL client.
 * Persisted queries over HTTP GET; rate limits surface as RATE_LIMITED
 * AppErrors so callers can decide on backoff. No retries happen here.
 */

import { getEnv } from '../../config/env';
import { AppError } from '../../errors';
import type { RawResponse } from '../../types';
import { createLogger } from '../logger';

const logger = createLogger('urcClient');

const PLAYER_SEASON_STATS = {
  operationName: 'GetPlayerSeasonStats1',
  sha256Hash: '0a0022eeecff7bbdae5667322bd51a42cac3c9260bd116acd4e3e338b314ce28',
} as const;

const SQUAD_BY_CLUB = {
  operationName: 'GetPlayerThemeSettingsById',
  sha256Hash: 'e1b82de16fadff0637731c7e7ca176c6f304685eb2760ea391fc1ee5745636ab',
} as const;

const REQUEST_HEADERS = {
  Accept: 'application/json',
  'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36',
  Referer: 'https://www.unitedrugby.com/',
};

const RATE_LIMIT_KEYWORDS = ['rate', 'limit', 'quota', 'throttle', 'too many'];
const REMAINING_HEADERS = ['X-RateLimit-Remaining', 'RateLimit-Remaining'];
const LOW_REMAINING_THRESHOLD = 5;

export interface UrcClientOptions {
  endpoint?: string;
  timeoutMs?: number;
  /** Swappable for tests. */
  fetchImpl?: typeof fetch;
}

interface PersistedQuery {
  operationName: string;
  sha256Hash: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Rate-limit detection
// ─────────────────────────────────────────────────────────────────────────────

function parseRetryAfter(header: string | null): number | undefined {
  if (!header || !/^\s*\d+\s*$/.test(header)) return undefined;
  return Number.parseInt(header, 10);
}

function graphqlErrorMessages(body: unknown): string[] {
  if (typeof body !== 'object' || body === null || !('errors' in body)) return [];
  const { errors } = body;
  if (!Array.isArray(errors)) return [];
  return errors.flatMap((error: unknown) => {
    if (typeof error !== 'object' || error === null || !('message' in error)) return [];
    return typeof error.message === 'string' ? [error.message] : [];
  });
}

/**
 * Throw a RATE_LIMITED AppError if the response signals throttling.
 */
export function checkRateLimits(res: Response, body: unknown): void {
  if (res.status === 429) {
    const retryAfter = parseRetryAfter(res.headers.get('Retry-After'));
    logger.warn({ retryAfter: retryAfter ?? null }, 'HTTP 429 Too Many Requests');
    throw AppError.tooManyRequests('HTTP 429 Too Many Requests', retryAfter);
  }

  if (res.status === 503) {
    logger.warn('HTTP 503 Service Unavailable (possible rate limit)');
    throw AppError.tooManyRequests('HTTP 503 Service Unavailable');
  }

  for (const message of graphqlErrorMessages(body)) {
    const lower = message.toLowerCase();
    if (RATE_LIMIT_KEYWORDS.some((kw) => lower.includes(kw))) {
      logger.warn({ message }, 'GraphQL rate limit detected');
      throw AppError.tooManyRequests(message);
    }
  }

  for (const name of REMAINING_HEADERS) {
    const raw = res.headers.get(name);
    if (raw === null) continue;
    const remaining = Number.parseInt(raw, 10);
    if (Number.isFinite(remaining) && remaining < LOW_REMAINING_THRESHOLD) {
      logger.warn({ header: name, remaining }, 'Rate limit approaching');
    } else {
      logger.debug({ header: name, remaining: raw }, 'Rate limit headroom');
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    return { text };
  }
}

async function getPersisted(
  query: PersistedQuery,
  variables: Record<string, unknown>,
  options: UrcClientOptions,
): Promise<RawResponse> {
  const env = getEnv();
  const endpoint = options.endpoint ?? env.URC_GRAPHQL_ENDPOINT;
  const fetchImpl = options.fetchImpl ?? fetch;

  const url = new URL(endpoint);
  url.searchParams.set('operationName', query.operationName);
  url.searchParams.set('variables', JSON.stringify(variables));
  url.searchParams.set(
    'extensions',
    JSON.stringify({ persistedQuery: { version: 1, sha256Hash: query.sha256Hash } }),
  );

  logger.info({ endpoint, operation: query.operationName, variables }, 'GET persisted query');
  const res = await fetchImpl(url, {
    headers: REQUEST_HEADERS,
    signal: AbortSignal.timeout(options.timeoutMs ?? env.FETCH_TIMEOUT_MS),
  });
  const body = await readBody(res);

  // Rate limits take priority over generic HTTP errors
  checkRateLimits(res, body);
  if (!res.ok) {
    throw AppError.upstreamHttp(res.status, res.statusText);
  }
  return body;
}

function toIntegerId(playerId: string | number): number {
  const id = typeof playerId === 'number' ? playerId : playerId.trim() === '' ? Number.NaN : Number(playerId);
  if (!Number.isSafeInteger(id)) {
    throw AppError.badRequest(`Player id must be an integer, got "${playerId}"`);
  }
  return id;
}

/**
 * Fetch one player's season stats.
 */
export async function fetchPlayerSeasonStats(
  playerId: string | number,
  seasonId: number,
  options: UrcClientOptions = {},
): Promise<RawResponse> {
  const variables = { player_id: [toIntegerId(playerId)], season_id: [seasonId] };
  return getPersisted(PLAYER_SEASON_STATS, variables, options);
}

/**
 * Fetch the roster of a club (e.g. "5356").
 */
export async function fetchSquad(clubId: string, options: UrcClientOptions = {}): Promise<RawResponse> {
  return getPersisted(SQUAD_BY_CLUB, { currentClub: [clubId] }, options);
}
