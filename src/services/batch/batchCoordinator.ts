/**
 * Batch Coordinator
 *
 * Drives fetch → extract → normalize → score over a player list, one player
 * at a time. Each player ends in SUCCESS or a classified FAILURE; nothing
 * thrown below `processPlayer` escapes it, so one bad player never aborts the
 * batch.
 *
 * Players are taken in sub-batches of five with a fixed sleep between
 * sub-batches (never after the last). Every `processBatch` call builds its
 * own summary; there is no state carried between runs.
 */

import { setTimeout as delay } from 'timers/promises';
import { getEnv } from '../../config/env';
import { AppError, classifyFailure } from '../../errors';
import type {
  BatchSummary,
  PlayerDetail,
  PlayerFailure,
  PlayerOutcome,
  PlayerRef,
  PlayerResult,
  RankingEntry,
  RawResponse,
  ScoreName,
} from '../../types';
import { createLogger } from '../../utils/logger';
import { withRunContext } from '../../utils/runContext';
import { fetchPlayerSeasonStats } from '../../utils/urc/urcClient';
import {
  computeAllScores,
  extractMetrics,
  logMappingReport,
  normalizeMetrics,
  resolveScoringRole,
  type RoleFallback,
} from '../scoring';

const logger = createLogger('batchCoordinator');

export const SUB_BATCH_SIZE = 5;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type PlayerStatsFetcher = (playerId: string, seasonId: number) => Promise<RawResponse>;

export interface BatchDeps {
  fetchStats: PlayerStatsFetcher;
  seasonId: number;
  /** Fixed pause between sub-batches. 0 disables it. */
  backoffSeconds: number;
  roleFallback: RoleFallback;
  /** Rejects once `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PlayerContext {
  minutesPlayed?: number | null;
  appearances?: number | null;
  position?: string | null;
}

export interface BatchOptions {
  /** Applied to every player in the batch. */
  minutesPlayed?: number | null;
  appearances?: number | null;
  /** Roster records supplying each player's position. */
  details?: readonly PlayerDetail[];
  /** Checked between sub-batches and cuts the backoff short. */
  signal?: AbortSignal;
}

/**
 * Dependencies wired from the environment and the URC client.
 */
export function createBatchDeps(overrides: Partial<BatchDeps> = {}): BatchDeps {
  const env = getEnv();
  return {
    fetchStats: (playerId, seasonId) => fetchPlayerSeasonStats(playerId, seasonId),
    seasonId: env.URC_SEASON_ID,
    backoffSeconds: env.BATCH_BACKOFF_SECONDS,
    roleFallback: env.UNKNOWN_ROLE_FALLBACK,
    ...overrides,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Single player
// ─────────────────────────────────────────────────────────────────────────────

function readUpstreamErrors(raw: RawResponse): { found: false } | { found: true; errors: unknown } {
  if (typeof raw === 'object' && raw !== null && !Array.isArray(raw) && 'errors' in raw) {
    return { found: true, errors: raw.errors };
  }
  return { found: false };
}

export async function processPlayer(
  player: PlayerRef,
  context: PlayerContext,
  deps: BatchDeps,
): Promise<PlayerOutcome> {
  const { playerId, name } = player;

  try {
    logger.info({ playerId, name }, 'Fetching player');
    const raw = await deps.fetchStats(playerId, deps.seasonId);

    const upstream = readUpstreamErrors(raw);
    if (upstream.found) {
      throw AppError.upstreamData(JSON.stringify(upstream.errors), upstream.errors);
    }

    const rawMetrics = extractMetrics(raw);
    logMappingReport(playerId, rawMetrics);
    const normalizedMetrics = normalizeMetrics(rawMetrics, context.minutesPlayed, context.appearances);
    const position = context.position ?? null;
    const role = resolveScoringRole(position, deps.roleFallback);
    const scores = computeAllScores(normalizedMetrics, role);

    logger.info(
      { playerId, role, basis: normalizedMetrics.basis, composite: scores.composite_contribution.score },
      'Player scored',
    );

    const result: PlayerResult = { playerId, name, position, role, rawMetrics, normalizedMetrics, scores };
    return { status: 'success', result };
  } catch (err) {
    const classified = classifyFailure(err);
    const failure: PlayerFailure = {
      playerId,
      name,
      kind: classified.kind,
      error: classified.message,
      rateLimited: classified.kind === 'rate_limit',
      retryAfterSeconds: classified.retryAfterSeconds,
    };

    if (failure.rateLimited) {
      logger.warn({ playerId, retryAfterSeconds: failure.retryAfterSeconds, error: failure.error }, 'Rate limited');
    } else {
      logger.error({ playerId, kind: failure.kind, err }, 'Player failed');
    }
    return { status: 'failure', failure };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Batch
// ─────────────────────────────────────────────────────────────────────────────

function buildPositionLookup(details: readonly PlayerDetail[] | undefined): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const detail of details ?? []) {
    if (detail.playerId !== null && detail.playerId !== '' && detail.position) {
      lookup.set(String(detail.playerId), detail.position);
    }
  }
  return lookup;
}

export async function processBatch(
  players: readonly PlayerRef[],
  options: BatchOptions,
  deps: BatchDeps,
): Promise<BatchSummary> {
  return withRunContext(async () => {
    const results: PlayerResult[] = [];
    const failures: PlayerFailure[] = [];
    const positions = buildPositionLookup(options.details);
    const sleep = deps.sleep ?? ((ms: number, signal?: AbortSignal) => delay(ms, undefined, { signal }));
    let cancelled = false;

    logger.info({ total: players.length, seasonId: deps.seasonId }, 'Processing batch');

    for (let start = 0; start < players.length; start += SUB_BATCH_SIZE) {
      if (options.signal?.aborted) {
        cancelled = true;
        logger.warn({ processed: start, total: players.length }, 'Batch cancelled');
        break;
      }

      const subBatch = players.slice(start, start + SUB_BATCH_SIZE);
      logger.info({ subBatch: start / SUB_BATCH_SIZE + 1, size: subBatch.length }, 'Processing sub-batch');

      for (const player of subBatch) {
        const outcome = await processPlayer(
          player,
          {
            minutesPlayed: options.minutesPlayed,
            appearances: options.appearances,
            position: positions.get(player.playerId) ?? null,
          },
          deps,
        );
        if (outcome.status === 'success') {
          results.push(outcome.result);
        } else {
          failures.push(outcome.failure);
        }
      }

      const hasNext = start + SUB_BATCH_SIZE < players.length;
      if (hasNext && deps.backoffSeconds > 0) {
        logger.info({ backoffSeconds: deps.backoffSeconds }, 'Backoff before next sub-batch');
        try {
          await sleep(deps.backoffSeconds * 1000, options.signal);
        } catch (err) {
          // An abort during backoff is recorded at the top of the loop
          if (!options.signal?.aborted) throw err;
        }
      }
    }

    return {
      total: players.length,
      successful: results.length,
      failed: failures.length,
      cancelled,
      results,
      failures,
    };
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Rankings
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Successful players ordered by one score, highest first. Ties keep input order.
 */
export function getRankings(summary: BatchSummary, metric: ScoreName = 'composite_contribution'): RankingEntry[] {
  return summary.results
    .map((result) => ({
      playerId: result.playerId,
      name: result.name,
      score: result.scores[metric].score,
      metric,
    }))
    .sort((a, b) => b.score - a.score);
}
