/**
 * Command-line surface.
 *
 *   npm start -- player <playerId> [--minutes N] [--appearances N] [--position P] [--season S]
 *   npm start -- squad <clubId> [--minutes N] [--appearances N] [--rank METRIC] [--season S]
 *   npm start -- inspect <file.json>
 *
 * Results go to stdout as JSON; logs go to stderr. Exit codes: 0 success,
 * 1 usage error or a failed single player, 2 a squad batch with failures.
 */

import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { AppError } from './errors';
import {
  createBatchDeps,
  getRankings,
  processBatch,
  processPlayer,
  type BatchDeps,
} from './services/batch';
import { extractMetrics, findUnmappedStatFields, summarizeExtraction } from './services/scoring';
import { extractPlayerIds, extractSquadDetails } from './services/squad';
import { isScoreName, SCORE_NAMES, type RawResponse, type ScoreName } from './types';
import { createLogger } from './utils/logger';
import { fetchSquad } from './utils/urc/urcClient';

const logger = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_BATCH_FAILURES = 2;

export const USAGE = [
  'Usage: npm start -- <command> [options]',
  '',
  'Commands:',
  '  player <playerId>   Score one player',
  '    --minutes N --appearances N --position P --season S',
  '  squad <clubId>      Score and rank a club roster',
  `    --minutes N --appearances N --rank ${SCORE_NAMES.join('|')} --season S`,
  '  inspect <file>      Report metric coverage for a saved raw response',
].join('\n');

export interface CliDeps extends BatchDeps {
  fetchSquad: (clubId: string) => Promise<RawResponse>;
  readFile: (path: string) => Promise<string>;
  write: (line: string) => void;
  writeError: (line: string) => void;
}

export function createCliDeps(): CliDeps {
  return {
    ...createBatchDeps(),
    fetchSquad: (clubId) => fetchSquad(clubId),
    readFile: (path) => readFile(path, 'utf8'),
    write: (line) => console.log(line),
    writeError: (line) => console.error(line),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Argument parsing
// ─────────────────────────────────────────────────────────────────────────────

interface ParsedOptions {
  minutes?: string;
  appearances?: string;
  position?: string;
  season?: string;
  rank?: string;
}

function parseCommandLine(argv: readonly string[]): { positionals: string[]; options: ParsedOptions } {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      minutes: { type: 'string' },
      appearances: { type: 'string' },
      position: { type: 'string' },
      season: { type: 'string' },
      rank: { type: 'string' },
    },
  });
  return { positionals, options: values };
}

function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw AppError.badRequest(`--${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function parseSeason(value: string | undefined, fallback: number): number {
  const season = parseNumberOption('season', value);
  if (season === undefined) return fallback;
  if (!Number.isSafeInteger(season) || season <= 0) {
    throw AppError.badRequest(`--season must be a positive integer, got "${value}"`);
  }
  return season;
}

function parseRank(value: string | undefined): ScoreName {
  if (value === undefined) return 'composite_contribution';
  if (!isScoreName(value)) {
    throw AppError.badRequest(`--rank must be one of ${SCORE_NAMES.join(', ')}, got "${value}"`);
  }
  return value;
}

function requirePositional(positionals: readonly string[], label: string): string {
  const value = positionals[1];
  if (value === undefined || value.trim() === '') {
    throw AppError.badRequest(`Missing ${label}`);
  }
  return value;
}

function printJson(deps: CliDeps, value: unknown): void {
  deps.write(JSON.stringify(value, null, 2));
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

async function runPlayer(positionals: string[], options: ParsedOptions, deps: CliDeps): Promise<number> {
  const playerId = requirePositional(positionals, '<playerId>');
  const seasonId = parseSeason(options.season, deps.seasonId);

  const outcome = await processPlayer(
    { playerId, name: `Player ${playerId}` },
    {
      minutesPlayed: parseNumberOption('minutes', options.minutes),
      appearances: parseNumberOption('appearances', options.appearances),
      position: options.position ?? null,
    },
    { ...deps, seasonId },
  );

  printJson(deps, outcome);
  return outcome.status === 'success' ? EXIT_OK : EXIT_USAGE;
}

async function runSquad(
  positionals: string[],
  options: ParsedOptions,
  deps: CliDeps,
  signal: AbortSignal | undefined,
): Promise<number> {
  const clubId = requirePositional(positionals, '<clubId>');
  const seasonId = parseSeason(options.season, deps.seasonId);
  const rank = parseRank(options.rank);
  const minutesPlayed = parseNumberOption('minutes', options.minutes);
  const appearances = parseNumberOption('appearances', options.appearances);

  const rawSquad = await deps.fetchSquad(clubId);
  const players = extractPlayerIds(rawSquad);
  if (players.length === 0) {
    deps.writeError(`No players found for club ${clubId}`);
    return EXIT_USAGE;
  }

  const summary = await processBatch(
    players,
    { minutesPlayed, appearances, details: extractSquadDetails(rawSquad), signal },
    { ...deps, seasonId },
  );
  const rankings = getRankings(summary, rank);

  printJson(deps, { summary, rankings });
  return summary.failed > 0 ? EXIT_BATCH_FAILURES : EXIT_OK;
}

async function runInspect(positionals: string[], deps: CliDeps): Promise<number> {
  const file = requirePositional(positionals, '<file>');
  const text = await deps.readFile(file);

  let raw: RawResponse;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw AppError.badRequest(`${file} is not valid JSON`, { cause: err instanceof Error ? err.message : String(err) });
  }

  const metrics = extractMetrics(raw);
  printJson(deps, {
    metrics,
    summary: summarizeExtraction(metrics),
    unmappedFields: findUnmappedStatFields(raw),
  });
  return EXIT_OK;
}

/**
 * Run one command and resolve to its exit code. Never throws. `signal`
 * cancels a squad run between sub-batches.
 */
export async function runCli(argv: readonly string[], deps: CliDeps, signal?: AbortSignal): Promise<number> {
  try {
    const { positionals, options } = parseCommandLine(argv);
    const [command] = positionals;

    switch (command) {
      case 'player':
        return await runPlayer(positionals, options, deps);
      case 'squad':
        return await runSquad(positionals, options, deps, signal);
      case 'inspect':
        return await runInspect(positionals, deps);
      default:
        deps.writeError(command === undefined ? USAGE : `Unknown command "${command}"\n\n${USAGE}`);
        return EXIT_USAGE;
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ err }, 'Command failed');
    deps.writeError(`Error: ${message}`);
    return EXIT_USAGE;
  }
}
