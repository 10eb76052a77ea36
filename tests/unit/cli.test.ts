import { describe, it, expect, vi } from 'vitest';
import { runCli, USAGE, type CliDeps } from '../../src/cli';
import { AppError } from '../../src/errors';
import type { RawResponse } from '../../src/types';
import { createSquadPlayer, createSquadResponse, createStatsResponse } from '../fixtures/factories';

vi.mock('../../src/utils/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

function makeDeps(overrides: Partial<Omit<CliDeps, 'write' | 'writeError'>> = {}) {
  const deps = {
    fetchStats: vi.fn(async (): Promise<RawResponse> => createStatsResponse()),
    fetchSquad: vi.fn(
      async (): Promise<RawResponse> =>
        createSquadResponse([
          createSquadPlayer({ playerId: 1, playerFirstName: 'Pat', playerLastName: 'Prop', playerPosition: 'Prop' }),
          createSquadPlayer({ playerId: 2, playerFirstName: 'Wes', playerLastName: 'Wing', playerPosition: 'Wing' }),
        ]),
    ),
    readFile: vi.fn(async (): Promise<string> => '{}'),
    write: vi.fn<(line: string) => void>(),
    writeError: vi.fn<(line: string) => void>(),
    seasonId: 202501,
    backoffSeconds: 0,
    roleFallback: 'DEFAULT' as const,
    sleep: vi.fn(async () => undefined),
  };
  return { ...deps, ...overrides } satisfies CliDeps;
}

function output(deps: ReturnType<typeof makeDeps>): unknown {
  expect(deps.write).toHaveBeenCalledTimes(1);
  return JSON.parse(deps.write.mock.calls[0][0]);
}

describe('runCli', () => {
  // ─── Usage ───────────────────────────────────────────────────────

  it('prints usage and exits 1 without a command', async () => {
    const deps = makeDeps();
    expect(await runCli([], deps)).toBe(1);
    expect(deps.writeError).toHaveBeenCalledWith(USAGE);
  });

  it('rejects an unknown command', async () => {
    const deps = makeDeps();
    expect(await runCli(['rank'], deps)).toBe(1);
    expect(deps.writeError).toHaveBeenCalledWith(`Unknown command "rank"\n\n${USAGE}`);
  });

  it('rejects an unknown option', async () => {
    const deps = makeDeps();
    expect(await runCli(['player', '7', '--bogus', '1'], deps)).toBe(1);
    expect(deps.writeError).toHaveBeenCalledTimes(1);
    expect(deps.write).not.toHaveBeenCalled();
  });

  // ─── player ──────────────────────────────────────────────────────

  describe('player', () => {
    it('scores one player and prints the outcome', async () => {
      const deps = makeDeps();
      expect(await runCli(['player', '7', '--minutes', '80'], deps)).toBe(0);

      expect(deps.fetchStats).toHaveBeenCalledWith('7', 202501);
      expect(output(deps)).toMatchObject({
        status: 'success',
        result: {
          playerId: '7',
          name: 'Player 7',
          role: null,
          normalizedMetrics: { basis: 'per_80_minutes' },
          scores: { composite_contribution: { score: 62.38 } },
        },
      });
    });

    it('uses the given position and season', async () => {
      const deps = makeDeps();
      await runCli(['player', '7', '--minutes', '80', '--position', '6', '--season', '202401'], deps);

      expect(deps.fetchStats).toHaveBeenCalledWith('7', 202401);
      expect(output(deps)).toMatchObject({ result: { position: '6', role: 'BACK_ROW' } });
    });

    it('exits 1 and prints the failure when the player fails', async () => {
      const deps = makeDeps({
        fetchStats: vi.fn(async (): Promise<RawResponse> => {
          throw new Error('socket hang up');
        }),
      });
      expect(await runCli(['player', '7'], deps)).toBe(1);
      expect(output(deps)).toMatchObject({ status: 'failure', failure: { kind: 'generic', error: 'socket hang up' } });
    });

    it('rejects a non-numeric option', async () => {
      const deps = makeDeps();
      expect(await runCli(['player', '7', '--minutes', 'abc'], deps)).toBe(1);
      expect(deps.writeError).toHaveBeenCalledWith('Error: --minutes must be a number, got "abc"');
      expect(deps.fetchStats).not.toHaveBeenCalled();
    });

    it('rejects a bad season', async () => {
      const deps = makeDeps();
      expect(await runCli(['player', '7', '--season', '2.5'], deps)).toBe(1);
      expect(deps.writeError).toHaveBeenCalledWith('Error: --season must be a positive integer, got "2.5"');
    });

    it('requires a player id', async () => {
      const deps = makeDeps();
      expect(await runCli(['player'], deps)).toBe(1);
      expect(deps.writeError).toHaveBeenCalledWith('Error: Missing <playerId>');
    });
  });

  // ─── squad ───────────────────────────────────────────────────────

  describe('squad', () => {
    it('scores the roster and prints summary and rankings', async () => {
      const deps = makeDeps();
      expect(await runCli(['squad', '5356', '--minutes', '80'], deps)).toBe(0);

      expect(deps.fetchSquad).toHaveBeenCalledWith('5356');
      expect(deps.fetchStats).toHaveBeenCalledTimes(2);

      const printed = output(deps);
      expect(printed).toMatchObject({ summary: { total: 2, successful: 2, failed: 0, cancelled: false } });
      expect(printed).toHaveProperty('rankings');
    });

    it('resolves roles from roster positions', async () => {
      const deps = makeDeps();
      await runCli(['squad', '5356', '--minutes', '80'], deps);

      expect(output(deps)).toMatchObject({
        summary: {
          results: [
            { playerId: '1', name: 'Pat Prop', role: 'FRONT_5' },
            { playerId: '2', name: 'Wes Wing', role: 'BACKS' },
          ],
        },
      });
    });

    it('ranks by the requested score', async () => {
      const deps = makeDeps();
      await runCli(['squad', '5356', '--rank', 'discipline_risk'], deps);

      // One penalty costs a prop 0.8 and a wing 0.3
      expect(output(deps)).toMatchObject({
        rankings: [
          { playerId: '2', score: 99.7, metric: 'discipline_risk' },
          { playerId: '1', score: 99.2, metric: 'discipline_risk' },
        ],
      });
    });

    it('rejects an unknown ranking metric', async () => {
      const deps = makeDeps();
      expect(await runCli(['squad', '5356', '--rank', 'speed'], deps)).toBe(1);
      expect(deps.writeError).toHaveBeenCalledWith(
        'Error: --rank must be one of unstructured_impact, defensive_reliability, discipline_risk, composite_contribution, got "speed"',
      );
    });

    it('exits 2 when some players failed', async () => {
      const deps = makeDeps({
        fetchStats: vi.fn(async (playerId: string): Promise<RawResponse> =>
          playerId === '2' ? { errors: [{ message: 'bad id' }] } : createStatsResponse(),
        ),
      });
      expect(await runCli(['squad', '5356'], deps)).toBe(2);
      expect(output(deps)).toMatchObject({ summary: { successful: 1, failed: 1 } });
    });

    it('exits 1 for an empty roster', async () => {
      const deps = makeDeps({ fetchSquad: vi.fn(async (): Promise<RawResponse> => createSquadResponse([])) });
      expect(await runCli(['squad', '5356'], deps)).toBe(1);
      expect(deps.writeError).toHaveBeenCalledWith('No players found for club 5356');
    });

    it('exits 1 when the roster request fails', async () => {
      const deps = makeDeps({
        fetchSquad: vi.fn(async (): Promise<RawResponse> => {
          throw AppError.tooManyRequests('HTTP 429 Too Many Requests');
        }),
      });
      expect(await runCli(['squad', '5356'], deps)).toBe(1);
      expect(deps.writeError).toHaveBeenCalledWith('Error: HTTP 429 Too Many Requests');
    });

    it('reports a cancelled run', async () => {
      const controller = new AbortController();
      controller.abort();
      const deps = makeDeps();

      expect(await runCli(['squad', '5356'], deps, controller.signal)).toBe(0);
      expect(output(deps)).toMatchObject({ summary: { total: 2, successful: 0, cancelled: true }, rankings: [] });
    });
  });

  // ─── inspect ─────────────────────────────────────────────────────

  describe('inspect', () => {
    it('reports coverage and unmapped fields of a saved response', async () => {
      const deps = makeDeps({
        readFile: vi.fn(async () => JSON.stringify(createStatsResponse({ attack: { kicks: 2 } }))),
      });
      expect(await runCli(['inspect', 'saved.json'], deps)).toBe(0);

      expect(deps.readFile).toHaveBeenCalledWith('saved.json');
      expect(output(deps)).toMatchObject({
        metrics: { carries: 30, red_cards: 0 },
        summary: { found: 13, total: 13, missing: [] },
        unmappedFields: ['data.playerseasonstats[0].player_stats.playerStats.attack.kicks'],
      });
    });

    it('exits 1 for a file that is not JSON', async () => {
      const deps = makeDeps({ readFile: vi.fn(async () => 'not json') });
      expect(await runCli(['inspect', 'bad.json'], deps)).toBe(1);
      expect(deps.writeError).toHaveBeenCalledWith('Error: bad.json is not valid JSON');
    });
  });
});
