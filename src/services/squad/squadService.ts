/**
 * Squad roster extraction.
 * Turns a raw squad response into the player list and position details the
 * batch coordinator consumes.
 */

import { z } from 'zod';
import type { PlayerDetail, PlayerRef, RawResponse } from '../../types';
import { createLogger } from '../../utils/logger';
import { toFiniteNumber } from '../../utils/number';

const logger = createLogger('squadService');

// ─────────────────────────────────────────────────────────────────────────────
// Schemas (unknown fields pass through untouched)
// ─────────────────────────────────────────────────────────────────────────────

const idSchema = z.union([z.string(), z.number()]);
const optionalText = z.string().nullish();

const squadPlayerSchema = z.looseObject({
  playerId: idSchema.nullish(),
  playerFirstName: optionalText,
  playerLastName: optionalText,
  playerPosition: z.union([z.string(), z.number()]).nullish(),
  playerAge: z.unknown(),
  nationalTeam: optionalText,
});

const squadResponseSchema = z.looseObject({
  data: z.looseObject({
    playerThemeSettings: z.looseObject({
      squads: z.array(z.looseObject({ squad: z.array(z.unknown()) })),
    }),
  }),
});

export type SquadPlayer = z.infer<typeof squadPlayerSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Roster entries in order. The envelope must parse; a bad entry is skipped
 * on its own.
 */
function parseSquadPlayers(raw: RawResponse): SquadPlayer[] | null {
  const result = squadResponseSchema.safeParse(raw);
  if (!result.success) {
    logger.error({ issues: formatIssues(result.error) }, 'Failed to read squad response');
    return null;
  }

  const entries = result.data.data.playerThemeSettings.squads.flatMap((group) => group.squad);
  return entries.flatMap((entry, index) => {
    const player = squadPlayerSchema.safeParse(entry);
    if (player.success) return [player.data];
    logger.warn({ index, issues: formatIssues(player.error) }, 'Skipping malformed squad entry');
    return [];
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Extraction
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ordered `{ playerId, name }` pairs. Entries without an id are skipped;
 * a malformed response yields `[]`.
 */
export function extractPlayerIds(raw: RawResponse): PlayerRef[] {
  const players = parseSquadPlayers(raw) ?? [];
  return players.flatMap((player) => {
    if (player.playerId === null || player.playerId === undefined) return [];
    const name = `${player.playerFirstName ?? ''} ${player.playerLastName ?? ''}`.trim();
    return [{ playerId: String(player.playerId), name }];
  });
}

export function extractSquadDetails(raw: RawResponse): PlayerDetail[] {
  const players = parseSquadPlayers(raw) ?? [];
  return players.map((player) => ({
    playerId: player.playerId ?? null,
    firstName: player.playerFirstName ?? null,
    lastName: player.playerLastName ?? null,
    position:
      player.playerPosition === null || player.playerPosition === undefined ? null : String(player.playerPosition),
    age: toFiniteNumber(player.playerAge),
    nationality: player.nationalTeam ?? null,
  }));
}
