/**
 * Metric Path Table
 *
 * Internal metric name → candidate paths into the stats API response, in
 * dot/bracket notation. Candidates are tried in order and the first one that
 * resolves to a number wins, so a renamed upstream field is handled by
 * appending its new path here.
 */

import type { MetricName } from '../types';

/** Subtree holding every per-player stat group. */
export const STATS_ROOT_PATH = 'data.playerseasonstats[0].player_stats.playerStats';

const at = (group: string, field: string): string => `${STATS_ROOT_PATH}.${group}.${field}`;

export const METRIC_PATHS: Readonly<Record<MetricName, readonly string[]>> = {
  // Unstructured play
  carries: [at('attack', 'carries')],
  metres_made: [at('attack', 'metresMade')],
  offloads: [at('attack', 'offload')],
  clean_breaks: [at('attack', 'cleanBreak')],
  defenders_beaten: [at('attack', 'defenderBeaten')],

  // Defence
  tackles: [at('defence', 'tackle')],
  missed_tackles: [at('defence', 'missedTackle')],
  turnovers_won: [at('defence', 'turnoverWon')],
  lineout_steals: [at('lineout', 'lineoutSteals')],
  tackle_success_pct: [at('defence', 'percentTackleMade')],

  // Discipline
  penalties_conceded: [at('discipline', 'penaltyConceded')],
  yellow_cards: [at('discipline', 'yellowCard')],
  red_cards: [at('discipline', 'redCard')],
};
