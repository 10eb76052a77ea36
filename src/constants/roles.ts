/**
 * Role Configuration
 *
 * Jersey numbers and positional-name fragments per role, and the weight
 * profile each role scores with.
 *
 *   FRONT_5   : props, hooker, locks (1-5)
 *   BACK_ROW  : flankers, number eight (6-8)
 *   HALF_BACKS: scrum-half, fly-half (9-10)
 *   BACKS     : wings, centres, full-back (11-15)
 */

import type { Role, WeightProfile } from '../types';

export const JERSEY_TO_ROLE: Readonly<Record<string, Role>> = {
  '1': 'FRONT_5',
  '2': 'FRONT_5',
  '3': 'FRONT_5',
  '4': 'FRONT_5',
  '5': 'FRONT_5',
  '6': 'BACK_ROW',
  '7': 'BACK_ROW',
  '8': 'BACK_ROW',
  '9': 'HALF_BACKS',
  '10': 'HALF_BACKS',
  '11': 'BACKS',
  '12': 'BACKS',
  '13': 'BACKS',
  '14': 'BACKS',
  '15': 'BACKS',
};

/**
 * Checked in order; the first role with a matching fragment wins. BACK_ROW
 * precedes BACKS because "back row" also contains "back".
 */
export const POSITION_KEYWORDS: ReadonlyArray<readonly [Role, readonly string[]]> = [
  ['FRONT_5', ['front', 'prop', 'hook', 'lock', 'second row', 'tighthead', 'loosehead']],
  [
    'BACK_ROW',
    ['back_row', 'back row', 'back-row', 'backrow', 'flanker', 'wing forward', 'wing-forward', 'number', 'eight', 'openside', 'blindside'],
  ],
  ['HALF_BACKS', ['half', 'scrum', 'fly']],
  ['BACKS', ['back', 'wing', 'centre', 'center', 'full']],
];

const blend = (unstructured: number, defensive: number, discipline: number) =>
  Object.freeze({ unstructured, defensive, discipline });

export const ROLE_PROFILES: Readonly<Record<Role, WeightProfile>> = Object.freeze({
  FRONT_5: Object.freeze({
    unstructured: Object.freeze({
      carries: 0.25,
      metres_made: 0.1,
      offloads: 0.1,
      clean_breaks: 0.1,
      defenders_beaten: 0.1,
    }),
    defensive: Object.freeze({
      tackles: 0.45,
      tackle_success_pct: 0.3,
      missed_tackles: -0.15,
      turnovers_won: 0.1,
    }),
    // Front-row penalties are the costliest
    discipline: Object.freeze({ penalties_conceded: -0.8, yellow_cards: -2.0, red_cards: -5.0 }),
    compositeBlend: blend(0.3, 0.5, 0.2),
  }),
  BACK_ROW: Object.freeze({
    unstructured: Object.freeze({
      carries: 0.3,
      metres_made: 0.15,
      offloads: 0.15,
      clean_breaks: 0.15,
      defenders_beaten: 0.15,
    }),
    defensive: Object.freeze({
      tackles: 0.4,
      tackle_success_pct: 0.3,
      missed_tackles: -0.15,
      turnovers_won: 0.15,
    }),
    discipline: Object.freeze({ penalties_conceded: -0.5, yellow_cards: -2.0, red_cards: -5.0 }),
    compositeBlend: blend(0.4, 0.4, 0.2),
  }),
  HALF_BACKS: Object.freeze({
    unstructured: Object.freeze({
      carries: 0.15,
      metres_made: 0.15,
      offloads: 0.25,
      clean_breaks: 0.2,
      defenders_beaten: 0.25,
    }),
    defensive: Object.freeze({
      tackles: 0.35,
      tackle_success_pct: 0.35,
      missed_tackles: -0.15,
      turnovers_won: 0.15,
    }),
    discipline: Object.freeze({ penalties_conceded: -0.5, yellow_cards: -2.0, red_cards: -5.0 }),
    compositeBlend: blend(0.45, 0.35, 0.2),
  }),
  BACKS: Object.freeze({
    unstructured: Object.freeze({
      carries: 0.2,
      metres_made: 0.3,
      offloads: 0.15,
      clean_breaks: 0.18,
      defenders_beaten: 0.17,
    }),
    defensive: Object.freeze({
      tackles: 0.3,
      tackle_success_pct: 0.35,
      missed_tackles: -0.2,
      turnovers_won: 0.1,
    }),
    discipline: Object.freeze({ penalties_conceded: -0.3, yellow_cards: -2.0, red_cards: -5.0 }),
    compositeBlend: blend(0.5, 0.3, 0.2),
  }),
});
