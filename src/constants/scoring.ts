/**
 * Scoring Configuration
 *
 * Global default weights and per-metric scaling curves. Role-specific
 * profiles live in `./roles`.
 */

import type { MetricName, ScalingCurve, WeightProfile } from '../types';

/** Counting metrics rescaled by playing time. Percentages and cards are left alone. */
export const NORMALIZABLE_METRICS: readonly MetricName[] = [
  'carries',
  'metres_made',
  'offloads',
  'clean_breaks',
  'defenders_beaten',
  'tackles',
  'missed_tackles',
  'turnovers_won',
  'lineout_steals',
  'penalties_conceded',
];

export const MINUTES_PER_MATCH = 80;

/**
 * Value that maps to a full-scale contribution. Benchmarks are per 80
 * minutes, so they read as "an exceptional match".
 */
export const SCALING_CURVES: Readonly<Partial<Record<MetricName, ScalingCurve>>> = {
  carries: { kind: 'linear', benchmark: 60 },
  metres_made: { kind: 'linear', benchmark: 150 },
  offloads: { kind: 'linear', benchmark: 10 },
  clean_breaks: { kind: 'linear', benchmark: 8 },
  defenders_beaten: { kind: 'linear', benchmark: 15 },
  tackles: { kind: 'linear', benchmark: 40 },
  missed_tackles: { kind: 'linear', benchmark: 12 },
  turnovers_won: { kind: 'linear', benchmark: 6 },
  lineout_steals: { kind: 'linear', benchmark: 4 },
  tackle_success_pct: { kind: 'percentage' },
};

export const DEFAULT_WEIGHT_PROFILE: WeightProfile = Object.freeze({
  unstructured: Object.freeze({
    carries: 0.2,
    metres_made: 0.25,
    offloads: 0.15,
    clean_breaks: 0.2,
    defenders_beaten: 0.2,
  }),
  defensive: Object.freeze({
    tackles: 0.4,
    tackle_success_pct: 0.35,
    missed_tackles: -0.15,
    turnovers_won: 0.1,
  }),
  // Raw per-event costs, not fractions
  discipline: Object.freeze({
    penalties_conceded: -0.5,
    yellow_cards: -2.0,
    red_cards: -5.0,
  }),
  compositeBlend: Object.freeze({
    unstructured: 0.4,
    defensive: 0.4,
    discipline: 0.2,
  }),
});

/** Floor for the summed discipline cost before it is added to 100. */
export const DISCIPLINE_COST_FLOOR = -100;
