export const UNSTRUCTURED_METRICS = [
  'carries',
  'metres_made',
  'offloads',
  'clean_breaks',
  'defenders_beaten',
] as const;

export const DEFENSIVE_METRICS = [
  'tackles',
  'missed_tackles',
  'turnovers_won',
  'lineout_steals',
  'tackle_success_pct',
] as const;

export const DISCIPLINE_METRICS = ['penalties_conceded', 'yellow_cards', 'red_cards'] as const;

/** The fixed internal vocabulary. Every extraction yields exactly these keys. */
export const METRIC_NAMES = [...UNSTRUCTURED_METRICS, ...DEFENSIVE_METRICS, ...DISCIPLINE_METRICS] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/** `null` marks a metric the response didn't carry. It is never a stand-in for zero. */
export type MetricValue = number | null;

export type ExtractedMetrics = Readonly<Record<MetricName, MetricValue>>;

/** Opaque JSON tree as returned by the stats API. */
export type RawResponse = unknown;

/** One accessor of a path: object key or array index. */
export type PathSegment = string | number;

export type MetricPath = readonly PathSegment[];

/**
 * Build a full metric record by evaluating `fn` once per vocabulary entry.
 */
export function mapMetrics(fn: (name: MetricName) => MetricValue): ExtractedMetrics {
  return Object.freeze({
    carries: fn('carries'),
    metres_made: fn('metres_made'),
    offloads: fn('offloads'),
    clean_breaks: fn('clean_breaks'),
    defenders_beaten: fn('defenders_beaten'),
    tackles: fn('tackles'),
    missed_tackles: fn('missed_tackles'),
    turnovers_won: fn('turnovers_won'),
    lineout_steals: fn('lineout_steals'),
    tackle_success_pct: fn('tackle_success_pct'),
    penalties_conceded: fn('penalties_conceded'),
    yellow_cards: fn('yellow_cards'),
    red_cards: fn('red_cards'),
  });
}
