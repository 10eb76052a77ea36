import type { ExtractedMetrics, MetricName } from './metrics';

export const ROLES = ['FRONT_5', 'BACK_ROW', 'HALF_BACKS', 'BACKS'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Normalization
// ─────────────────────────────────────────────────────────────────────────────

export type NormalizationBasis = 'per_80_minutes' | 'per_appearance' | 'raw';

export interface NormalizationNotes {
  minutesPlayed?: number;
  appearances?: number;
  /** True when neither minutes nor appearances were usable. */
  degraded: boolean;
}

export interface NormalizedMetrics {
  raw: ExtractedMetrics;
  /** Populated only when `basis` is `per_80_minutes`. */
  per80Minutes: ExtractedMetrics | null;
  /** Populated only when `basis` is `per_appearance`. */
  perAppearance: ExtractedMetrics | null;
  basis: NormalizationBasis;
  notes: NormalizationNotes;
}

// ─────────────────────────────────────────────────────────────────────────────
// Weights and scores
// ─────────────────────────────────────────────────────────────────────────────

/** Signed per-metric weights. Negative entries are penalties. */
export type MetricWeights = Readonly<Partial<Record<MetricName, number>>>;

export interface BlendWeights {
  readonly unstructured: number;
  readonly defensive: number;
  readonly discipline: number;
}

export type BlendComponent = keyof BlendWeights;

export interface WeightProfile {
  readonly unstructured: MetricWeights;
  readonly defensive: MetricWeights;
  readonly discipline: MetricWeights;
  readonly compositeBlend: BlendWeights;
}

export type ScalingCurve =
  | { readonly kind: 'linear'; readonly benchmark: number }
  | { readonly kind: 'percentage' };

export interface ScoreResult<K extends string = MetricName> {
  /** Always within [0, 100], rounded to 2 decimals. */
  score: number;
  /** Value used per component, `null` where the input was absent. */
  components: Readonly<Partial<Record<K, number | null>>>;
  method: string;
}

export interface AllScores {
  unstructured_impact: ScoreResult;
  defensive_reliability: ScoreResult;
  discipline_risk: ScoreResult;
  /** Components hold each sub-score's share of the final number. */
  composite_contribution: ScoreResult<BlendComponent>;
}

export type ScoreName = keyof AllScores;

export const SCORE_NAMES: readonly ScoreName[] = [
  'unstructured_impact',
  'defensive_reliability',
  'discipline_risk',
  'composite_contribution',
];

export function isScoreName(value: string): value is ScoreName {
  return SCORE_NAMES.some((name) => name === value);
}
