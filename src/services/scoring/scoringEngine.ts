/**
 * Scoring Engine
 *
 * Three weighted sub-scores and a composite blend, each on a 0-100 scale:
 *
 *   unstructured_impact  : carries, metres, offloads, breaks, defenders beaten
 *   defensive_reliability: tackles, success %, missed tackles, turnovers
 *   discipline_risk      : 100 = clean record, minus penalty and card costs
 *   composite_contribution: blend of the three, divided by the blend's sum
 *
 * Each weighted metric is scaled to a fraction of its benchmark (see
 * `SCALING_CURVES`), clamped to [0, 1], multiplied by its signed weight and
 * summed. Absent metrics are left out of the sum rather than counted as zero,
 * so a player with gaps in their data has a narrower reachable range.
 */

import { DISCIPLINE_COST_FLOOR, SCALING_CURVES } from '../../constants/scoring';
import {
  METRIC_NAMES,
  type AllScores,
  type BlendComponent,
  type BlendWeights,
  type ExtractedMetrics,
  type MetricName,
  type MetricWeights,
  type NormalizedMetrics,
  type Role,
  type ScoreResult,
} from '../../types';
import { clamp, normalizeToHundredth } from '../../utils/number';
import { getWeightProfile } from './roleResolver';
import { selectScoringView } from './normalizer';

export interface SubScoreOptions {
  /** Explicit weights win over the role's. */
  weights?: MetricWeights;
  role?: Role | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function weightEntries(weights: MetricWeights): Array<[MetricName, number]> {
  return METRIC_NAMES.flatMap((name) => {
    const weight = weights[name];
    if (weight === undefined) return [];
    const entry: [MetricName, number] = [name, weight];
    return [entry];
  });
}

/**
 * Fraction of the metric's benchmark, clamped to [0, 1]. Percentages are
 * already on a 0-100 scale.
 */
export function scaleMetric(metric: MetricName, value: number): number {
  const curve = SCALING_CURVES[metric];
  const fraction = curve?.kind === 'linear' ? value / curve.benchmark : value / 100;
  return clamp(fraction, 0, 1);
}

function methodTag(base: string, role: Role | null | undefined): string {
  return role ? `${base} [${role} weights]` : base;
}

function weightedSubScore(metrics: ExtractedMetrics, weights: MetricWeights, method: string): ScoreResult {
  const components: Partial<Record<MetricName, number | null>> = {};
  let total = 0;

  for (const [metric, weight] of weightEntries(weights)) {
    const value = metrics[metric];
    components[metric] = value;
    if (value === null) continue;
    total += scaleMetric(metric, value) * weight;
  }

  return {
    score: normalizeToHundredth(clamp(total * 100, 0, 100)),
    components,
    method,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Sub-scores
// ─────────────────────────────────────────────────────────────────────────────

export function computeUnstructuredImpact(metrics: ExtractedMetrics, options: SubScoreOptions = {}): ScoreResult {
  const weights = options.weights ?? getWeightProfile(options.role).unstructured;
  return weightedSubScore(metrics, weights, methodTag('weighted attack metrics (0-100)', options.role));
}

export function computeDefensiveReliability(metrics: ExtractedMetrics, options: SubScoreOptions = {}): ScoreResult {
  const weights = options.weights ?? getWeightProfile(options.role).defensive;
  return weightedSubScore(metrics, weights, methodTag('weighted defence metrics (0-100)', options.role));
}

/**
 * Discipline weights are per-event costs applied to raw counts, so the
 * result reads as 100 minus the (floored) total cost.
 */
export function computeDisciplineRisk(metrics: ExtractedMetrics, options: SubScoreOptions = {}): ScoreResult {
  const weights = options.weights ?? getWeightProfile(options.role).discipline;
  const components: Partial<Record<MetricName, number | null>> = {};
  let cost = 0;

  for (const [metric, weight] of weightEntries(weights)) {
    const value = metrics[metric];
    components[metric] = value;
    if (value === null) continue;
    cost += value * weight;
  }

  const score = clamp(100 + Math.max(DISCIPLINE_COST_FLOOR, cost), 0, 100);
  return {
    score: normalizeToHundredth(score),
    components,
    method: methodTag('weighted discipline costs (0-100)', options.role),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Composite
// ─────────────────────────────────────────────────────────────────────────────

export function computeCompositeContribution(
  subScores: Readonly<Record<BlendComponent, number>>,
  options: { blend?: BlendWeights; role?: Role | null } = {},
): ScoreResult<BlendComponent> {
  const blend = options.blend ?? getWeightProfile(options.role).compositeBlend;
  const totalWeight = blend.unstructured + blend.defensive + blend.discipline;
  const share = (component: BlendComponent): number =>
    totalWeight > 0 ? (subScores[component] * blend[component]) / totalWeight : 0;
  const percent = (component: BlendComponent): number =>
    totalWeight > 0 ? Math.round((blend[component] / totalWeight) * 100) : 0;

  const composite = clamp(share('unstructured') + share('defensive') + share('discipline'), 0, 100);

  return {
    score: normalizeToHundredth(composite),
    components: {
      unstructured: normalizeToHundredth(share('unstructured')),
      defensive: normalizeToHundredth(share('defensive')),
      discipline: normalizeToHundredth(share('discipline')),
    },
    method: methodTag(
      `composite blend (attack ${percent('unstructured')}%, defence ${percent('defensive')}%, discipline ${percent('discipline')}%)`,
      options.role,
    ),
  };
}

function isNormalizedMetrics(input: NormalizedMetrics | ExtractedMetrics): input is NormalizedMetrics {
  return 'basis' in input;
}

/**
 * Score a player. Reads the best normalized view available; plain extracted
 * metrics are scored as raw totals. No role means the global default weights.
 */
export function computeAllScores(input: NormalizedMetrics | ExtractedMetrics, role?: Role | null): AllScores {
  const metrics = isNormalizedMetrics(input) ? selectScoringView(input) : input;

  const unstructured = computeUnstructuredImpact(metrics, { role });
  const defensive = computeDefensiveReliability(metrics, { role });
  const discipline = computeDisciplineRisk(metrics, { role });
  const composite = computeCompositeContribution(
    { unstructured: unstructured.score, defensive: defensive.score, discipline: discipline.score },
    { role },
  );

  return {
    unstructured_impact: unstructured,
    defensive_reliability: defensive,
    discipline_risk: discipline,
    composite_contribution: composite,
  };
}
