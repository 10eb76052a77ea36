/**
 * Types barrel export
 */

export {
  METRIC_NAMES,
  UNSTRUCTURED_METRICS,
  DEFENSIVE_METRICS,
  DISCIPLINE_METRICS,
  mapMetrics,
  type MetricName,
  type MetricValue,
  type ExtractedMetrics,
  type RawResponse,
  type PathSegment,
  type MetricPath,
} from './metrics';

export {
  ROLES,
  SCORE_NAMES,
  isRole,
  isScoreName,
  type Role,
  type NormalizationBasis,
  type NormalizationNotes,
  type NormalizedMetrics,
  type MetricWeights,
  type BlendWeights,
  type BlendComponent,
  type WeightProfile,
  type ScalingCurve,
  type ScoreResult,
  type AllScores,
  type ScoreName,
} from './scoring';

export type {
  PlayerRef,
  PlayerDetail,
  PlayerResult,
  PlayerFailure,
  PlayerOutcome,
  BatchSummary,
  RankingEntry,
} from './batch';
