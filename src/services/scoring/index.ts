export {
  extractMetrics,
  parseMetricPath,
  formatMetricPath,
  resolvePath,
  summarizeExtraction,
  logMappingReport,
  findUnmappedStatFields,
  type MetricPathTable,
  type ExtractionSummary,
} from './fieldMapper';
export { normalizeMetrics, selectScoringView } from './normalizer';
export {
  resolveRole,
  resolveScoringRole,
  getRoleProfile,
  getWeightProfile,
  type RoleFallback,
} from './roleResolver';
export {
  computeAllScores,
  computeUnstructuredImpact,
  computeDefensiveReliability,
  computeDisciplineRisk,
  computeCompositeContribution,
  scaleMetric,
  type SubScoreOptions,
} from './scoringEngine';
