/**
 * Normalizer
 *
 * Rescales counting metrics to a per-80-minutes or per-appearance basis.
 * Precedence is fixed: minutes first, then appearances, then raw. Absent
 * inputs stay absent in every view.
 */

import { MINUTES_PER_MATCH, NORMALIZABLE_METRICS } from '../../constants/scoring';
import { mapMetrics, type ExtractedMetrics, type NormalizedMetrics } from '../../types';
import { createLogger } from '../../utils/logger';
import { normalizeToHundredth, positiveOrNull } from '../../utils/number';

const logger = createLogger('normalizer');

const normalizable = new Set(NORMALIZABLE_METRICS);

function scaleMetrics(extracted: ExtractedMetrics, factor: number): ExtractedMetrics {
  return mapMetrics((name) => {
    const value = extracted[name];
    if (value === null || !normalizable.has(name)) return value;
    return normalizeToHundredth(value * factor);
  });
}

export function normalizeMetrics(
  extracted: ExtractedMetrics,
  minutesPlayed?: number | null,
  appearances?: number | null,
): NormalizedMetrics {
  const minutes = positiveOrNull(minutesPlayed);
  if (minutes !== null) {
    return {
      raw: extracted,
      per80Minutes: scaleMetrics(extracted, MINUTES_PER_MATCH / minutes),
      perAppearance: null,
      basis: 'per_80_minutes',
      notes: { minutesPlayed: minutes, degraded: false },
    };
  }

  const games = positiveOrNull(appearances);
  if (games !== null) {
    return {
      raw: extracted,
      per80Minutes: null,
      perAppearance: scaleMetrics(extracted, 1 / games),
      basis: 'per_appearance',
      notes: { appearances: games, degraded: false },
    };
  }

  logger.warn(
    { minutesPlayed: minutesPlayed ?? null, appearances: appearances ?? null },
    'No minutes or appearances provided; scoring raw season totals',
  );
  return {
    raw: extracted,
    per80Minutes: null,
    perAppearance: null,
    basis: 'raw',
    notes: { degraded: true },
  };
}

/**
 * The view scoring should read: per-80-minutes, else per-appearance, else raw.
 */
export function selectScoringView(normalized: NormalizedMetrics): ExtractedMetrics {
  return normalized.per80Minutes ?? normalized.perAppearance ?? normalized.raw;
}
