/**
 * Field Mapper
 *
 * Pulls the fixed metric vocabulary out of a raw stats response using the
 * declarative path table in `constants/metricPaths`. Missing keys, wrong
 * types and out-of-range indexes resolve to absence (`null`); nothing here
 * throws on response shape.
 */

import { METRIC_PATHS, STATS_ROOT_PATH } from '../../constants/metricPaths';
import {
  METRIC_NAMES,
  mapMetrics,
  type ExtractedMetrics,
  type MetricName,
  type MetricPath,
  type PathSegment,
  type RawResponse,
} from '../../types';
import { createLogger } from '../../utils/logger';
import { toFiniteNumber } from '../../utils/number';

const logger = createLogger('fieldMapper');

export type MetricPathTable = Readonly<Record<MetricName, readonly string[]>>;

// ─────────────────────────────────────────────────────────────────────────────
// Path parsing and resolution
// ─────────────────────────────────────────────────────────────────────────────

const PATH_TOKEN = /([^.[\]]+)|\[(\d+)\]/g;

/**
 * Parse `a.b[0].c` into `['a', 'b', 0, 'c']`.
 * Throws on anything the tokenizer can't fully consume, since path tables
 * are static configuration.
 */
export function parseMetricPath(path: string): MetricPath {
  const segments: PathSegment[] = [];
  let consumed = '';
  for (const match of path.matchAll(PATH_TOKEN)) {
    const [token, key, index] = match;
    segments.push(index !== undefined ? Number(index) : key);
    consumed += token;
  }
  if (segments.length === 0 || consumed !== path.replace(/\.(?=[^.])/g, '')) {
    throw new Error(`Invalid metric path: "${path}"`);
  }
  return segments;
}

export function formatMetricPath(segments: MetricPath): string {
  return segments
    .map((segment, i) => (typeof segment === 'number' ? `[${segment}]` : i === 0 ? segment : `.${segment}`))
    .join('');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk `raw` along `path`. Returns `undefined` as soon as a step can't be
 * taken, or when it lands on `null`.
 */
export function resolvePath(raw: RawResponse, path: MetricPath): unknown {
  let current: unknown = raw;
  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current) || segment >= current.length) return undefined;
      current = current[segment];
    } else {
      if (!isPlainObject(current) || !Object.hasOwn(current, segment)) return undefined;
      current = current[segment];
    }
    if (current === null || current === undefined) return undefined;
  }
  return current;
}

function compileTable(table: MetricPathTable): ReadonlyMap<MetricName, readonly MetricPath[]> {
  return new Map(METRIC_NAMES.map((name) => [name, table[name].map(parseMetricPath)] as const));
}

const DEFAULT_COMPILED = compileTable(METRIC_PATHS);

// ─────────────────────────────────────────────────────────────────────────────
// Extraction
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Extract every metric of the vocabulary. Candidate paths are tried in order;
 * the first that yields a finite number (or numeric string) wins.
 */
export function extractMetrics(raw: RawResponse, table?: MetricPathTable): ExtractedMetrics {
  const compiled = table ? compileTable(table) : DEFAULT_COMPILED;

  return mapMetrics((name) => {
    for (const path of compiled.get(name) ?? []) {
      const value = toFiniteNumber(resolvePath(raw, path));
      if (value !== null) return value;
    }
    return null;
  });
}

export interface ExtractionSummary {
  found: number;
  total: number;
  missing: MetricName[];
}

export function summarizeExtraction(extracted: ExtractedMetrics): ExtractionSummary {
  const missing = METRIC_NAMES.filter((name) => extracted[name] === null);
  return { found: METRIC_NAMES.length - missing.length, total: METRIC_NAMES.length, missing };
}

export function logMappingReport(playerId: string, extracted: ExtractedMetrics): ExtractionSummary {
  const summary = summarizeExtraction(extracted);
  logger.info(
    { playerId, found: summary.found, total: summary.total, missing: summary.missing, metrics: extracted },
    'Metric extraction report',
  );
  return summary;
}

// ─────────────────────────────────────────────────────────────────────────────
// Schema drift
// ─────────────────────────────────────────────────────────────────────────────

function collectNumericLeaves(node: unknown, prefix: MetricPath, out: string[]): void {
  if (Array.isArray(node)) {
    node.forEach((child, i) => collectNumericLeaves(child, [...prefix, i], out));
    return;
  }
  if (isPlainObject(node)) {
    for (const [key, child] of Object.entries(node)) {
      collectNumericLeaves(child, [...prefix, key], out);
    }
    return;
  }
  if (toFiniteNumber(node) !== null) {
    out.push(formatMetricPath(prefix));
  }
}

/**
 * List numeric fields under the stats root that no declared path covers.
 * Advisory: a non-empty result means upstream carries data we don't map.
 */
export function findUnmappedStatFields(
  raw: RawResponse,
  table: MetricPathTable = METRIC_PATHS,
  rootPath: string = STATS_ROOT_PATH,
): string[] {
  const root = parseMetricPath(rootPath);
  const subtree = resolvePath(raw, root);
  if (subtree === undefined) return [];

  const declared = new Set(
    METRIC_NAMES.flatMap((name) => table[name].map((path) => formatMetricPath(parseMetricPath(path)))),
  );
  const leaves: string[] = [];
  collectNumericLeaves(subtree, root, leaves);
  return leaves.filter((path) => !declared.has(path));
}
