import { AppError } from './AppError';

export type FailureKind = 'rate_limit' | 'upstream_data' | 'generic';

export interface ClassifiedFailure {
  kind: FailureKind;
  /** Original error message, unmodified. */
  message: string;
  /** Only ever set for rate limits, and only when upstream sent a hint. */
  retryAfterSeconds: number | null;
}

function readRetryAfter(details: unknown): number | null {
  if (typeof details !== 'object' || details === null || !('retryAfter' in details)) {
    return null;
  }
  const { retryAfter } = details;
  return typeof retryAfter === 'number' && Number.isFinite(retryAfter) ? retryAfter : null;
}

/**
 * Map anything thrown below the per-player boundary onto the failure taxonomy.
 */
export function classifyFailure(err: unknown): ClassifiedFailure {
  if (AppError.isAppError(err)) {
    if (err.code === 'RATE_LIMITED') {
      return { kind: 'rate_limit', message: err.message, retryAfterSeconds: readRetryAfter(err.details) };
    }
    if (err.code === 'UPSTREAM_DATA_ERROR') {
      return { kind: 'upstream_data', message: err.message, retryAfterSeconds: null };
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  return { kind: 'generic', message, retryAfterSeconds: null };
}
