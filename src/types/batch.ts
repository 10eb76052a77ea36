import type { FailureKind } from '../errors';
import type { ExtractedMetrics } from './metrics';
import type { AllScores, NormalizedMetrics, Role, ScoreName } from './scoring';

export interface PlayerRef {
  playerId: string;
  name: string;
}

/** Roster record; only `playerId` and `position` matter to the pipeline. */
export interface PlayerDetail {
  playerId: string | number | null;
  firstName: string | null;
  lastName: string | null;
  position: string | null;
  age: number | null;
  nationality: string | null;
}

export interface PlayerResult {
  playerId: string;
  name: string;
  position: string | null;
  /** Role whose weights were used; `null` means global defaults. */
  role: Role | null;
  rawMetrics: ExtractedMetrics;
  normalizedMetrics: NormalizedMetrics;
  scores: AllScores;
}

export interface PlayerFailure {
  playerId: string;
  name: string;
  kind: FailureKind;
  error: string;
  rateLimited: boolean;
  retryAfterSeconds: number | null;
}

export type PlayerOutcome =
  | { status: 'success'; result: PlayerResult }
  | { status: 'failure'; failure: PlayerFailure };

export interface BatchSummary {
  total: number;
  successful: number;
  failed: number;
  /** Set when the caller aborted between sub-batches. */
  cancelled: boolean;
  results: readonly PlayerResult[];
  failures: readonly PlayerFailure[];
}

export interface RankingEntry {
  playerId: string;
  name: string;
  score: number;
  metric: ScoreName;
}
