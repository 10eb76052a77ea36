/**
 * Role Resolver
 *
 * Classifies a free-form position (jersey number, positional name or a role
 * name) into one of the four roles. Resolution order:
 *   1. jersey number, after stripping a "No.", "Number" or "#" prefix
 *   2. role name itself (FRONT_5, back_row, ...)
 *   3. positional-name fragment ("Loosehead Prop", "Scrum-half", ...)
 *
 * Nothing matching gives `null`; callers decide the fallback via
 * `resolveScoringRole`.
 */

import { JERSEY_TO_ROLE, POSITION_KEYWORDS, ROLE_PROFILES } from '../../constants/roles';
import { DEFAULT_WEIGHT_PROFILE } from '../../constants/scoring';
import { isRole, type Role, type WeightProfile } from '../../types';
import { createLogger } from '../../utils/logger';

const logger = createLogger('roleResolver');

/** What to score with when a position can't be resolved. */
export type RoleFallback = 'BACK_ROW' | 'DEFAULT';

const POSITION_PREFIX = /^(?:no\.|no\s+|number\s+|#)\s*/;

function cleanPosition(position: string | number): string {
  return String(position).trim().toLowerCase().replace(POSITION_PREFIX, '');
}

export function resolveRole(position: string | number | null | undefined): Role | null {
  if (position === null || position === undefined) return null;
  const cleaned = cleanPosition(position);
  if (!cleaned) return null;

  if (Object.hasOwn(JERSEY_TO_ROLE, cleaned)) return JERSEY_TO_ROLE[cleaned];

  const upper = cleaned.toUpperCase();
  if (isRole(upper)) return upper;

  for (const [role, fragments] of POSITION_KEYWORDS) {
    if (fragments.some((fragment) => cleaned.includes(fragment))) return role;
  }

  logger.warn({ position }, 'Could not determine role from position');
  return null;
}

export function getRoleProfile(role: Role): WeightProfile {
  return ROLE_PROFILES[role];
}

/**
 * Weights for an optional role. No role means the global defaults.
 */
export function getWeightProfile(role?: Role | null): WeightProfile {
  return role ? getRoleProfile(role) : DEFAULT_WEIGHT_PROFILE;
}

/**
 * Resolve a position and apply the configured fallback when it doesn't
 * resolve (including when no position was supplied). `null` means "score with
 * the global defaults".
 */
export function resolveScoringRole(
  position: string | number | null | undefined,
  fallback: RoleFallback,
): Role | null {
  const role = resolveRole(position);
  if (role) return role;
  if (fallback === 'BACK_ROW') {
    logger.warn({ position: position ?? null }, 'Unknown role, using BACK_ROW weights');
    return 'BACK_ROW';
  }
  return null;
}
