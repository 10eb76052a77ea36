/**
 * Round a number to the nearest hundredth (2 decimal places).
 */
export function normalizeToHundredth(value: number): number {
  const rounded = Math.round(value * 100) / 100;
  // Collapse -0
  return rounded === 0 ? 0 : rounded;
}

/**
 * Read a finite number out of an untyped value. Numeric strings count;
 * booleans, blanks and everything else give `null`.
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }
  return null;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * A usable positive count (minutes, appearances). Anything else is `null`.
 */
export function positiveOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : null;
}
