/** Source convention for "value not recorded". */
export const MISSING_VALUE_SENTINEL = -9999;

export function tenthsToCelsius(tenths: number | null): number | null {
  return tenths === null ? null : tenths / 10;
}

export function tenthsToMillimeters(tenths: number | null): number | null {
  return tenths === null ? null : tenths / 10;
}

/**
 * Rounds half away from zero, so -2.25 becomes -2.3 at one digit rather than
 * the -2.2 `Math.round` would give.
 */
export function roundHalfAwayFromZero(value: number, digits = 1): number {
  const factor = 10 ** digits;
  const magnitude = Math.round((Math.abs(value) + Number.EPSILON) * factor) / factor;
  return value < 0 ? -magnitude : magnitude;
}

export function completenessPercentage(valid: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  return roundHalfAwayFromZero((valid / total) * 100, 2);
}

/** Renders a tenths value in its physical unit with one decimal: 150 -> "15.0". */
export function formatTenths(tenths: number): string {
  return (tenths / 10).toFixed(1);
}
