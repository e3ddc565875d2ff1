/**
 * Rounding helpers for display values.
 * Results are normalized so that -0 never leaks into responses.
 */

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

export const round1 = (value: number): number => roundTo(value, 1);
export const round2 = (value: number): number => roundTo(value, 2);
export const round3 = (value: number): number => roundTo(value, 3);

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}
