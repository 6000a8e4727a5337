/**
 * Clamp value into [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/**
 * Clamp value into [0, 1].
 */
export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/**
 * Arithmetic mean, or fallback for an empty list.
 */
export function mean(values: readonly number[], fallback = 0): number {
  if (values.length === 0) return fallback;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
