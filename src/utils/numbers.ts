/**
 * Round half away from zero ("2.25" -> 2.3, "-2.25" -> -2.3)
 */
export function roundHalfAwayFromZero(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded =
    (Math.sign(value) *
      Math.round((Math.abs(value) + Number.EPSILON) * factor)) /
    factor;
  // No -0 in the output
  return rounded === 0 ? 0 : rounded;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
