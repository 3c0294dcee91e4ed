/** Pure scalar helpers used by the force model. */

/** Clamp value to [0, 1] range. */
export function clamp01(v: number): number {
  return Math.max(0, Math.min(1, v));
}
