/**
 * Elastic space — the vector-space capabilities the oscillator core needs
 * from a value type.
 *
 * A space is a plain object of operations, so any value type (numbers,
 * three.js vectors, quaternions) can be simulated without subclassing.
 * Operations never mutate their arguments.
 */

export interface ElasticSpace<T> {
  /** Short label used in error messages. */
  readonly name: string;

  /** Additive identity, also the default initial velocity. */
  zero(): T;
  clone(v: T): T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  scale(v: T, s: number): T;

  /** Euclidean length, used for the snap-radius falloff. */
  length(v: T): number;

  /** Scalar measure of v compared against the extent's min/max stretch. */
  stretch(v: T): number;

  /** Unit direction in which `stretch` grows at v. */
  stretchDirection(v: T): T;

  isFinite(v: T): boolean;

  /**
   * Map a target (forcing value or snap point) into the same chart as the
   * current value before the two are differenced.
   */
  alignTarget?(target: T, current: T): T;

  /** Re-project a value onto its manifold after integration. */
  normalize?(v: T): T;
}
