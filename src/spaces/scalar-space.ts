import type { ElasticSpace } from "./space.ts";

/**
 * One-dimensional space. Stretch is the signed value itself, so the extent
 * bounds act as a plain [min, max] interval.
 */
export const scalarSpace: ElasticSpace<number> = {
  name: "scalar",
  zero: () => 0,
  clone: (v) => v,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  scale: (v, s) => v * s,
  length: (v) => Math.abs(v),
  stretch: (v) => v,
  stretchDirection: () => 1,
  isFinite: (v) => Number.isFinite(v),
};
