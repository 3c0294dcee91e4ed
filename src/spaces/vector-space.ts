/**
 * Euclidean vector spaces backed by three.js vectors.
 *
 * Stretch is the vector norm: the extent describes a spherical shell around
 * the origin, and end-cap forces act radially.
 */

import * as THREE from "three";
import type { ElasticSpace } from "./space.ts";

/** The subset of the three.js vector API the spaces rely on. */
interface VectorOps<V> {
  clone(): V;
  add(v: V): V;
  sub(v: V): V;
  multiplyScalar(s: number): V;
  normalize(): V;
  length(): number;
}

function createVectorSpace<V extends VectorOps<V>>(name: string, zero: () => V): ElasticSpace<V> {
  return {
    name,
    zero,
    clone: (v) => v.clone(),
    add: (a, b) => a.clone().add(b),
    sub: (a, b) => a.clone().sub(b),
    scale: (v, s) => v.clone().multiplyScalar(s),
    length: (v) => v.length(),
    stretch: (v) => v.length(),
    // three.js leaves a zero vector at zero when normalizing
    stretchDirection: (v) => v.clone().normalize(),
    // a NaN or infinite component makes the length non-finite
    isFinite: (v) => Number.isFinite(v.length()),
  };
}

export const vector2Space: ElasticSpace<THREE.Vector2> = createVectorSpace("vector2", () => new THREE.Vector2());

export const vector3Space: ElasticSpace<THREE.Vector3> = createVectorSpace("vector3", () => new THREE.Vector3());
