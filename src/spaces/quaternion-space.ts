/**
 * Quaternion space — rotations simulated as 4-vectors.
 *
 * Values are unit quaternions (re-normalized after every step); velocities
 * are unnormalized 4-vectors in the same chart. Stretch is the chord
 * distance from the identity rotation, measured in whichever hemisphere
 * (q or -q) is closer to it.
 */

import * as THREE from "three";
import type { ElasticSpace } from "./space.ts";

function quat(x: number, y: number, z: number, w: number): THREE.Quaternion {
  return new THREE.Quaternion(x, y, z, w);
}

/** Displacement of q from the nearer of +identity / -identity. */
function displacementFromIdentity(q: THREE.Quaternion): THREE.Quaternion {
  const s = q.w < 0 ? -1 : 1;
  return quat(q.x, q.y, q.z, q.w - s);
}

function length4(q: THREE.Quaternion): number {
  return Math.hypot(q.x, q.y, q.z, q.w);
}

/**
 * Convert a rotation angle (radians) into quaternion stretch units, for
 * authoring extents as angles: a unit quaternion rotated by `radians` from
 * identity lies at chord distance 2·sin(radians / 4).
 */
export function quaternionStretchForAngle(radians: number): number {
  return 2 * Math.sin(radians / 4);
}

export const quaternionSpace: ElasticSpace<THREE.Quaternion> = {
  name: "quaternion",
  zero: () => quat(0, 0, 0, 0),
  clone: (q) => q.clone(),
  add: (a, b) => quat(a.x + b.x, a.y + b.y, a.z + b.z, a.w + b.w),
  sub: (a, b) => quat(a.x - b.x, a.y - b.y, a.z - b.z, a.w - b.w),
  scale: (q, s) => quat(q.x * s, q.y * s, q.z * s, q.w * s),
  length: length4,
  stretch: (q) => length4(displacementFromIdentity(q)),
  stretchDirection: (q) => {
    const d = displacementFromIdentity(q);
    const len = length4(d);
    if (len === 0) return quat(0, 0, 0, 0);
    return quat(d.x / len, d.y / len, d.z / len, d.w / len);
  },
  isFinite: (q) => Number.isFinite(length4(q)),
  // q and -q are the same rotation; pull toward the closer one
  alignTarget: (target, current) => (target.dot(current) < 0 ? quat(-target.x, -target.y, -target.z, -target.w) : target.clone()),
  normalize: (q) => q.clone().normalize(),
};
