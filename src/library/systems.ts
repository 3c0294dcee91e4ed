/**
 * Factories for the built-in elastic system variants.
 *
 * Each binds an ElasticSpace to the generic core; omitted initial
 * velocities start at rest.
 */

import type * as THREE from "three";
import type { ElasticExtent, ElasticProperties } from "../core/config.ts";
import { ElasticSystem } from "../core/elastic-system.ts";
import { quaternionSpace } from "../spaces/quaternion-space.ts";
import { scalarSpace } from "../spaces/scalar-space.ts";
import { vector2Space, vector3Space } from "../spaces/vector-space.ts";

export function createLinearElasticSystem(
  initialValue: number,
  extent: ElasticExtent<number>,
  properties: ElasticProperties,
  initialVelocity = 0,
): ElasticSystem<number> {
  return new ElasticSystem(scalarSpace, initialValue, initialVelocity, extent, properties);
}

export function createVector2ElasticSystem(
  initialValue: THREE.Vector2,
  extent: ElasticExtent<THREE.Vector2>,
  properties: ElasticProperties,
  initialVelocity: THREE.Vector2 = vector2Space.zero(),
): ElasticSystem<THREE.Vector2> {
  return new ElasticSystem(vector2Space, initialValue, initialVelocity, extent, properties);
}

export function createVector3ElasticSystem(
  initialValue: THREE.Vector3,
  extent: ElasticExtent<THREE.Vector3>,
  properties: ElasticProperties,
  initialVelocity: THREE.Vector3 = vector3Space.zero(),
): ElasticSystem<THREE.Vector3> {
  return new ElasticSystem(vector3Space, initialValue, initialVelocity, extent, properties);
}

/** Extent bounds are chord distances; see `quaternionStretchForAngle`. */
export function createQuaternionElasticSystem(
  initialValue: THREE.Quaternion,
  extent: ElasticExtent<THREE.Quaternion>,
  properties: ElasticProperties,
  initialVelocity: THREE.Quaternion = quaternionSpace.zero(),
): ElasticSystem<THREE.Quaternion> {
  return new ElasticSystem(quaternionSpace, initialValue, initialVelocity, extent, properties);
}
