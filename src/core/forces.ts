/**
 * Force model — the four additive force sources acting on an elastic value.
 *
 * Every function is pure. `computeForce` is exactly the sum of the
 * individual terms.
 */

import type { ElasticSpace } from "../spaces/space.ts";
import { clamp01 } from "../utils/math-helpers.ts";
import type { ElasticExtent, ElasticProperties, ExtentBounds } from "./config.ts";

export interface ElasticState<T> {
  value: T;
  velocity: T;
}

/**
 * Falloff multiplier for snap and end-magnetism forces: 1 at the target,
 * fading linearly to 0 at `radius` and staying 0 beyond it.
 */
export function snapFalloff(distance: number, radius: number): number {
  return 1 - clamp01(Math.abs(distance / radius));
}

function align<T>(space: ElasticSpace<T>, target: T, current: T): T {
  return space.alignTarget ? space.alignTarget(target, current) : target;
}

/** Spring toward the forcing value, damped by drag: F = k(x_f - x) - c·v. */
export function handForce<T>(space: ElasticSpace<T>, state: ElasticState<T>, forcingValue: T, props: ElasticProperties): T {
  const target = align(space, forcingValue, state.value);
  const spring = space.scale(space.sub(target, state.value), props.handK);
  return space.sub(spring, space.scale(state.velocity, props.drag));
}

/** Scalar magnitude of one bound's force along the stretch direction. */
function boundMagnitude(stretch: number, bound: number, outside: boolean, snapToEnd: boolean, props: ElasticProperties): number {
  const distFromEnd = bound - stretch;
  // beyond the end cap: one-sided force back inside
  if (outside) return distFromEnd * props.endK;
  if (snapToEnd) return distFromEnd * props.endK * snapFalloff(distFromEnd, props.snapRadius);
  return 0;
}

/**
 * End-cap force from both bounds. Each bound pushes back once the stretch
 * passes it and, with `snapToEnd`, magnetizes toward it from inside.
 * The two bounds are evaluated independently and summed.
 */
export function endForce<T>(space: ElasticSpace<T>, value: T, extent: ExtentBounds, props: ElasticProperties): T {
  const stretch = space.stretch(value);
  const upper = boundMagnitude(stretch, extent.maxStretch, stretch > extent.maxStretch, extent.snapToEnd, props);
  const lower = boundMagnitude(stretch, extent.minStretch, stretch < extent.minStretch, extent.snapToEnd, props);
  return space.scale(space.stretchDirection(value), upper + lower);
}

/** Attraction toward a single snap point, zero beyond the snap radius. */
export function snapForce<T>(space: ElasticSpace<T>, value: T, snapPoint: T, props: ElasticProperties): T {
  const dist = space.sub(align(space, snapPoint, value), value);
  return space.scale(dist, props.snapK * snapFalloff(space.length(dist), props.snapRadius));
}

/** Sum of the attraction toward every snap point. */
export function snapPointsForce<T>(space: ElasticSpace<T>, value: T, snapPoints: readonly T[], props: ElasticProperties): T {
  let force = space.zero();
  for (const point of snapPoints) {
    force = space.add(force, snapForce(space, value, point, props));
  }
  return force;
}

/** Net force on the element: hand spring + end caps + snap points. */
export function computeForce<T>(
  space: ElasticSpace<T>,
  state: ElasticState<T>,
  forcingValue: T,
  extent: ElasticExtent<T>,
  props: ElasticProperties,
): T {
  let force = handForce(space, state, forcingValue, props);
  force = space.add(force, endForce(space, state.value, extent, props));
  force = space.add(force, snapPointsForce(space, state.value, extent.snapPoints, props));
  return force;
}
