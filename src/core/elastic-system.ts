/**
 * Elastic system — a damped harmonic oscillator over any ElasticSpace.
 *
 * The system owns its value/velocity state and copies of its
 * configuration. `step` advances the state by one semi-implicit Euler step:
 * velocity is updated from the net force first, and the new velocity then
 * moves the value.
 *
 * Instances are stateful and order-dependent; drive each one from a single
 * caller.
 */

import type { ElasticSpace } from "../spaces/space.ts";
import type { ElasticExtent, ElasticProperties } from "./config.ts";
import { ConfigurationError, parseElasticProperties, parseExtentBounds } from "./config.ts";
import type { ElasticState } from "./forces.ts";
import { computeForce } from "./forces.ts";

export class ElasticSystem<T> {
  readonly space: ElasticSpace<T>;

  private readonly _extent: ElasticExtent<T>;
  private readonly _properties: ElasticProperties;
  private _value: T;
  private _velocity: T;

  /** @throws ConfigurationError when properties, bounds, snap points or initial state are invalid. */
  constructor(space: ElasticSpace<T>, initialValue: T, initialVelocity: T, extent: ElasticExtent<T>, properties: ElasticProperties) {
    this.space = space;
    this._properties = parseElasticProperties(properties);

    const bounds = parseExtentBounds({ minStretch: extent.minStretch, maxStretch: extent.maxStretch, snapToEnd: extent.snapToEnd });
    const issues: string[] = [];
    extent.snapPoints.forEach((p, i) => {
      if (!space.isFinite(p)) issues.push(`extent.snapPoints.${i}: ${space.name} snap point must be finite`);
    });
    if (!space.isFinite(initialValue)) issues.push(`initialValue: ${space.name} value must be finite`);
    if (!space.isFinite(initialVelocity)) issues.push(`initialVelocity: ${space.name} value must be finite`);
    if (issues.length > 0) throw new ConfigurationError(issues);

    this._extent = { ...bounds, snapPoints: extent.snapPoints.map((p) => space.clone(p)) };
    this._value = space.clone(initialValue);
    this._velocity = space.clone(initialVelocity);
  }

  /**
   * Advance the oscillator toward `forcingValue` by `deltaTime` seconds and
   * return the new value.
   *
   * A non-finite or non-positive delta time, or a non-finite forcing value,
   * leaves the state untouched and returns the current value.
   */
  step(forcingValue: T, deltaTime: number): T {
    const { space } = this;
    if (!Number.isFinite(deltaTime) || deltaTime <= 0 || !space.isFinite(forcingValue)) {
      return this.currentValue();
    }

    const force = computeForce(space, this.state(), forcingValue, this._extent, this._properties);

    // a = F/m
    const accel = space.scale(force, 1 / this._properties.mass);
    this._velocity = space.add(this._velocity, space.scale(accel, deltaTime));
    const value = space.add(this._value, space.scale(this._velocity, deltaTime));
    this._value = space.normalize ? space.normalize(value) : value;

    return this.currentValue();
  }

  currentValue(): T {
    return this.space.clone(this._value);
  }

  currentVelocity(): T {
    return this.space.clone(this._velocity);
  }

  /** Snapshot of value and velocity. */
  state(): ElasticState<T> {
    return { value: this.currentValue(), velocity: this.currentVelocity() };
  }

  extent(): ElasticExtent<T> {
    return { ...this._extent, snapPoints: this._extent.snapPoints.map((p) => this.space.clone(p)) };
  }

  properties(): ElasticProperties {
    return { ...this._properties };
  }

  /**
   * Replace the state; subsequent steps continue from it.
   * @throws ConfigurationError when either argument is non-finite; the state is left as it was.
   */
  reset(value: T, velocity: T = this.space.zero()): void {
    const issues: string[] = [];
    if (!this.space.isFinite(value)) issues.push(`value: ${this.space.name} value must be finite`);
    if (!this.space.isFinite(velocity)) issues.push(`velocity: ${this.space.name} value must be finite`);
    if (issues.length > 0) throw new ConfigurationError(issues);

    this._value = this.space.clone(value);
    this._velocity = this.space.clone(velocity);
  }

  /** True once integration has produced a non-finite value or velocity. */
  hasDiverged(): boolean {
    return !this.space.isFinite(this._value) || !this.space.isFinite(this._velocity);
  }
}
