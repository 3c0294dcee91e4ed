/**
 * Elastic configuration — extent and spring properties, their defaults,
 * and validation of configuration authored outside the kernel.
 */

import { z } from "zod";

const finite = () => z.number().finite();

export const ElasticPropertiesSchema = z.object({
  /** Mass of the simulated element. */
  mass: finite().positive(),
  /** Spring constant pulling toward the forcing value. */
  handK: finite(),
  /** End-cap spring constant. */
  endK: finite(),
  /** Snap-point spring constant. */
  snapK: finite(),
  /** Distance at which snap points and end magnetism stop acting. */
  snapRadius: finite().positive(),
  /** Drag proportional to velocity. */
  drag: finite().nonnegative(),
});

export type ElasticProperties = z.infer<typeof ElasticPropertiesSchema>;

/** Bounds are compared against the space's stretch, not the raw value. */
export const ExtentBoundsSchema = z.object({
  minStretch: finite(),
  maxStretch: finite(),
  /** Magnetize toward the bounds from inside, within the snap radius. */
  snapToEnd: z.boolean(),
});

export type ExtentBounds = z.infer<typeof ExtentBoundsSchema>;

export interface ElasticExtent<T> extends ExtentBounds {
  /** Interior attractors; every point contributes independently. */
  snapPoints: T[];
}

export const LinearExtentSchema = ExtentBoundsSchema.extend({
  snapPoints: z.array(finite()).default([]),
});

export const DEFAULT_ELASTIC_PROPERTIES: Readonly<ElasticProperties> = Object.freeze({
  mass: 0.03,
  handK: 4,
  endK: 3,
  snapK: 1,
  snapRadius: 0.1,
  drag: 0.08,
});

export const DEFAULT_LINEAR_EXTENT: Readonly<ExtentBounds> = Object.freeze({
  minStretch: 0,
  maxStretch: 1,
  snapToEnd: false,
});

/** Thrown when an elastic system is built from invalid configuration. */
export class ConfigurationError extends Error {
  /** One `path: message` line per problem. */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid elastic configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError, prefix: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path].filter((p) => p !== "").join(".");
    return `${path}: ${issue.message}`;
  });
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, prefix: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw new ConfigurationError(formatIssues(result.error, prefix));
  return result.data;
}

/** Validate spring properties from an untyped source (e.g. parsed JSON). */
export function parseElasticProperties(input: unknown): ElasticProperties {
  return parseWith(ElasticPropertiesSchema, input, "properties");
}

/** Validate the scalar bounds shared by every extent. */
export function parseExtentBounds(input: unknown): ExtentBounds {
  return parseWith(ExtentBoundsSchema, input, "extent");
}

/** Validate a scalar extent from an untyped source. Missing snap points default to none. */
export function parseLinearExtent(input: unknown): ElasticExtent<number> {
  return parseWith(LinearExtentSchema, input, "extent");
}

/** Merge overrides onto the default properties and validate the result. */
export function createElasticProperties(overrides: Partial<ElasticProperties> = {}): ElasticProperties {
  return parseElasticProperties({ ...DEFAULT_ELASTIC_PROPERTIES, ...overrides });
}

/** Merge overrides onto the default scalar extent and validate the result. */
export function createLinearExtent(overrides: Partial<ElasticExtent<number>> = {}): ElasticExtent<number> {
  return parseLinearExtent({ ...DEFAULT_LINEAR_EXTENT, snapPoints: [], ...overrides });
}
