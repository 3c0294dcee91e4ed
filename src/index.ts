export {
  ConfigurationError,
  createElasticProperties,
  createLinearExtent,
  DEFAULT_ELASTIC_PROPERTIES,
  DEFAULT_LINEAR_EXTENT,
  ElasticPropertiesSchema,
  ExtentBoundsSchema,
  LinearExtentSchema,
  parseElasticProperties,
  parseExtentBounds,
  parseLinearExtent,
} from "./core/config.ts";
export type { ElasticExtent, ElasticProperties, ExtentBounds } from "./core/config.ts";
export { ElasticSystem } from "./core/elastic-system.ts";
export { computeForce, endForce, handForce, snapFalloff, snapForce, snapPointsForce } from "./core/forces.ts";
export type { ElasticState } from "./core/forces.ts";
export {
  createLinearElasticSystem,
  createQuaternionElasticSystem,
  createVector2ElasticSystem,
  createVector3ElasticSystem,
} from "./library/systems.ts";
export { quaternionSpace, quaternionStretchForAngle } from "./spaces/quaternion-space.ts";
export { scalarSpace } from "./spaces/scalar-space.ts";
export type { ElasticSpace } from "./spaces/space.ts";
export { vector2Space, vector3Space } from "./spaces/vector-space.ts";
