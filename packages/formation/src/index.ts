/**
 * @swarmkit/formation
 *
 * Formation control for multi-vehicle swarms
 *
 * Provides:
 * - Formation geometries (line, column, wedge, diamond, circle, box, custom)
 * - Leader-follower control law with flocking corrections
 * - Velocity/acceleration saturation and heading synthesis
 * - Vector and quaternion helpers
 */

export { FormationEngine, headingFor } from './FormationEngine.js';
export { formationOffset, formationOffsets } from './offsets.js';
export {
  FORMATION_TYPES,
  FormationTypeSchema,
  FormationParamsSchema,
  Vector3Schema,
  DEFAULT_FORMATION_PARAMS,
  type FormationParams,
  type FormationParamsInput,
} from './schema.js';
export { InvalidFormationParamsError } from './errors.js';
export type {
  FormationType,
  FormationGeometry,
  FormationCommand,
  VehicleState,
} from './types.js';
export {
  ZERO_VECTOR,
  IDENTITY_QUATERNION,
  vec3,
  add,
  sub,
  scale,
  dot,
  cross,
  norm,
  normalize,
  distance,
  saturate,
  mean,
  rotate,
  quaternionFromAxisAngle,
  quaternionFromBasis,
  type Vector3,
  type Quaternion,
} from './math/vector.js';
