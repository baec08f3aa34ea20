import { z } from 'zod';

/**
 * Zod schemas for formation parameters.
 * Defaults describe a 5 m spaced line with conservative flocking gains.
 */

export const FORMATION_TYPES = [
  'line',
  'column',
  'wedge',
  'diamond',
  'circle',
  'box',
  'custom',
] as const;

export const FormationTypeSchema = z.enum(FORMATION_TYPES);

export const Vector3Schema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

export const FormationParamsSchema = z.object({
  type: FormationTypeSchema.default('line'),
  /** [m] Distance between neighboring slots */
  spacing: z.number().positive('spacing must be positive').default(5),
  /** [m] Neighbors closer than this are pushed away */
  collisionRadius: z.number().nonnegative().default(2),
  /** [m/s] */
  maxVelocity: z.number().positive().default(10),
  /** [m/s^2] */
  maxAcceleration: z.number().positive().default(5),

  kPosition: z.number().nonnegative().default(1),
  kVelocity: z.number().nonnegative().default(0.5),
  kSeparation: z.number().nonnegative().default(2),
  kCohesion: z.number().nonnegative().default(0.3),
  kAlignment: z.number().nonnegative().default(0.2),

  /** [m] Radius of circular formations */
  formationRadius: z.number().positive().default(10),
  /** [rad] Half-angle of the wedge */
  formationAngle: z.number().finite().default(Math.PI / 6),
});

export type FormationParams = z.output<typeof FormationParamsSchema>;
export type FormationParamsInput = z.input<typeof FormationParamsSchema>;

export const DEFAULT_FORMATION_PARAMS: Readonly<FormationParams> = Object.freeze(
  FormationParamsSchema.parse({})
);
