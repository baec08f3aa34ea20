/**
 * Formation Types
 *
 * Geometry variants, vehicle state and the per-vehicle command produced by
 * the control law.
 */

import type { Quaternion, Vector3 } from './math/vector.js';
import type { FORMATION_TYPES } from './schema.js';

/**
 * Supported formation geometries
 */
export type FormationType = (typeof FORMATION_TYPES)[number];

/**
 * A formation geometry together with exactly the parameters it uses
 */
export type FormationGeometry =
  | { type: 'line'; spacing: number }
  | { type: 'column'; spacing: number }
  | { type: 'wedge'; spacing: number; angle: number }
  | { type: 'diamond'; spacing: number; radius: number }
  | { type: 'circle'; radius: number }
  | { type: 'box'; spacing: number }
  | { type: 'custom'; offsets: readonly Vector3[] };

/**
 * Kinematic state of one vehicle as seen by the formation engine
 */
export interface VehicleState {
  /** Formation slot; also identifies the vehicle among its neighbors */
  index: number;
  position: Vector3;
  velocity: Vector3;
  orientation: Quaternion;
}

/**
 * Desired motion for one vehicle. Recomputed on every call, never stored.
 */
export interface FormationCommand {
  /** World-frame slot position the command steers toward */
  desiredPosition: Vector3;
  desiredVelocity: Vector3;
  desiredAcceleration: Vector3;
  desiredOrientation: Quaternion;
}
