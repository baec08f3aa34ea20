/**
 * Formation Engine - Formation-keeping and flocking control law
 *
 * Combines:
 * - Leader-relative slot tracking (position and velocity terms)
 * - Separation, cohesion and alignment flocking corrections
 * - Velocity and acceleration saturation
 *
 * computeCommand() is a deterministic function of its arguments and the
 * configured parameters. The configuration mutators are not synchronized;
 * callers serialize them.
 */

import {
  add,
  cross,
  mean,
  norm,
  normalize,
  quaternionFromBasis,
  rotate,
  saturate,
  scale,
  sub,
  vec3,
  type Quaternion,
  type Vector3,
} from './math/vector.js';
import { formationOffset } from './offsets.js';
import {
  FormationParamsSchema,
  Vector3Schema,
  type FormationParams,
  type FormationParamsInput,
} from './schema.js';
import { InvalidFormationParamsError } from './errors.js';
import type { FormationCommand, FormationGeometry, FormationType, VehicleState } from './types.js';

/** Neighbors closer than this are treated as coincident and ignored by separation */
const MIN_SEPARATION_DISTANCE = 0.01;

/** Below this speed the vehicle keeps its current heading */
const MIN_HEADING_SPEED = 0.1;

const UP_REFERENCE: Vector3 = { x: 0, y: 0, z: 1 };

export class FormationEngine {
  private params: FormationParams;
  private customOffsets: Vector3[] = [];

  constructor(params: FormationParamsInput = {}) {
    this.params = parseParams(params);
  }

  /**
   * Replace all parameters and clear the custom formation
   */
  initialize(params: FormationParamsInput): void {
    this.params = parseParams(params);
    this.customOffsets = [];
  }

  /**
   * Clear the custom formation, keeping parameters
   */
  reset(): void {
    this.customOffsets = [];
  }

  /**
   * Compute the formation command for one vehicle
   *
   * @param index - formation slot of the vehicle
   * @param current - the vehicle's own state
   * @param allStates - every vehicle in the formation, the vehicle itself included
   * @param leader - pose defining the formation origin
   */
  computeCommand(
    index: number,
    current: VehicleState,
    allStates: readonly VehicleState[],
    leader: VehicleState
  ): FormationCommand {
    if (allStates.length === 0) {
      return {
        desiredPosition: { ...current.position },
        desiredVelocity: vec3(),
        desiredAcceleration: vec3(),
        desiredOrientation: { ...current.orientation },
      };
    }

    const p = this.params;
    const desiredPosition = this.getDesiredPosition(index, leader, allStates.length);
    const neighbors = allStates.filter(state => state.index !== current.index);

    const positionTerm = scale(sub(desiredPosition, current.position), p.kPosition);
    const velocityTerm = scale(sub(leader.velocity, current.velocity), p.kVelocity);
    const separation = scale(this.separationForce(current, neighbors), p.kSeparation);
    const cohesion = scale(this.cohesionForce(current, neighbors), p.kCohesion);
    const alignment = scale(this.alignmentForce(current, neighbors), p.kAlignment);

    const totalForce = [velocityTerm, separation, cohesion, alignment].reduce(add, positionTerm);

    const desiredVelocity = saturate(add(current.velocity, totalForce), p.maxVelocity);
    const desiredAcceleration = saturate(totalForce, p.maxAcceleration);

    return {
      desiredPosition,
      desiredVelocity,
      desiredAcceleration,
      desiredOrientation: headingFor(desiredVelocity, current.orientation),
    };
  }

  /**
   * World-frame position of slot `index` relative to the leader pose
   */
  getDesiredPosition(index: number, leader: VehicleState, total: number): Vector3 {
    const offset = formationOffset(this.getGeometry(), index, total);
    return add(leader.position, rotate(leader.orientation, offset));
  }

  /**
   * The configured geometry with only the parameters it uses
   */
  getGeometry(): FormationGeometry {
    const p = this.params;
    switch (p.type) {
      case 'line':
        return { type: 'line', spacing: p.spacing };
      case 'column':
        return { type: 'column', spacing: p.spacing };
      case 'wedge':
        return { type: 'wedge', spacing: p.spacing, angle: p.formationAngle };
      case 'diamond':
        return { type: 'diamond', spacing: p.spacing, radius: p.formationRadius };
      case 'circle':
        return { type: 'circle', radius: p.formationRadius };
      case 'box':
        return { type: 'box', spacing: p.spacing };
      case 'custom':
        return { type: 'custom', offsets: this.customOffsets.map(o => ({ ...o })) };
    }
  }

  /**
   * Use explicit leader-frame offsets, one per slot. Switches the type to custom.
   */
  setCustomFormation(offsets: readonly Vector3[]): void {
    const parsed = Vector3Schema.array().safeParse(offsets);
    if (!parsed.success) {
      throw new InvalidFormationParamsError(
        'Invalid custom formation offsets',
        parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    this.customOffsets = parsed.data;
    this.params = { ...this.params, type: 'custom' };
  }

  getCustomFormation(): Vector3[] {
    return this.customOffsets.map(o => ({ ...o }));
  }

  getParams(): FormationParams {
    return { ...this.params };
  }

  getType(): FormationType {
    return this.params.type;
  }

  /**
   * Merge and validate new parameters. The custom formation is kept.
   */
  setParams(params: Partial<FormationParams>): void {
    this.params = parseParams({ ...this.params, ...params });
  }

  setFormationType(type: FormationType): void {
    this.setParams({ type });
  }

  setSpacing(spacing: number): void {
    this.setParams({ spacing });
  }

  private separationForce(current: VehicleState, neighbors: readonly VehicleState[]): Vector3 {
    let force = vec3();

    for (const neighbor of neighbors) {
      const away = sub(current.position, neighbor.position);
      const dist = norm(away);

      if (dist < this.params.collisionRadius && dist > MIN_SEPARATION_DISTANCE) {
        force = add(force, scale(normalize(away), 1 / (dist * dist)));
      }
    }

    return force;
  }

  private cohesionForce(current: VehicleState, neighbors: readonly VehicleState[]): Vector3 {
    if (neighbors.length === 0) {
      return vec3();
    }
    return sub(mean(neighbors.map(n => n.position)), current.position);
  }

  private alignmentForce(current: VehicleState, neighbors: readonly VehicleState[]): Vector3 {
    if (neighbors.length === 0) {
      return vec3();
    }
    return sub(mean(neighbors.map(n => n.velocity)), current.velocity);
  }
}

/**
 * Orientation facing along `velocity` with z up; `fallback` when the
 * velocity is too small or vertical to define a heading.
 */
export function headingFor(velocity: Vector3, fallback: Quaternion): Quaternion {
  if (norm(velocity) <= MIN_HEADING_SPEED) {
    return { ...fallback };
  }

  const forward = normalize(velocity);
  const rightRaw = cross(forward, UP_REFERENCE);
  if (norm(rightRaw) < 1e-6) {
    return { ...fallback };
  }

  const right = normalize(rightRaw);
  const up = normalize(cross(right, forward));

  // Body y points left, so the basis is (forward, -right, up)
  return quaternionFromBasis(forward, scale(right, -1), up);
}

function parseParams(input: FormationParamsInput): FormationParams {
  const result = FormationParamsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidFormationParamsError(
      'Invalid formation parameters',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
