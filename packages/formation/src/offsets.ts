/**
 * Formation Offsets
 *
 * Leader-frame displacement of each formation slot. Slot 0 is the leader
 * slot; x points forward, y to the left.
 */

import { vec3, type Vector3 } from './math/vector.js';
import type { FormationGeometry } from './types.js';

/**
 * Offset of slot `index` in a formation of `total` vehicles
 */
export function formationOffset(geometry: FormationGeometry, index: number, total: number): Vector3 {
  switch (geometry.type) {
    case 'line':
      return lineOffset(geometry.spacing, index, total);
    case 'column':
      return columnOffset(geometry.spacing, index);
    case 'wedge':
      return wedgeOffset(geometry.spacing, geometry.angle, index);
    case 'diamond':
      return diamondOffset(geometry.spacing, geometry.radius, index, total);
    case 'circle':
      return circleOffset(geometry.radius, index, total);
    case 'box':
      return boxOffset(geometry.spacing, index, total);
    case 'custom':
      return customOffset(geometry.offsets, index);
  }
}

/**
 * Offsets for every slot of a formation of `total` vehicles
 */
export function formationOffsets(geometry: FormationGeometry, total: number): Vector3[] {
  return Array.from({ length: total }, (_, i) => formationOffset(geometry, i, total));
}

function lineOffset(spacing: number, index: number, total: number): Vector3 {
  return vec3(0, (index - total / 2) * spacing, 0);
}

function columnOffset(spacing: number, index: number): Vector3 {
  return vec3(-index * spacing, 0, 0);
}

function wedgeOffset(spacing: number, angle: number, index: number): Vector3 {
  if (index === 0) {
    return vec3();
  }

  const side = index % 2 === 0 ? 1 : -1;
  const row = Math.ceil(index / 2);

  return vec3(
    -row * spacing * Math.cos(angle),
    side * row * spacing * Math.sin(angle),
    0
  );
}

function diamondOffset(spacing: number, radius: number, index: number, total: number): Vector3 {
  if (total < 4) {
    return boxOffset(spacing, index, total);
  }

  switch (index) {
    case 0:
      return vec3(spacing, 0, 0);
    case 1:
      return vec3(0, spacing, 0);
    case 2:
      return vec3(-spacing, 0, 0);
    case 3:
      return vec3(0, -spacing, 0);
    default:
      // Extra vehicles ring the diamond
      return circleOffset(radius, index - 4, total - 4);
  }
}

function circleOffset(radius: number, index: number, total: number): Vector3 {
  if (total <= 1) {
    return vec3();
  }

  const angle = (2 * Math.PI * index) / total;
  return vec3(radius * Math.cos(angle), radius * Math.sin(angle), 0);
}

function boxOffset(spacing: number, index: number, total: number): Vector3 {
  const side = Math.ceil(Math.sqrt(total));
  if (side === 0) {
    return vec3();
  }
  const row = Math.floor(index / side);
  const col = index % side;

  return vec3((row - side / 2) * spacing, (col - side / 2) * spacing, 0);
}

function customOffset(offsets: readonly Vector3[], index: number): Vector3 {
  const offset = index >= 0 ? offsets[index] : undefined;
  return offset ? { ...offset } : vec3();
}
