/**
 * Vector and Quaternion Math
 *
 * Minimal 3D math for formation control: immutable value objects and pure
 * helper functions. Quaternions use the Hamilton convention (w, x, y, z).
 */

/**
 * Three-component vector in a right-handed world frame (x forward, y left, z up)
 */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Unit quaternion describing an orientation
 */
export interface Quaternion {
  w: number;
  x: number;
  y: number;
  z: number;
}

export const ZERO_VECTOR: Readonly<Vector3> = Object.freeze({ x: 0, y: 0, z: 0 });

export const IDENTITY_QUATERNION: Readonly<Quaternion> = Object.freeze({ w: 1, x: 0, y: 0, z: 0 });

/** Smallest magnitude that is still scaled by saturate() */
const SATURATION_EPSILON = 0.001;

export function vec3(x = 0, y = 0, z = 0): Vector3 {
  return { x, y, z };
}

export function add(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function sub(a: Vector3, b: Vector3): Vector3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vector3, factor: number): Vector3 {
  return { x: v.x * factor, y: v.y * factor, z: v.z * factor };
}

export function dot(a: Vector3, b: Vector3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function cross(a: Vector3, b: Vector3): Vector3 {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x,
  };
}

export function norm(v: Vector3): number {
  return Math.sqrt(dot(v, v));
}

export function distance(a: Vector3, b: Vector3): number {
  return norm(sub(a, b));
}

/**
 * Unit vector in the direction of v; the zero vector stays zero.
 */
export function normalize(v: Vector3): Vector3 {
  const magnitude = norm(v);
  if (magnitude === 0) {
    return vec3();
  }
  return scale(v, 1 / magnitude);
}

/**
 * Clamp the magnitude of v to maxMagnitude, keeping its direction.
 * Never scales a vector up.
 */
export function saturate(v: Vector3, maxMagnitude: number): Vector3 {
  const magnitude = norm(v);
  if (magnitude > maxMagnitude && magnitude > SATURATION_EPSILON) {
    return scale(v, maxMagnitude / magnitude);
  }
  return { ...v };
}

/**
 * Arithmetic mean of a list of vectors; zero for an empty list.
 */
export function mean(vectors: readonly Vector3[]): Vector3 {
  if (vectors.length === 0) {
    return vec3();
  }
  const sum = vectors.reduce((acc, v) => add(acc, v), vec3());
  return scale(sum, 1 / vectors.length);
}

/**
 * Rotate v by the unit quaternion q (q v q*).
 */
export function rotate(q: Quaternion, v: Vector3): Vector3 {
  const axis = vec3(q.x, q.y, q.z);
  const t = scale(cross(axis, v), 2);
  return add(add(v, scale(t, q.w)), cross(axis, t));
}

export function quaternionFromAxisAngle(axis: Vector3, angle: number): Quaternion {
  const unit = normalize(axis);
  const half = angle / 2;
  const s = Math.sin(half);
  return { w: Math.cos(half), x: unit.x * s, y: unit.y * s, z: unit.z * s };
}

/**
 * Quaternion for the rotation matrix whose columns are the given orthonormal,
 * right-handed axes.
 */
export function quaternionFromBasis(xAxis: Vector3, yAxis: Vector3, zAxis: Vector3): Quaternion {
  const m00 = xAxis.x, m01 = yAxis.x, m02 = zAxis.x;
  const m10 = xAxis.y, m11 = yAxis.y, m12 = zAxis.y;
  const m20 = xAxis.z, m21 = yAxis.z, m22 = zAxis.z;

  const trace = m00 + m11 + m22;

  if (trace > 0) {
    const s = 0.5 / Math.sqrt(trace + 1);
    return {
      w: 0.25 / s,
      x: (m21 - m12) * s,
      y: (m02 - m20) * s,
      z: (m10 - m01) * s,
    };
  }

  if (m00 > m11 && m00 > m22) {
    const s = 2 * Math.sqrt(1 + m00 - m11 - m22);
    return {
      w: (m21 - m12) / s,
      x: 0.25 * s,
      y: (m01 + m10) / s,
      z: (m02 + m20) / s,
    };
  }

  if (m11 > m22) {
    const s = 2 * Math.sqrt(1 + m11 - m00 - m22);
    return {
      w: (m02 - m20) / s,
      x: (m01 + m10) / s,
      y: 0.25 * s,
      z: (m12 + m21) / s,
    };
  }

  const s = 2 * Math.sqrt(1 + m22 - m00 - m11);
  return {
    w: (m10 - m01) / s,
    x: (m02 + m20) / s,
    y: (m12 + m21) / s,
    z: 0.25 * s,
  };
}
