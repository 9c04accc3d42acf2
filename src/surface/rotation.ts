/**
 * Axis-angle rotation algebra.
 *
 * A rotation is carried as an explicit { axis, angleDegrees } pair with a
 * unit axis and a non-negative angle. The packed form used by older
 * data (one vector whose length is the angle in degrees) only appears at
 * the edges, through fromPacked() / toPacked().
 *
 * Conventions:
 *   - Right-hand rule about the axis.
 *   - angleDegrees === 0 is the identity; its axis carries no meaning.
 *   - Nothing here mutates its arguments. Every result is a new object.
 *
 * Pure math on three.js vectors; no scene graph or rendering.
 */

import * as THREE from 'three'
import { DEG2RAD, RAD2DEG, atan2Deg, clamp, wrapDegrees } from './angles.ts'
import { ROTATION_EPSILON } from './constants.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface AxisAngle {
  /** Unit rotation axis */
  readonly axis: Readonly<THREE.Vector3>
  /** Rotation angle [deg], ≥ 0 */
  readonly angleDegrees: number
}

/** The identity rotation. Its axis is arbitrary. */
export const IDENTITY_ROTATION: AxisAngle = Object.freeze({
  axis: new THREE.Vector3(0, 1, 0),
  angleDegrees: 0,
})

// ─── Construction ────────────────────────────────────────────────────────────

/**
 * Build a rotation of `angleDegrees` about `axis` (any non-zero length).
 * A zero axis or zero angle yields IDENTITY_ROTATION. A negative angle is
 * stored as the positive angle about the flipped axis.
 */
export function axisAngle(axis: Readonly<THREE.Vector3>, angleDegrees: number): AxisAngle {
  const length = axis.length()
  if (length < ROTATION_EPSILON || Math.abs(angleDegrees) < ROTATION_EPSILON) {
    return IDENTITY_ROTATION
  }
  const unit = axis.clone().divideScalar(length)
  if (angleDegrees < 0) {
    return { axis: unit.negate(), angleDegrees: -angleDegrees }
  }
  return { axis: unit, angleDegrees }
}

/** Unpack a vector whose direction is the axis and whose length is the angle [deg]. */
export function fromPacked(packed: Readonly<THREE.Vector3>): AxisAngle {
  return axisAngle(packed, packed.length())
}

/** Pack into a single vector: axis × angleDegrees. Identity packs to the zero vector. */
export function toPacked(rotation: AxisAngle): THREE.Vector3 {
  return rotation.axis.clone().multiplyScalar(rotation.angleDegrees)
}

export function isIdentityRotation(rotation: AxisAngle, toleranceDegrees: number = ROTATION_EPSILON): boolean {
  const a = wrapDegrees(rotation.angleDegrees, 0, 360)
  return a < toleranceDegrees || 360 - a < toleranceDegrees
}

/** The inverse rotation: same angle about the opposite axis. */
export function negateRotation(rotation: AxisAngle): AxisAngle {
  if (rotation.angleDegrees === 0) return IDENTITY_ROTATION
  return { axis: rotation.axis.clone().negate(), angleDegrees: rotation.angleDegrees }
}

// ─── Application ─────────────────────────────────────────────────────────────

/** 3×3 rotation matrix (Rodrigues form, via THREE.Matrix4.makeRotationAxis). */
export function rotationMatrix(rotation: AxisAngle): THREE.Matrix3 {
  const m4 = new THREE.Matrix4().makeRotationAxis(
    rotation.axis.clone(), rotation.angleDegrees * DEG2RAD,
  )
  return new THREE.Matrix3().setFromMatrix4(m4)
}

/** Rotate `v` by `rotation`. Returns a new vector; identity returns a copy. */
export function rotateVector(v: Readonly<THREE.Vector3>, rotation: AxisAngle): THREE.Vector3 {
  if (rotation.angleDegrees === 0) return v.clone()
  return v.clone().applyMatrix3(rotationMatrix(rotation))
}

/**
 * Three.js quaternion for the same rotation, for a presentation layer
 * that orients Object3D instances by patch rotation.
 */
export function toQuaternion(rotation: AxisAngle): THREE.Quaternion {
  return new THREE.Quaternion().setFromAxisAngle(
    rotation.axis.clone(), rotation.angleDegrees * DEG2RAD,
  )
}

// ─── Composition ─────────────────────────────────────────────────────────────

/**
 * Rotation equivalent to applying `first` and then `second`.
 *
 * Half-angle (quaternion product) form. With α = |second|, β = |first|,
 * l = axis(second), m = axis(first):
 *
 *   cos(γ/2) = cos(α/2)cos(β/2) − sin(α/2)sin(β/2)(l·m)
 *   n        = [ l sin(α/2)cos(β/2) + m cos(α/2)sin(β/2)
 *               + (l×m) sin(α/2)sin(β/2) ] / sin(γ/2)
 *
 * γ ≈ 0 (or 360) collapses to the identity instead of dividing by zero.
 */
export function composeRotations(first: AxisAngle, second: AxisAngle): AxisAngle {
  const beta = first.angleDegrees * DEG2RAD
  const m = first.axis
  const alpha = second.angleDegrees * DEG2RAD
  const l = second.axis

  const sa = Math.sin(alpha / 2), ca = Math.cos(alpha / 2)
  const sb = Math.sin(beta / 2),  cb = Math.cos(beta / 2)

  const gamma = 2 * Math.acos(clamp(ca * cb - sa * sb * l.dot(m), -1, 1))
  const sinHalfGamma = Math.sin(gamma / 2)
  if (gamma < ROTATION_EPSILON || sinHalfGamma < ROTATION_EPSILON) {
    return IDENTITY_ROTATION
  }

  const n = l.clone().multiplyScalar(sa * cb)
    .add(m.clone().multiplyScalar(ca * sb))
    .add(new THREE.Vector3().crossVectors(l, m).multiplyScalar(sa * sb))
    .divideScalar(sinHalfGamma)

  return axisAngle(n, gamma * RAD2DEG)
}

/** Angle [deg] of the rotation that takes orientation `a` to orientation `b`. */
export function rotationAngleBetween(a: AxisAngle, b: AxisAngle): number {
  return composeRotations(negateRotation(a), b).angleDegrees
}

// ─── Alignment ───────────────────────────────────────────────────────────────

/** Some unit vector perpendicular to unit vector `v`. */
function anyPerpendicular(v: Readonly<THREE.Vector3>): THREE.Vector3 {
  const helper = Math.abs(v.x) < 0.9 ? new THREE.Vector3(1, 0, 0) : new THREE.Vector3(0, 1, 0)
  return new THREE.Vector3().crossVectors(v, helper).normalize()
}

/**
 * Rotation that turns the direction of `from` into the direction of `to`
 * (lengths ignored). The axis is normalize(from × to).
 *
 * The angle is atan2(|a×b|, a·b), which agrees with asin(|a×b|) for
 * angles up to 90° and stays correct out to 180°.
 *
 *   - aligned or zero-length inputs → identity
 *   - exactly opposite inputs      → 180° about `fallbackAxis`, or about
 *                                    an arbitrary perpendicular without one
 *
 * `fallbackAxis` must be perpendicular to both inputs.
 */
export function rotationToBecome(
  from: Readonly<THREE.Vector3>,
  to: Readonly<THREE.Vector3>,
  fallbackAxis?: Readonly<THREE.Vector3>,
): AxisAngle {
  const a = from.clone().normalize()
  const b = to.clone().normalize()
  if (a.lengthSq() === 0 || b.lengthSq() === 0) return IDENTITY_ROTATION

  const cross = new THREE.Vector3().crossVectors(a, b)
  const sine = cross.length()
  const cosine = a.dot(b)

  if (sine < ROTATION_EPSILON) {
    if (cosine > 0) return IDENTITY_ROTATION
    return axisAngle(fallbackAxis ? fallbackAxis.clone() : anyPerpendicular(a), 180)
  }
  return axisAngle(cross, atan2Deg(sine, cosine))
}
