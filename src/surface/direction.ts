/**
 * Local direction ⇄ sky position (azimuth, elevation).
 *
 * Local frame:
 *   -Z = north,  +Y = up (zenith),  +X = east
 *
 * Azimuth is measured clockwise from north seen from above, so az = 90°
 * points to +X. Elevation is the angle above the horizon plane (y = 0).
 *
 *   toDirection(0, 0)   → (0, 0, -1)
 *   toDirection(90, 0)  → (1, 0, 0)
 *   toDirection(*, 90)  → (0, 1, 0)
 */

import * as THREE from 'three'
import { DEG2RAD, acosDeg, asinDeg, atan2Deg, wrapDegrees } from './angles.ts'
import { NOMINAL_NORTH, NOMINAL_UP } from './constants.ts'
import { axisAngle, rotateVector } from './rotation.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Where something appears in the sky from one place. */
export interface SkyPosition {
  /** Degrees clockwise from geographic north, [0, 360) */
  azimuth: number
  /** Degrees above the horizon, [-90, 90] */
  elevation: number
}

// ─── Conversions ─────────────────────────────────────────────────────────────

/** Unit local direction for an azimuth/elevation pair [deg]. */
export function toDirection(azimuth: number, elevation: number): THREE.Vector3 {
  const az = azimuth * DEG2RAD
  const el = elevation * DEG2RAD
  const horizontal = Math.cos(el)
  return new THREE.Vector3(
    horizontal * Math.sin(az),
    Math.sin(el),
    -horizontal * Math.cos(az),
  )
}

/** Elevation [deg] of a unit local direction, in [-90, 90]. */
export function elevationOf(dir: Readonly<THREE.Vector3>): number {
  return asinDeg(dir.y)
}

/**
 * Azimuth [deg] of a unit local direction, in [0, 360).
 *
 * atan2 wants (standard y, standard x). Here x grows with azimuth and
 * −z starts at 1 at north, so the pair is (dir.x, −dir.z).
 * Undefined at the poles; any value comes back there.
 */
export function azimuthOf(dir: Readonly<THREE.Vector3>): number {
  return wrapDegrees(atan2Deg(dir.x, -dir.z), 0, 360)
}

/** Sky position of a local direction (need not be unit length). */
export function skyPositionOf(dir: Readonly<THREE.Vector3>): SkyPosition {
  const unit = dir.clone().normalize()
  return { azimuth: azimuthOf(unit), elevation: elevationOf(unit) }
}

// ─── Horizontal helpers ──────────────────────────────────────────────────────

/**
 * Unit horizontal travel direction for a heading [deg east of north]:
 * nominal north rotated by −heading about nominal up.
 */
export function headingToVector(headingDegrees: number): THREE.Vector3 {
  return rotateVector(NOMINAL_NORTH, axisAngle(NOMINAL_UP, -headingDegrees))
}

/** Component of `v` orthogonal to the unit vector `unit`. */
export function orthogonalComponent(
  v: Readonly<THREE.Vector3>,
  unit: Readonly<THREE.Vector3>,
): THREE.Vector3 {
  return v.clone().sub(unit.clone().multiplyScalar(v.dot(unit)))
}

/** Angle between two directions [deg], in [0, 180]. */
export function separationAngleDegrees(
  a: Readonly<THREE.Vector3>,
  b: Readonly<THREE.Vector3>,
): number {
  return acosDeg(a.clone().normalize().dot(b.clone().normalize()))
}
