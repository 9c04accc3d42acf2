/**
 * Local-frame builder — a surface square from any point function.
 *
 * Given P(latitude, longitude) → 3-D point, the square's north and east
 * come from finite differences of P, and its absolute rotation is found
 * in two steps:
 *
 *   rot1: nominal north (0,0,-1) → computed north
 *   rot2: rot1(nominal east)     → computed east
 *         (about an axis parallel to north, so north is kept)
 *
 *   rotationFromNominal = compose(rot1, rot2)
 *
 * Rotating the nominal triad by that rotation gives back the square's
 * triad, up to floating error.
 */

import * as THREE from 'three'
import type { SurfaceSquare } from './surface-square.ts'
import { makeSurfaceSquare } from './surface-square.ts'
import type { AxisAngle } from './rotation.ts'
import { composeRotations, rotateVector, rotationToBecome } from './rotation.ts'
import type { SkyPosition } from './direction.ts'
import type { StarObservation } from './observation.ts'
import { NOMINAL_EAST, NOMINAL_NORTH } from './constants.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Map (latitude, longitude) [deg] to a point on a surface. */
export type PointFunction = (latitude: number, longitude: number) => THREE.Vector3

export interface FrameOptions {
  /** Finite-difference step [deg] (default 0.1) */
  stepDegrees: number
  /** Side length recorded on the square [km] (default 1) */
  sizeKm: number
}

export const DEFAULT_FRAME_OPTIONS: FrameOptions = {
  stepDegrees: 0.1,
  sizeKm: 1,
}

/** Orthonormal local triad at one point. */
export interface LocalFrame {
  center: THREE.Vector3
  north: THREE.Vector3
  up: THREE.Vector3
  east: THREE.Vector3
}

// ─── Finite differences ──────────────────────────────────────────────────────

/**
 * Local triad at (latitude, longitude).
 *
 * North differences toward the nearer pole's side: the southern
 * neighbour when latitude ≥ 0, the northern one otherwise, so the step
 * never crosses a pole. East does the same with longitude, staying
 * inside [-180, 180].
 *
 * Raw east is only used to get up = east × north; east is then rebuilt
 * as north × up so the triad is orthonormal even when P is not smooth.
 */
export function localFrameAt(
  pointAt: PointFunction,
  latitude: number,
  longitude: number,
  stepDegrees: number = DEFAULT_FRAME_OPTIONS.stepDegrees,
): LocalFrame {
  const center = pointAt(latitude, longitude).clone()

  const north = latitude >= 0
    ? center.clone().sub(pointAt(latitude - stepDegrees, longitude))
    : pointAt(latitude + stepDegrees, longitude).clone().sub(center)
  north.normalize()

  const rawEast = longitude >= 0
    ? center.clone().sub(pointAt(latitude, longitude - stepDegrees))
    : pointAt(latitude, longitude + stepDegrees).clone().sub(center)
  rawEast.normalize()

  const up = new THREE.Vector3().crossVectors(rawEast, north).normalize()
  const east = new THREE.Vector3().crossVectors(north, up)

  return { center, north, up, east }
}

/** Absolute rotation carrying the nominal triad onto (north, east). */
export function rotationFromNominalFrame(north: THREE.Vector3, east: THREE.Vector3): AxisAngle {
  const rot1 = rotationToBecome(NOMINAL_NORTH, north)
  const rot1NominalEast = rotateVector(NOMINAL_EAST, rot1)
  // Both easts are ⟂ north, so a half turn must be about north
  const rot2 = rotationToBecome(rot1NominalEast, east, north)
  return composeRotations(rot1, rot2)
}

// ─── Patch builder ───────────────────────────────────────────────────────────

/**
 * Build the square at (latitude, longitude) on the surface P.
 * The square has no parent, so its rotation from base is its rotation
 * from nominal.
 */
export function buildPatch(
  pointAt: PointFunction,
  latitude: number,
  longitude: number,
  options: Partial<FrameOptions> = {},
  starObservations?: ReadonlyMap<string, SkyPosition> | Iterable<StarObservation>,
): SurfaceSquare {
  const { stepDegrees, sizeKm } = { ...DEFAULT_FRAME_OPTIONS, ...options }
  const frame = localFrameAt(pointAt, latitude, longitude, stepDegrees)

  return makeSurfaceSquare({
    center: frame.center,
    north: frame.north,
    up: frame.up,
    sizeKm,
    latitude,
    longitude,
    rotationFromBase: rotationFromNominalFrame(frame.north, frame.east),
    starObservations,
  })
}

/** `buildPatch` bound to one surface. */
export function patchBuilder(
  pointAt: PointFunction,
  options: Partial<FrameOptions> = {},
): (latitude: number, longitude: number) => SurfaceSquare {
  return (latitude, longitude) => buildPatch(pointAt, latitude, longitude, options)
}
