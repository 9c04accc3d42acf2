/**
 * Surface squares — small oriented patches of the reconstructed surface.
 *
 * Each square has a center, a local north/up/east triad and the sky as
 * seen from it. Its orientation is kept twice:
 *
 *   rotationFromBase     — applied on top of the parent square
 *   rotationFromNominal  — absolute, against the nominal frame
 *                          (-Z north, +Y up, +X east)
 *
 *   rotationFromNominal = compose(parent.rotationFromNominal, rotationFromBase)
 *                       = rotationFromBase              (no parent)
 *
 * Latitude and longitude are labels tying a square to real-world
 * coordinates; they never drive the geometry.
 *
 * Parents are passed in when a square is made and not referenced
 * afterwards. Lineage lives in SquareCollection (square-collection.ts).
 */

import * as THREE from 'three'
import type { AxisAngle } from './rotation.ts'
import { IDENTITY_ROTATION, axisAngle, composeRotations, rotateVector } from './rotation.ts'
import type { SkyPosition } from './direction.ts'
import type { StarObservation } from './observation.ts'
import { skyPositionsByName } from './observation.ts'
import { NOMINAL_EAST, NOMINAL_NORTH, NOMINAL_UP } from './constants.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SurfaceSquare {
  /** Center point, model units */
  readonly center: THREE.Vector3
  /** Unit local north */
  readonly north: THREE.Vector3
  /** Unit local up (away from gravity), ⊥ north */
  readonly up: THREE.Vector3
  /** north × up */
  readonly east: THREE.Vector3
  /** Side length [km] */
  readonly sizeKm: number
  readonly latitude: number
  readonly longitude: number
  readonly rotationFromBase: AxisAngle
  readonly rotationFromNominal: AxisAngle
  /** Star name → where it appears from this square */
  readonly starObservations: ReadonlyMap<string, SkyPosition>
}

export interface SurfaceSquareParams {
  center: THREE.Vector3
  north: THREE.Vector3
  up: THREE.Vector3
  /** Default 1 km */
  sizeKm?: number
  latitude: number
  longitude: number
  /** Default identity */
  rotationFromBase?: AxisAngle
  starObservations?: ReadonlyMap<string, SkyPosition> | Iterable<StarObservation>
}

/** Inputs for a square whose triad follows from its rotation alone. */
export type RotatedSquareParams = Omit<SurfaceSquareParams, 'north' | 'up'>

// ─── Construction ────────────────────────────────────────────────────────────

function isSkyMap(
  source: ReadonlyMap<string, SkyPosition> | Iterable<StarObservation>,
): source is ReadonlyMap<string, SkyPosition> {
  return source instanceof Map
}

function toSkyMap(
  source: ReadonlyMap<string, SkyPosition> | Iterable<StarObservation> | undefined,
): ReadonlyMap<string, SkyPosition> {
  if (source === undefined) return new Map()
  if (isSkyMap(source)) return new Map(source)
  return skyPositionsByName(source)
}

/**
 * Assemble a square from an explicit triad. East is derived; the
 * absolute rotation is composed with `parent` when one is given.
 */
export function makeSurfaceSquare(params: SurfaceSquareParams, parent?: SurfaceSquare): SurfaceSquare {
  const rotationFromBase = params.rotationFromBase ?? IDENTITY_ROTATION
  const rotationFromNominal = parent
    ? composeRotations(parent.rotationFromNominal, rotationFromBase)
    : rotationFromBase

  return {
    center: params.center.clone(),
    north: params.north.clone(),
    up: params.up.clone(),
    east: new THREE.Vector3().crossVectors(params.north, params.up),
    sizeKm: params.sizeKm ?? 1,
    latitude: params.latitude,
    longitude: params.longitude,
    rotationFromBase,
    rotationFromNominal,
    starObservations: toSkyMap(params.starObservations),
  }
}

/**
 * A square whose north and up are the nominal ones carried through its
 * absolute rotation. This is how the reconstruction places a new square
 * relative to an existing one.
 */
export function squareFromRotation(params: RotatedSquareParams, parent?: SurfaceSquare): SurfaceSquare {
  const rotationFromBase = params.rotationFromBase ?? IDENTITY_ROTATION
  const absolute = parent
    ? composeRotations(parent.rotationFromNominal, rotationFromBase)
    : rotationFromBase
  return makeSurfaceSquare({
    ...params,
    north: rotateVector(NOMINAL_NORTH, absolute),
    up: rotateVector(NOMINAL_UP, absolute),
  }, parent)
}

/** Same square, different sky. */
export function withStarObservations(
  square: SurfaceSquare,
  observations: ReadonlyMap<string, SkyPosition> | Iterable<StarObservation>,
): SurfaceSquare {
  return { ...square, starObservations: toSkyMap(observations) }
}

// ─── Manual orientation nudges ───────────────────────────────────────────────

/** A named rotation about one of the square's local axes (right-hand rule). */
export interface RotationCommand {
  readonly description: string
  /** Local axis: -Z forward, +Y up, +X right */
  readonly axis: Readonly<THREE.Vector3>
}

export const ROTATION_COMMANDS = {
  rollRight:     { description: 'Roll square right',     axis: new THREE.Vector3(0, 0, -1) },
  rollLeft:      { description: 'Roll square left',      axis: new THREE.Vector3(0, 0, 1) },
  pitchForward:  { description: 'Pitch square forward',  axis: new THREE.Vector3(-1, 0, 0) },
  pitchBackward: { description: 'Pitch square backward', axis: new THREE.Vector3(1, 0, 0) },
  yawRight:      { description: 'Yaw square right',      axis: new THREE.Vector3(0, -1, 0) },
  yawLeft:       { description: 'Yaw square left',       axis: new THREE.Vector3(0, 1, 0) },
} as const satisfies Record<string, RotationCommand>

export type RotationCommandName = keyof typeof ROTATION_COMMANDS

/**
 * Turn a square about one of its own local axes by `degrees`.
 *
 * The nudge is expressed in world space (local axis carried through
 * rotationFromNominal) and applied after the existing rotation, to both
 * the absolute and the parent-relative rotation.
 */
export function rotateSquare(
  square: SurfaceSquare,
  localAxis: Readonly<THREE.Vector3>,
  degrees: number,
): SurfaceSquare {
  const nudge = axisAngle(rotateVector(localAxis, square.rotationFromNominal), degrees)
  const rotationFromNominal = composeRotations(square.rotationFromNominal, nudge)
  const north = rotateVector(NOMINAL_NORTH, rotationFromNominal)
  const up = rotateVector(NOMINAL_UP, rotationFromNominal)
  return {
    ...square,
    north,
    up,
    east: rotateVector(NOMINAL_EAST, rotationFromNominal),
    rotationFromBase: composeRotations(square.rotationFromBase, nudge),
    rotationFromNominal,
  }
}

export function applyRotationCommand(
  square: SurfaceSquare,
  command: RotationCommandName,
  degrees: number,
): SurfaceSquare {
  return rotateSquare(square, ROTATION_COMMANDS[command].axis, degrees)
}

// ─── Derived directions ──────────────────────────────────────────────────────

/**
 * Where the celestial pole should be for a square labelled with this
 * latitude: local north tipped up by the latitude about local east.
 */
export function celestialNorth(square: SurfaceSquare): THREE.Vector3 {
  return rotateVector(square.north, axisAngle(square.east, square.latitude))
}

function fmt(v: Readonly<THREE.Vector3>): string {
  return `(${v.x.toFixed(4)},${v.y.toFixed(4)},${v.z.toFixed(4)})`
}

export function describeSquare(square: SurfaceSquare): string {
  const r = square.rotationFromNominal
  return `Sq(c=${fmt(square.center)}, n=${fmt(square.north)}, u=${fmt(square.up)}, ` +
    `s=${square.sizeKm}, lat=${square.latitude}, lng=${square.longitude}, ` +
    `rfn=${r.angleDegrees.toFixed(3)}°@${fmt(r.axis)})`
}
