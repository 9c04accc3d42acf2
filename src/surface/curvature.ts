/**
 * Curvature calculator — how the ground bent between two places,
 * inferred only from where two stars appeared at each.
 *
 * Treat the sky as a rigid body. Whatever rotation carries the end
 * sightings onto the start sightings is the rotation the observer's own
 * frame went through on the way, and its effect on the up-normal is the
 * bending of the surface:
 *
 *   rot1  end-A → start-A
 *   rot2  about start-A, rot1(end-B) → start-B   (in the plane ⊥ start-A)
 *   up''  = rot2(rot1(up))
 *
 * The rotation up → up'' is split along the travel direction:
 *
 *   about left-of-travel (up × forward)  →  normal curvature   [1/km]
 *   about forward                        →  geodesic torsion   [deg/km]
 *
 * Everything is in the start square's local frame (-Z north, +Y up,
 * +X east). Problems with the inputs come back as warnings on the
 * result; nothing here throws.
 */

import * as THREE from 'three'
import { asinDeg } from './angles.ts'
import type { SkyPosition } from './direction.ts'
import { headingToVector, orthogonalComponent, separationAngleDegrees, toDirection } from './direction.ts'
import type { AxisAngle } from './rotation.ts'
import { rotateVector, rotationToBecome, toPacked } from './rotation.ts'
import { NOMINAL_UP } from './constants.ts'
import { greatCircleTravel } from './travel.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CurvatureInputs {
  /** Star A seen from the start */
  startA: SkyPosition
  /** Star B seen from the start */
  startB: SkyPosition
  /** Star A seen from the end */
  endA: SkyPosition
  /** Star B seen from the end */
  endB: SkyPosition
  /** Heading leaving the start [deg east of north] */
  startTravelHeading: number
  /** Heading arriving at the end [deg east of north]; defaults to startTravelHeading */
  endTravelHeading?: number
  /** Distance travelled [km] */
  distanceKm: number
}

/** Intermediate vectors, all in the start frame. */
export interface CurvatureSteps {
  rot1: AxisAngle
  rot2: AxisAngle
  /** rot2(rot1(end-B)) */
  alignedEndB: THREE.Vector3
  /** rot2(rot1(up)) */
  alignedUp: THREE.Vector3
  travelForward: THREE.Vector3
  /** rot2(rot1(end travel direction)) */
  alignedEndForward: THREE.Vector3
  /** Distance actually used [km] (after substitution) */
  distanceKm: number
}

export interface CurvatureResult {
  /** Angle between aligned end-B and start-B [deg] */
  deviationBDegrees: number
  /** [1/km], positive when the normal leans forward along the path (sphere-like) */
  normalCurvature: number
  /** Sideways turn of the travel direction [deg/km], positive to the left */
  geodesicCurvature: number
  /** Twist of the normal about the travel direction [deg/km], right-hand rule */
  geodesicTorsion: number
  warnings: string[]
  steps: CurvatureSteps
}

export interface CurvatureConstants {
  /** Sightings below this elevation [deg] get a refraction warning */
  lowElevationDegrees: number
  /** B-star deviation above this [deg] gets a consistency warning */
  maxDeviationDegrees: number
  /** Used in place of a non-positive distance [km] */
  substituteDistanceKm: number
}

export const DEFAULT_CURVATURE_CONSTANTS: CurvatureConstants = {
  lowElevationDegrees: 20,
  maxDeviationDegrees: 1,
  substituteDistanceKm: 1,
}

// ─── Decomposition ───────────────────────────────────────────────────────────

/**
 * Normal curvature and geodesic torsion from the up-normals at both ends
 * of a hop, with `forward` the unit travel direction at the start.
 * Both normals are in the start frame. `distanceKm` must be positive.
 */
export function curvatureFromNormals(
  startUp: Readonly<THREE.Vector3>,
  endUp: Readonly<THREE.Vector3>,
  forward: Readonly<THREE.Vector3>,
  distanceKm: number,
): { normalCurvature: number; geodesicTorsion: number } {
  const turn = toPacked(rotationToBecome(startUp, endUp))
  const left = new THREE.Vector3().crossVectors(startUp, forward).normalize()

  const curvatureAngle = turn.dot(left)
  const twistAngle = turn.dot(forward)

  return {
    normalCurvature: 2 * Math.PI * curvatureAngle / (360 * distanceKm),
    geodesicTorsion: twistAngle / distanceKm,
  }
}

// ─── Calculator ──────────────────────────────────────────────────────────────

export class CurvatureCalculator {
  readonly constants: CurvatureConstants

  constructor(constants: Partial<CurvatureConstants> = {}) {
    this.constants = { ...DEFAULT_CURVATURE_CONSTANTS, ...constants }
  }

  calculate(inputs: CurvatureInputs): CurvatureResult {
    const c = this.constants
    const warnings: string[] = []

    // 1. Input checks
    const elevations = [inputs.startA, inputs.startB, inputs.endA, inputs.endB].map(s => s.elevation)
    if (elevations.some(e => e < c.lowElevationDegrees)) {
      warnings.push(
        `Star elevation below ${c.lowElevationDegrees}° is unreliable due to atmospheric refraction`,
      )
    }

    let distanceKm = inputs.distanceKm
    if (!(distanceKm > 0)) {
      warnings.push(
        `Travel distance ${inputs.distanceKm} km is not positive; using ${c.substituteDistanceKm} km`,
      )
      distanceKm = c.substituteDistanceKm
    }

    // 2. Directions
    const startA = toDirection(inputs.startA.azimuth, inputs.startA.elevation)
    const startB = toDirection(inputs.startB.azimuth, inputs.startB.elevation)
    const endA = toDirection(inputs.endA.azimuth, inputs.endA.elevation)
    const endB = toDirection(inputs.endB.azimuth, inputs.endB.elevation)
    const up = NOMINAL_UP.clone()

    // 3. Line up star A
    const rot1 = rotationToBecome(endA, startA)
    const endB1 = rotateVector(endB, rot1)
    const up1 = rotateVector(up, rot1)

    // 4. Spin about star A to line up star B
    const startBPerp = orthogonalComponent(startB, startA).normalize()
    const endBPerp = orthogonalComponent(endB1, startA).normalize()
    const rot2 = rotationToBecome(endBPerp, startBPerp)
    const alignedEndB = rotateVector(endB1, rot2)
    const alignedUp = rotateVector(up1, rot2)

    // 5. Consistency
    const deviationBDegrees = separationAngleDegrees(alignedEndB, startB)
    if (deviationBDegrees > c.maxDeviationDegrees) {
      warnings.push(
        `Star B deviates ${deviationBDegrees.toFixed(3)}° after alignment ` +
        `(limit ${c.maxDeviationDegrees}°); sightings are inconsistent`,
      )
    }

    // 6–7. Split the normal's turn along the travel direction
    const travelForward = headingToVector(inputs.startTravelHeading)
    const { normalCurvature, geodesicTorsion } =
      curvatureFromNormals(up, alignedUp, travelForward, distanceKm)

    // 8. Sideways turn of the path itself
    const endForward = headingToVector(inputs.endTravelHeading ?? inputs.startTravelHeading)
    const alignedEndForward = rotateVector(rotateVector(endForward, rot1), rot2)
    const turnSine = new THREE.Vector3().crossVectors(travelForward, alignedEndForward).dot(up)
    const geodesicCurvature = asinDeg(turnSine) / distanceKm

    return {
      deviationBDegrees,
      normalCurvature,
      geodesicCurvature,
      geodesicTorsion,
      warnings,
      steps: {
        rot1,
        rot2,
        alignedEndB,
        alignedUp,
        travelForward,
        alignedEndForward,
        distanceKm,
      },
    }
  }
}

// ─── Geographic convenience ──────────────────────────────────────────────────

/**
 * Travel inputs from two coordinates on the real (spherical) Earth.
 * The end heading is the direction of arrival: the end→start heading
 * turned round.
 */
export function travelInputsFromLatLong(
  startLatitude: number, startLongitude: number,
  endLatitude: number, endLongitude: number,
): Pick<CurvatureInputs, 'startTravelHeading' | 'endTravelHeading' | 'distanceKm'> {
  const travel = greatCircleTravel(startLatitude, startLongitude, endLatitude, endLongitude)
  return {
    startTravelHeading: travel.startToEndHeading,
    endTravelHeading: (travel.endToStartHeading + 180) % 360,
    distanceKm: travel.distanceKm,
  }
}
