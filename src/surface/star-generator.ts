/**
 * Star generator — fix absolute star positions from one square's sky,
 * then synthesize what any other square would see.
 *
 * Star positions are homogeneous (THREE.Vector4):
 *   w = 1  finite point, model units
 *   w = 0  direction at infinity (no distance assumed)
 *
 * A star is finite only when the distance table gives it a positive,
 * finite distance from the reference square; everything else sits at
 * infinity. Positions are computed once, in the constructor.
 */

import * as THREE from 'three'
import type { SurfaceSquare } from './surface-square.ts'
import type { StarObservation } from './observation.ts'
import { negateRotation, rotateVector } from './rotation.ts'
import { azimuthOf, elevationOf, toDirection } from './direction.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Star name → homogeneous position (w = 0 at infinity). */
export type StarMap = ReadonlyMap<string, THREE.Vector4>

/** Star name → distance from the reference square, model units. */
export type StarDistances = ReadonlyMap<string, number> | Readonly<Record<string, number>>

function isDistanceMap(distances: StarDistances): distances is ReadonlyMap<string, number> {
  return distances instanceof Map
}

function distanceLookup(distances: StarDistances): ReadonlyMap<string, number> {
  return isDistanceMap(distances) ? distances : new Map(Object.entries(distances))
}

// ─── Generator ───────────────────────────────────────────────────────────────

export class StarGenerator {
  /** Absolute star positions, in reference observation order. */
  readonly starPositions: StarMap

  constructor(referenceSquare: SurfaceSquare, distances: StarDistances = {}) {
    const table = distanceLookup(distances)
    const positions = new Map<string, THREE.Vector4>()

    for (const [name, sky] of referenceSquare.starObservations) {
      const local = toDirection(sky.azimuth, sky.elevation)
      let distance = table.get(name)

      if (distance !== undefined && !(distance > 0 && Number.isFinite(distance))) {
        console.warn(`StarGenerator: unusable distance ${distance} for ${name}, placing it at infinity`)
        distance = undefined
      }

      if (distance === undefined) {
        const dir = rotateVector(local, referenceSquare.rotationFromNominal)
        positions.set(name, new THREE.Vector4(dir.x, dir.y, dir.z, 0))
      } else {
        const p = rotateVector(local.multiplyScalar(distance), referenceSquare.rotationFromNominal)
          .add(referenceSquare.center)
        positions.set(name, new THREE.Vector4(p.x, p.y, p.z, 1))
      }
    }

    for (const name of table.keys()) {
      if (!referenceSquare.starObservations.has(name)) {
        console.warn(`StarGenerator: ${name} has a distance but no reference sighting, skipping`)
      }
    }

    this.starPositions = positions
  }

  /** Sightings of every known star from `square`. */
  synthesize(square: SurfaceSquare): StarObservation[] {
    return StarGenerator.synthesizeObservations(square, this.starPositions)
  }

  /**
   * Sightings of every star in `starPositions` from `square`.
   *
   * The square-to-star vector (just the direction for w = 0) is taken
   * into the square's local frame with the inverse of its
   * rotationFromNominal, normalized, and read off as azimuth/elevation.
   */
  static synthesizeObservations(square: SurfaceSquare, starPositions: StarMap): StarObservation[] {
    const toLocal = negateRotation(square.rotationFromNominal)
    const observations: StarObservation[] = []

    for (const [name, position] of starPositions) {
      const global = new THREE.Vector3(position.x, position.y, position.z)
      if (position.w !== 0) global.sub(square.center)

      const dir = rotateVector(global, toLocal).normalize()
      observations.push({
        latitude: square.latitude,
        longitude: square.longitude,
        name,
        azimuth: azimuthOf(dir),
        elevation: elevationOf(dir),
      })
    }
    return observations
  }
}
