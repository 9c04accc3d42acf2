/**
 * World models — interchangeable sources of observations.
 *
 * A world is assembled from independent capabilities chosen when it is
 * built:
 *
 *   stars    StarSource     what the sky looks like from (time, lat, long)
 *   travel   TravelSource   heading and distance between two places
 *   surface  SurfaceModel   (optional) the shape the observations imply,
 *                           for drawing and comparison only
 *
 * The real world answers from catalog data and a spherical Earth. The
 * hypothetical worlds (close stars, flat, bowl, saddle) answer by
 * placing stars in space and synthesizing what each place would see.
 * Model coordinates are in thousands of km.
 */

import * as THREE from 'three'
import { DEG2RAD } from './angles.ts'
import { EARTH_RADIUS_KM, KM_PER_MODEL_UNIT } from './constants.ts'
import type { PointFunction } from './local-frame.ts'
import { buildPatch, patchBuilder } from './local-frame.ts'
import type { StarObservation } from './observation.ts'
import { observationsAt } from './observation.ts'
import type { CatalogEntry } from './star-catalog.ts'
import { loadStarCatalog, observeCatalogStar } from './star-catalog.ts'
import type { StarDistances, StarMap } from './star-generator.ts'
import { StarGenerator } from './star-generator.ts'
import type { SurfaceSquare } from './surface-square.ts'
import type { TravelObservation } from './travel.ts'
import { greatCircleTravel, surfaceTravel } from './travel.ts'
import manualData from './data/manual-observations.json'

// ─── Capabilities ────────────────────────────────────────────────────────────

export interface StarSource {
  /** Names of every star this source can report */
  allStars(): string[]
  starObservations(unixTime: number, latitude: number, longitude: number): StarObservation[]
  /** Sun sighting, when the source has one for that moment */
  sunObservation(unixTime: number, latitude: number, longitude: number): StarObservation | undefined
}

export interface TravelSource {
  travelObservation(
    startLatitude: number, startLongitude: number,
    endLatitude: number, endLongitude: number,
  ): TravelObservation
}

export interface SurfaceModel {
  pointAt: PointFunction
  modelSquare(latitude: number, longitude: number): SurfaceSquare
  /** Absolute star positions in model space */
  starMap(): StarMap
}

export interface WorldModel {
  name: string
  description: string
  stars: StarSource
  travel: TravelSource
  surface?: SurfaceModel
}

// ─── Reference data ──────────────────────────────────────────────────────────

/** Where the hypothetical worlds pin their skies to the real one. */
export const REFERENCE_LATITUDE = 38
export const REFERENCE_LONGITUDE = -122

/** Unix time of the bundled manual sightings (2017-03-06 04:00 UT). */
export const MANUAL_OBSERVATION_TIME: number = manualData.unixTime

export const MANUAL_OBSERVATIONS: readonly StarObservation[] = manualData.observations

/** Distances from the reference location [model units] for the close-star worlds. */
export const CLOSE_STAR_DISTANCES: Readonly<Record<string, number>> = {
  Procyon: 6,
  Betelgeuse: 7,
  Rigel: 8,
  Aldebaran: 9,
  Sirius: 380,
  Capella: 390,
  Polaris: 400,
  Dubhe: 410,
}

/** Star field shared by the bowl and saddle worlds. */
export function manifoldStarMap(): StarMap {
  return new Map([
    ['A', new THREE.Vector4(1, 6, 2, 1)],
    ['B', new THREE.Vector4(-3, 7, 4, 1)],
    ['C', new THREE.Vector4(5, 18, -6, 1)],
    ['D', new THREE.Vector4(-17, 19, -8, 1)],
    ['E', new THREE.Vector4(200, 380, 300, 1)],
    ['F', new THREE.Vector4(-300, 390, 150, 1)],
    ['G', new THREE.Vector4(15, 28, -6, 0)],
    ['H', new THREE.Vector4(-7, 29, -18, 0)],
  ])
}

// ─── Point functions ─────────────────────────────────────────────────────────

const EARTH_RADIUS_UNITS = EARTH_RADIUS_KM / KM_PER_MODEL_UNIT

/**
 * Spherical Earth centred on the origin, spin axis on Z with celestial
 * north at −Z. (0, 0) sits on +Y, so its square has the nominal
 * orientation.
 */
export const sphericalEarthPoint: PointFunction = (latitude, longitude) => {
  const lat = latitude * DEG2RAD
  const lng = longitude * DEG2RAD
  // (0, R, 0) turned −lat about X, then −long about Z
  const y = EARTH_RADIUS_UNITS * Math.cos(lat)
  const z = -EARTH_RADIUS_UNITS * Math.sin(lat)
  return new THREE.Vector3(y * Math.sin(lng), y * Math.cos(lng), z)
}

/** Ground-plane radius for a latitude: arc length from the north pole. */
function poleDistance(latitude: number): number {
  return (90 - latitude) * DEG2RAD * EARTH_RADIUS_UNITS
}

/**
 * Flat Earth, azimuthal-equidistant projection about the north pole,
 * lying in the y = 0 plane. Longitude 0 runs along +Z.
 */
export const azimuthalEquidistantPoint: PointFunction = (latitude, longitude) => {
  const r = poleDistance(latitude)
  const lng = longitude * DEG2RAD
  return new THREE.Vector3(r * Math.sin(lng), 0, r * Math.cos(lng))
}

/** The flat projection with the rim raised, deepest at the pole. */
export const bowlPoint: PointFunction = (latitude, longitude) => {
  const p = azimuthalEquidistantPoint(latitude, longitude)
  p.y = 5 * (1 - Math.cos((90 - latitude) / 2 * DEG2RAD))
  return p
}

/** The flat projection bent into y = (x² − z²) / 5R. */
export const saddlePoint: PointFunction = (latitude, longitude) => {
  const p = azimuthalEquidistantPoint(latitude, longitude)
  p.y = (p.x * p.x - p.z * p.z) / (EARTH_RADIUS_UNITS * 5)
  return p
}

// ─── Sources ─────────────────────────────────────────────────────────────────

export interface CatalogStarSourceOptions {
  catalog: CatalogEntry[]
  manualObservations: readonly StarObservation[]
  manualObservationTime: number
}

/**
 * Real sky. At the manual-data time, hand-recorded sightings for the
 * exact location win; every other star comes from the catalog.
 */
export function catalogStarSource(options: Partial<CatalogStarSourceOptions> = {}): StarSource {
  const catalog = options.catalog ?? loadStarCatalog()
  const manual = options.manualObservations ?? MANUAL_OBSERVATIONS
  const manualTime = options.manualObservationTime ?? MANUAL_OBSERVATION_TIME

  return {
    allStars: () => catalog.map(e => e.name),

    starObservations(unixTime, latitude, longitude) {
      const recorded = unixTime === manualTime ? observationsAt(manual, latitude, longitude) : []
      const have = new Set(recorded.map(o => o.name))
      const synthesized = catalog
        .filter(e => !have.has(e.name))
        .map(e => observeCatalogStar(e, unixTime, latitude, longitude))
      return [...recorded, ...synthesized]
    },

    // No Sun data is bundled
    sunObservation: () => undefined,
  }
}

/** Sky synthesized from a surface's star map; the same at every moment. */
export function generatedStarSource(surface: SurfaceModel): StarSource {
  return {
    allStars: () => [...surface.starMap().keys()],
    starObservations: (_unixTime, latitude, longitude) =>
      StarGenerator.synthesizeObservations(surface.modelSquare(latitude, longitude), surface.starMap()),
    sunObservation: () => undefined,
  }
}

export function greatCircleTravelSource(radiusKm: number = EARTH_RADIUS_KM): TravelSource {
  return {
    travelObservation: (startLatitude, startLongitude, endLatitude, endLongitude) =>
      greatCircleTravel(startLatitude, startLongitude, endLatitude, endLongitude, radiusKm),
  }
}

export function surfaceTravelSource(pointAt: PointFunction): TravelSource {
  return {
    travelObservation: (startLatitude, startLongitude, endLatitude, endLongitude) =>
      surfaceTravel(pointAt, startLatitude, startLongitude, endLatitude, endLongitude),
  }
}

export function surfaceModel(pointAt: PointFunction, starMap: StarMap): SurfaceModel {
  return {
    pointAt,
    modelSquare: patchBuilder(pointAt),
    starMap: () => starMap,
  }
}

/**
 * Star positions that reproduce `stars`' sky at the reference location
 * on the surface `pointAt`, at the given distances (missing ones at
 * infinity).
 */
export function referenceStarMap(
  pointAt: PointFunction,
  stars: StarSource,
  distances: StarDistances = {},
): StarMap {
  const sightings = stars.starObservations(MANUAL_OBSERVATION_TIME, REFERENCE_LATITUDE, REFERENCE_LONGITUDE)
  const reference = buildPatch(pointAt, REFERENCE_LATITUDE, REFERENCE_LONGITUDE, {}, sightings)
  return new StarGenerator(reference, distances).starPositions
}

// ─── Worlds ──────────────────────────────────────────────────────────────────

export function realWorld(): WorldModel {
  const stars = catalogStarSource()
  return {
    name: 'real',
    description: 'real world star data',
    stars,
    travel: greatCircleTravelSource(),
    surface: surfaceModel(sphericalEarthPoint, referenceStarMap(sphericalEarthPoint, stars)),
  }
}

/** Spherical Earth under stars only a few thousand km away. */
export function closeStarWorld(): WorldModel {
  const surface = surfaceModel(
    sphericalEarthPoint,
    referenceStarMap(sphericalEarthPoint, catalogStarSource(), CLOSE_STAR_DISTANCES),
  )
  return {
    name: 'closeStars',
    description: 'spherical Earth with close stars',
    stars: generatedStarSource(surface),
    travel: greatCircleTravelSource(),
    surface,
  }
}

export function azimuthalEquidistantWorld(): WorldModel {
  const surface = surfaceModel(
    azimuthalEquidistantPoint,
    referenceStarMap(azimuthalEquidistantPoint, catalogStarSource(), CLOSE_STAR_DISTANCES),
  )
  return {
    name: 'azimuthalEquidistant',
    description: 'azimuthal equidistant projection flat Earth',
    stars: generatedStarSource(surface),
    travel: surfaceTravelSource(azimuthalEquidistantPoint),
    surface,
  }
}

export function bowlWorld(): WorldModel {
  const surface = surfaceModel(bowlPoint, manifoldStarMap())
  return {
    name: 'bowl',
    description: 'bowl',
    stars: generatedStarSource(surface),
    travel: surfaceTravelSource(bowlPoint),
    surface,
  }
}

export function saddleWorld(): WorldModel {
  const surface = surfaceModel(saddlePoint, manifoldStarMap())
  return {
    name: 'saddle',
    description: 'saddle',
    stars: generatedStarSource(surface),
    travel: surfaceTravelSource(saddlePoint),
    surface,
  }
}

// ─── Registry ────────────────────────────────────────────────────────────────

export const WORLD_MODELS = {
  real: realWorld,
  closeStars: closeStarWorld,
  azimuthalEquidistant: azimuthalEquidistantWorld,
  bowl: bowlWorld,
  saddle: saddleWorld,
} as const satisfies Record<string, () => WorldModel>

export type WorldModelName = keyof typeof WORLD_MODELS

export function createWorldModel(name: WorldModelName): WorldModel {
  return WORLD_MODELS[name]()
}
