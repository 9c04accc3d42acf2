/**
 * Travel observations — heading and distance between two places.
 *
 * These are the "independently known" measurements the reconstruction
 * leans on: which way you set off, which way you arrive, and how far
 * you went. Two sources:
 *
 *   greatCircleTravel  the real world (a sphere of EARTH_RADIUS_KM)
 *   surfaceTravel      any modelled surface, from its point function
 */

import * as THREE from 'three'
import { DEG2RAD, acosDeg, atan2Deg, clampLatitude, normalizeLongitude, wrapDegrees } from './angles.ts'
import { EARTH_RADIUS_KM, KM_PER_MODEL_UNIT } from './constants.ts'
import { azimuthOf, orthogonalComponent } from './direction.ts'
import { negateRotation, rotateVector } from './rotation.ts'
import type { PointFunction } from './local-frame.ts'
import { buildPatch } from './local-frame.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TravelObservation {
  /** [-90, 90] */
  startLatitude: number
  /** (-180, 180] */
  startLongitude: number
  endLatitude: number
  endLongitude: number
  /** Along-surface distance [km] */
  distanceKm: number
  /** Heading leaving the start, [0, 360) east of north, in the start's frame */
  startToEndHeading: number
  /** Heading from the end back to the start, in the end's frame */
  endToStartHeading: number
}

// ─── Spherical trigonometry ──────────────────────────────────────────────────

/**
 * Great-circle angle [deg] between two points, spherical law of cosines:
 *
 *   cos c = sin φ1 sin φ2 + cos φ1 cos φ2 cos Δλ
 */
export function sphericalSeparationAngle(
  longitude1: number, latitude1: number,
  longitude2: number, latitude2: number,
): number {
  const p1 = latitude1 * DEG2RAD
  const p2 = latitude2 * DEG2RAD
  const dl = (longitude2 - longitude1) * DEG2RAD
  return acosDeg(Math.sin(p1) * Math.sin(p2) + Math.cos(p1) * Math.cos(p2) * Math.cos(dl))
}

/**
 * Initial great-circle heading [deg east of north, in [0, 360)] from
 * point 1 toward point 2. 0 when the points coincide.
 *
 * From the spherical triangle (pole, 1, 2): the cosine rule gives
 * cos H · sin c = cos φ1 sin φ2 − sin φ1 cos φ2 cos Δλ and the sine rule
 * gives sin H · sin c = sin Δλ cos φ2; atan2 of the pair keeps the
 * quadrant and avoids acos near 0°.
 */
export function latLongPairHeading(
  latitude1: number, longitude1: number,
  latitude2: number, longitude2: number,
): number {
  const p1 = latitude1 * DEG2RAD
  const p2 = latitude2 * DEG2RAD
  const dl = (longitude2 - longitude1) * DEG2RAD

  const y = Math.sin(dl) * Math.cos(p2)
  const x = Math.cos(p1) * Math.sin(p2) - Math.sin(p1) * Math.cos(p2) * Math.cos(dl)
  if (Math.abs(x) < 1e-15 && Math.abs(y) < 1e-15) return 0
  return wrapDegrees(atan2Deg(y, x), 0, 360)
}

/**
 * Travel between two coordinates on a sphere of `radiusKm`.
 * Coordinates are normalized first (latitude clamped, longitude wrapped).
 */
export function greatCircleTravel(
  startLatitude: number, startLongitude: number,
  endLatitude: number, endLongitude: number,
  radiusKm: number = EARTH_RADIUS_KM,
): TravelObservation {
  const sLat = clampLatitude(startLatitude)
  const sLng = normalizeLongitude(startLongitude)
  const eLat = clampLatitude(endLatitude)
  const eLng = normalizeLongitude(endLongitude)

  const arcDegrees = sphericalSeparationAngle(sLng, sLat, eLng, eLat)

  return {
    startLatitude: sLat,
    startLongitude: sLng,
    endLatitude: eLat,
    endLongitude: eLng,
    distanceKm: arcDegrees * DEG2RAD * radiusKm,
    startToEndHeading: latLongPairHeading(sLat, sLng, eLat, eLng),
    endToStartHeading: latLongPairHeading(eLat, eLng, sLat, sLng),
  }
}

// ─── Modelled surfaces ───────────────────────────────────────────────────────

/**
 * Travel on an arbitrary surface P.
 *
 * Uses the straight chord between the two square centers; the ground in
 * between is ignored. Each heading is the azimuth of the chord's
 * horizontal part in that end's local frame.
 *
 * @param kmPerUnit  model units → km (default 1000: models are in 1000 km)
 */
export function surfaceTravel(
  pointAt: PointFunction,
  startLatitude: number, startLongitude: number,
  endLatitude: number, endLongitude: number,
  kmPerUnit: number = KM_PER_MODEL_UNIT,
): TravelObservation {
  const start = buildPatch(pointAt, startLatitude, startLongitude)
  const end = buildPatch(pointAt, endLatitude, endLongitude)

  const chord = end.center.clone().sub(start.center)
  const localHeading = (v: THREE.Vector3, square: typeof start): number => {
    const local = rotateVector(v, negateRotation(square.rotationFromNominal))
    const up = rotateVector(square.up, negateRotation(square.rotationFromNominal))
    return azimuthOf(orthogonalComponent(local, up).normalize())
  }

  return {
    startLatitude,
    startLongitude,
    endLatitude,
    endLongitude,
    distanceKm: chord.length() * kmPerUnit,
    startToEndHeading: localHeading(chord, start),
    endToStartHeading: localHeading(chord.clone().negate(), end),
  }
}
