/**
 * Star sightings — one star, one place, one moment.
 *
 * The moment is implied: every sighting handed to the library is assumed
 * to have been taken at the same instant.
 */

import type { SkyPosition } from './direction.ts'

export interface StarObservation extends SkyPosition {
  /** Observer latitude [deg north], a label only */
  latitude: number
  /** Observer longitude [deg east], a label only */
  longitude: number
  /** Star name */
  name: string
}

/** name → sky position, keeping the first sighting of each star. */
export function skyPositionsByName(observations: Iterable<StarObservation>): Map<string, SkyPosition> {
  const map = new Map<string, SkyPosition>()
  for (const o of observations) {
    if (!map.has(o.name)) map.set(o.name, { azimuth: o.azimuth, elevation: o.elevation })
  }
  return map
}

/** Sightings taken at exactly (latitude, longitude). */
export function observationsAt(
  observations: readonly StarObservation[],
  latitude: number,
  longitude: number,
): StarObservation[] {
  return observations.filter(o => o.latitude === latitude && o.longitude === longitude)
}

export function formatObservation(o: StarObservation): string {
  return `lat=${o.latitude}, lng=${o.longitude}, name="${o.name}", az=${o.azimuth.toFixed(2)}, el=${o.elevation.toFixed(2)}`
}
