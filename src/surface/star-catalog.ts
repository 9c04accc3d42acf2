/**
 * Star catalog — celestial coordinates for a handful of bright stars,
 * and the sky position each one has from a given time and place.
 *
 * Catalog strings use the planetarium notation:
 *   right ascension  HHhMMmSSs        e.g. 05h16m41s
 *   declination      ±DD°MM'SS"       e.g. -08°12'05"
 *
 * A malformed string is a hard failure (CatalogParseError); there is
 * nothing sensible to fall back on.
 */

import { DEG2RAD, RAD2DEG, asinDeg, wrapDegrees } from './angles.ts'
import type { StarObservation } from './observation.ts'
import catalogData from './data/star-catalog.json'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CatalogEntry {
  name: string
  /** [deg], 0–360 */
  rightAscensionDegrees: number
  /** [deg], −90–90 */
  declinationDegrees: number
}

export class CatalogParseError extends Error {
  constructor(
    /** Which field failed: 'rightAscension', 'declination', 'entry', ... */
    public readonly field: string,
    /** The offending value */
    public readonly value: unknown,
  ) {
    super(`Could not parse ${field}: ${JSON.stringify(value)}`)
    this.name = 'CatalogParseError'
  }
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

const RA_PATTERN = /^(\d+)h(\d+)m(\d+)s$/
const DEC_PATTERN = /^([+-]?)(\d+)°(\d+)'(\d+)"$/

/** 'HHhMMmSSs' → degrees (1h = 15°). */
export function parseRightAscension(text: string): number {
  const m = RA_PATTERN.exec(text)
  if (!m) throw new CatalogParseError('rightAscension', text)
  const [hours, minutes, seconds] = [m[1], m[2], m[3]].map(Number)
  return hours * 15 + minutes * (15 / 60) + seconds * (15 / 3600)
}

/**
 * '±DD°MM\'SS"' → degrees. The sign applies to the whole angle, so
 * '-00°30\'00"' is −0.5.
 */
export function parseDeclination(text: string): number {
  const m = DEC_PATTERN.exec(text)
  if (!m) throw new CatalogParseError('declination', text)
  const [degrees, minutes, seconds] = [m[2], m[3], m[4]].map(Number)
  const magnitude = degrees + minutes / 60 + seconds / 3600
  return m[1] === '-' ? -magnitude : magnitude
}

export function parseCatalogEntry(name: string, rightAscension: string, declination: string): CatalogEntry {
  return {
    name,
    rightAscensionDegrees: parseRightAscension(rightAscension),
    declinationDegrees: parseDeclination(declination),
  }
}

function stringField(record: object, key: string): string {
  const value: unknown = key in record ? Reflect.get(record, key) : undefined
  if (typeof value !== 'string') throw new CatalogParseError(key, value)
  return value
}

/**
 * Parse a catalog table: an array of { name, rightAscension, declination }
 * string records. Defaults to the bundled data/star-catalog.json.
 */
export function loadStarCatalog(data: unknown = catalogData): CatalogEntry[] {
  if (!Array.isArray(data)) throw new CatalogParseError('catalog', data)
  return data.map((record: unknown) => {
    if (typeof record !== 'object' || record === null) {
      throw new CatalogParseError('entry', record)
    }
    return parseCatalogEntry(
      stringField(record, 'name'),
      stringField(record, 'rightAscension'),
      stringField(record, 'declination'),
    )
  })
}

// ─── Sky positions ───────────────────────────────────────────────────────────

/** Unix time of the J2000 epoch, 2000-01-01 12:00 UT. */
const J2000_UNIX_SECONDS = 946728000

/**
 * Greenwich Mean Sidereal Time [hours, 0–24) for a unix time [s]:
 *
 *   GMST = 18.697374558 + 24.06570982441908 · D   (D = days since J2000)
 */
export function unixTimeToGmstHours(unixTime: number): number {
  const days = (unixTime - J2000_UNIX_SECONDS) / 86400
  return wrapDegrees(18.697374558 + 24.06570982441908 * days, 0, 24)
}

/**
 * Where `entry` appears from (latitude, longitude) at `unixTime`.
 *
 *   H  = GMST·15 + longitude − RA                       (hour angle)
 *   az = atan2(sin H, cos H sin φ − tan δ cos φ) + 180°
 *   el = asin(sin φ sin δ + cos φ cos δ cos H)
 *
 * The atan2 form measures azimuth from south; the 180° puts 0 at north.
 */
export function observeCatalogStar(
  entry: CatalogEntry,
  unixTime: number,
  latitude: number,
  longitude: number,
): StarObservation {
  const hourAngle = (unixTimeToGmstHours(unixTime) * 15 + longitude - entry.rightAscensionDegrees) * DEG2RAD
  const lat = latitude * DEG2RAD
  const dec = entry.declinationDegrees * DEG2RAD

  const azimuth = Math.atan2(
    Math.sin(hourAngle),
    Math.cos(hourAngle) * Math.sin(lat) - Math.tan(dec) * Math.cos(lat),
  ) * RAD2DEG + 180
  const elevation = asinDeg(
    Math.sin(lat) * Math.sin(dec) + Math.cos(lat) * Math.cos(dec) * Math.cos(hourAngle),
  )

  return {
    latitude,
    longitude,
    name: entry.name,
    azimuth: wrapDegrees(azimuth, 0, 360),
    elevation,
  }
}
