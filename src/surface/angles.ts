/**
 * Degree-based trig and range helpers.
 *
 * Everything in the surface library speaks degrees at its public edges;
 * radians only appear inside a single expression.
 */

export const DEG2RAD = Math.PI / 180
export const RAD2DEG = 180 / Math.PI

export function degToRad(degrees: number): number {
  return degrees * DEG2RAD
}

export function radToDeg(radians: number): number {
  return radians * RAD2DEG
}

/** Clamp `v` to [lo, hi]. */
export function clamp(v: number, lo: number, hi: number): number {
  return v < lo ? lo : v > hi ? hi : v
}

/**
 * asin in degrees. The argument is clamped to [-1, 1] first, so unit
 * vectors that came out a hair long still give ±90 instead of NaN.
 */
export function asinDeg(x: number): number {
  return Math.asin(clamp(x, -1, 1)) * RAD2DEG
}

/** acos in degrees, argument clamped to [-1, 1]. */
export function acosDeg(x: number): number {
  return Math.acos(clamp(x, -1, 1)) * RAD2DEG
}

/** atan2 in degrees, result in (-180, 180]. */
export function atan2Deg(y: number, x: number): number {
  return Math.atan2(y, x) * RAD2DEG
}

/**
 * Map `v` into [lo, hi) by adding or subtracting whole multiples of
 * (hi − lo).
 *
 *   wrapDegrees(-90, 0, 360)    →  270
 *   wrapDegrees(540, -180, 180) → -180
 */
export function wrapDegrees(v: number, lo: number, hi: number): number {
  const span = hi - lo
  const wrapped = v - Math.floor((v - lo) / span) * span
  // Floating error can land exactly on `hi`
  return wrapped >= hi ? wrapped - span : wrapped
}

/** Latitude clamped to [-90, 90]. */
export function clampLatitude(latitude: number): number {
  return clamp(latitude, -90, 90)
}

/** Longitude wrapped into (-180, 180]. */
export function normalizeLongitude(longitude: number): number {
  const wrapped = wrapDegrees(longitude, -180, 180)
  return wrapped === -180 ? 180 : wrapped
}
