/**
 * Shared constants — nominal frame, planet size, default tolerances.
 *
 * Nominal local frame (every patch orientation is expressed against it):
 *   -Z = north,  +Y = up,  +X = east
 *
 * Right-handed: north × up = east, i.e. (0,0,-1) × (0,1,0) = (1,0,0).
 */

import * as THREE from 'three'

// ─── Nominal frame ───────────────────────────────────────────────────────────

/** Nominal north, -Z. Call `.clone()` before mutating. */
export const NOMINAL_NORTH: Readonly<THREE.Vector3> = new THREE.Vector3(0, 0, -1)

/** Nominal up, +Y. */
export const NOMINAL_UP: Readonly<THREE.Vector3> = new THREE.Vector3(0, 1, 0)

/** Nominal east, +X. */
export const NOMINAL_EAST: Readonly<THREE.Vector3> = new THREE.Vector3(1, 0, 0)

// ─── Planet ──────────────────────────────────────────────────────────────────

/** Mean radius of the Earth [km]. Used only to turn great-circle angles into distances. */
export const EARTH_RADIUS_KM = 6371.0

/**
 * World-model coordinates are in thousands of kilometres, so a sphere
 * of Earth's size has radius 6.371 model units.
 */
export const KM_PER_MODEL_UNIT = 1000

// ─── Numeric tolerances ──────────────────────────────────────────────────────

/** Below this a rotation angle [deg] or axis length is treated as zero. */
export const ROTATION_EPSILON = 1e-12
