/**
 * World models — point functions, star sources and the registry.
 */

import { describe, it, expect } from 'vitest'
import {
  sphericalEarthPoint, azimuthalEquidistantPoint, bowlPoint, saddlePoint,
  realWorld, closeStarWorld, azimuthalEquidistantWorld, bowlWorld, saddleWorld,
  catalogStarSource, WORLD_MODELS, createWorldModel,
  MANUAL_OBSERVATIONS, MANUAL_OBSERVATION_TIME, REFERENCE_LATITUDE, REFERENCE_LONGITUDE,
} from '../surface/world-models.ts'
import type { WorldModel } from '../surface/world-models.ts'
import type { StarObservation } from '../surface/observation.ts'
import { rotateVector } from '../surface/rotation.ts'
import { NOMINAL_NORTH, NOMINAL_UP } from '../surface/constants.ts'

function sky(observations: StarObservation[]): Map<string, StarObservation> {
  return new Map(observations.map(o => [o.name, o]))
}

const manualAtReference = MANUAL_OBSERVATIONS.filter(
  o => o.latitude === REFERENCE_LATITUDE && o.longitude === REFERENCE_LONGITUDE,
)

// ─── Point functions ─────────────────────────────────────────────────────────

describe('point functions', () => {
  it('sphere', () => {
    const origin = sphericalEarthPoint(0, 0)
    expect(origin.x).toBe(0)
    expect(origin.y).toBe(6.371)
    expect(origin.z).toBeCloseTo(0, 12)
    const pole = sphericalEarthPoint(90, 0)
    expect(pole.y).toBeCloseTo(0, 12)
    expect(pole.z).toBeCloseTo(-6.371, 12)
    const east = sphericalEarthPoint(0, 90)
    expect(east.x).toBeCloseTo(6.371, 12)
    expect(sphericalEarthPoint(38, -122).length()).toBeCloseTo(6.371, 12)
  })

  it('flat projection', () => {
    expect(azimuthalEquidistantPoint(90, 45).length()).toBe(0)
    const p = azimuthalEquidistantPoint(0, 0)
    expect(p.x).toBe(0)
    expect(p.y).toBe(0)
    expect(p.z).toBeCloseTo(10.007543, 6)
  })

  it('bowl rises away from the pole', () => {
    expect(bowlPoint(90, 0).y).toBeCloseTo(0, 12)
    expect(bowlPoint(0, 0).y).toBeCloseTo(1.464466, 6)
    expect(bowlPoint(0, 0).z).toBeCloseTo(10.007543, 6)
  })

  it('saddle curves up along X and down along Z', () => {
    expect(saddlePoint(0, 0).y).toBeCloseTo(-3.143962, 6)
    expect(saddlePoint(0, 90).y).toBeCloseTo(3.143962, 6)
  })
})

// ─── Real world ──────────────────────────────────────────────────────────────

describe('realWorld', () => {
  const world = realWorld()

  it('lists the catalog stars', () => {
    expect(world.stars.allStars()).toEqual([
      'Capella', 'Betelgeuse', 'Rigel', 'Aldebaran', 'Sirius', 'Procyon', 'Polaris', 'Dubhe',
    ])
  })

  it('returns the manual sightings where they exist', () => {
    const obs = world.stars.starObservations(MANUAL_OBSERVATION_TIME, 38, -122)
    expect(obs).toEqual(manualAtReference)
  })

  it('synthesizes sightings elsewhere', () => {
    const obs = sky(world.stars.starObservations(MANUAL_OBSERVATION_TIME, 38, -100))
    expect(obs.size).toBe(8)
    expect(obs.get('Sirius')?.azimuth).toBeCloseTo(205.724692, 5)
    expect(obs.get('Sirius')?.elevation).toBeCloseTo(31.246408, 5)
  })

  it('synthesizes at other times even where manual sightings exist', () => {
    const obs = sky(world.stars.starObservations(MANUAL_OBSERVATION_TIME + 3600, 38, -122))
    expect(obs.get('Sirius')?.azimuth).toBeCloseTo(198.223458, 5)
  })

  it('has no Sun', () => {
    expect(world.stars.sunObservation(MANUAL_OBSERVATION_TIME, 38, -122)).toBeUndefined()
  })

  it('travels along great circles', () => {
    const t = world.travel.travelObservation(38, -122, 38, -113)
    expect(t.distanceKm).toBeCloseTo(788.2974, 3)
    expect(t.startToEndHeading).toBeCloseTo(87.22598, 4)
  })

  it('puts every star at infinity on its model sphere', () => {
    const stars = world.surface?.starMap()
    expect(stars?.size).toBe(8)
    for (const p of stars?.values() ?? []) expect(p.w).toBe(0)
  })
})

describe('catalogStarSource', () => {
  it('takes a custom manual table', () => {
    const source = catalogStarSource({
      manualObservations: [{ latitude: 0, longitude: 0, name: 'Sirius', azimuth: 1, elevation: 2 }],
      manualObservationTime: 1000,
    })
    const obs = source.starObservations(1000, 0, 0)
    expect(obs[0]).toEqual({ latitude: 0, longitude: 0, name: 'Sirius', azimuth: 1, elevation: 2 })
    expect(obs).toHaveLength(8)
    expect(obs.filter(o => o.name === 'Sirius')).toHaveLength(1)
  })
})

// ─── Hypothetical worlds ─────────────────────────────────────────────────────

describe('closeStarWorld', () => {
  const world = closeStarWorld()

  it('matches the real sky at the reference location', () => {
    const obs = sky(world.stars.starObservations(MANUAL_OBSERVATION_TIME, REFERENCE_LATITUDE, REFERENCE_LONGITUDE))
    for (const m of manualAtReference) {
      expect(obs.get(m.name)?.azimuth).toBeCloseTo(m.azimuth, 3)
      expect(obs.get(m.name)?.elevation).toBeCloseTo(m.elevation, 3)
    }
  })

  it('near stars shift a lot 9° to the east', () => {
    const obs = sky(world.stars.starObservations(0, 38, -113))
    expect(obs.get('Procyon')?.azimuth).toBeCloseTo(187.16339, 3)
    expect(obs.get('Procyon')?.elevation).toBeCloseTo(57.02052, 3)
    expect(obs.get('Polaris')?.azimuth).toBeCloseTo(359.11608, 3)
  })

  it('places every star at a finite distance', () => {
    for (const p of world.surface?.starMap().values() ?? []) expect(p.w).toBe(1)
  })
})

describe('azimuthalEquidistantWorld', () => {
  const world = azimuthalEquidistantWorld()

  it('matches the real sky at the reference location', () => {
    const obs = sky(world.stars.starObservations(MANUAL_OBSERVATION_TIME, REFERENCE_LATITUDE, REFERENCE_LONGITUDE))
    for (const m of manualAtReference) {
      expect(obs.get(m.name)?.azimuth).toBeCloseTo(m.azimuth, 3)
      expect(obs.get(m.name)?.elevation).toBeCloseTo(m.elevation, 3)
    }
  })

  it('Polaris drifts east of north on the flat world', () => {
    const obs = sky(world.stars.starObservations(0, 38, -113))
    expect(obs.get('Polaris')?.azimuth).toBeCloseTo(8.13495, 3)
    expect(obs.get('Polaris')?.elevation).toBeCloseTo(38.20521, 3)
  })

  it('measures travel on the plane', () => {
    const t = world.travel.travelObservation(0, 0, 10, 0)
    expect(t.distanceKm).toBeCloseTo(1111.9493, 3)
  })
})

describe('bowl and saddle worlds', () => {
  it('bowl sky from 30N 0E', () => {
    const obs = sky(bowlWorld().stars.starObservations(0, 30, 0))
    expect([...obs.keys()]).toEqual(['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H'])
    expect(obs.get('A')?.azimuth).toBeCloseTo(15.68633, 3)
    expect(obs.get('A')?.elevation).toBeCloseTo(58.92301, 3)
    expect(obs.get('G')?.azimuth).toBeCloseTo(88.11773, 3)
    expect(obs.get('G')?.elevation).toBeCloseTo(62.34687, 3)
  })

  it('saddle sky from 30N 0E', () => {
    const obs = sky(saddleWorld().stars.starObservations(0, 30, 0))
    expect(obs.get('E')?.azimuth).toBeCloseTo(121.62389, 3)
    expect(obs.get('E')?.elevation).toBeCloseTo(63.22978, 3)
    expect(obs.get('G')?.azimuth).toBeCloseTo(42.5035, 3)
    expect(obs.get('G')?.elevation).toBeCloseTo(46.65242, 3)
  })

  it('both list the eight fixed stars', () => {
    expect(saddleWorld().stars.allStars()).toEqual(['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H'])
  })
})

// ─── Registry ────────────────────────────────────────────────────────────────

describe('WORLD_MODELS', () => {
  const worlds: WorldModel[] = Object.values(WORLD_MODELS).map(make => make())

  it('creates each world under its own name', () => {
    expect(Object.keys(WORLD_MODELS)).toEqual(['real', 'closeStars', 'azimuthalEquidistant', 'bowl', 'saddle'])
    expect(worlds.map(w => w.name)).toEqual(Object.keys(WORLD_MODELS))
    expect(createWorldModel('bowl').description).toBe('bowl')
  })

  it('every model square obeys the frame contract', () => {
    for (const world of worlds) {
      const surface = world.surface
      expect(surface).toBeDefined()
      if (!surface) continue
      for (const [lat, lng] of [[38, -122], [-20, 45]]) {
        const sq = surface.modelSquare(lat, lng)
        const north = rotateVector(NOMINAL_NORTH, sq.rotationFromNominal)
        const up = rotateVector(NOMINAL_UP, sq.rotationFromNominal)
        expect(north.distanceTo(sq.north)).toBeLessThan(1e-9)
        expect(up.distanceTo(sq.up)).toBeLessThan(1e-9)
      }
    }
  })
})
