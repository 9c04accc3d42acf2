/**
 * SquareCollection — ids, lineage and the active-square cycle.
 */

import { describe, it, expect } from 'vitest'
import * as THREE from 'three'
import { SquareCollection } from '../surface/square-collection.ts'
import { squareFromRotation } from '../surface/surface-square.ts'
import type { SurfaceSquare } from '../surface/surface-square.ts'
import { axisAngle } from '../surface/rotation.ts'

function square(latitude: number): SurfaceSquare {
  return squareFromRotation({ center: new THREE.Vector3(0, 0, latitude), latitude, longitude: 0 })
}

describe('SquareCollection', () => {
  it('hands out increasing ids', () => {
    const c = new SquareCollection()
    expect(c.add(square(0))).toBe(1)
    expect(c.add(square(1))).toBe(2)
    expect(c.size).toBe(2)
    expect(c.ids()).toEqual([1, 2])
  })

  it('rejects an unknown parent', () => {
    const c = new SquareCollection()
    expect(() => c.add(square(0), 7)).toThrow(RangeError)
    expect(() => c.addDerived(7, { center: new THREE.Vector3(), latitude: 0, longitude: 0 })).toThrow(RangeError)
  })

  it('tracks parents and children', () => {
    const c = new SquareCollection()
    const root = c.add(square(0))
    const a = c.add(square(1), root)
    const b = c.add(square(2), root)
    expect(c.parentOf(a)).toBe(c.get(root))
    expect(c.parentOf(root)).toBeUndefined()
    expect(c.childrenOf(root)).toEqual([a, b])
  })

  it('addDerived composes the rotation onto the parent', () => {
    const c = new SquareCollection()
    const root = c.add(squareFromRotation({
      center: new THREE.Vector3(), latitude: 0, longitude: 0,
      rotationFromBase: axisAngle(new THREE.Vector3(0, 1, 0), 10),
    }))
    const child = c.addDerived(root, {
      center: new THREE.Vector3(), latitude: 1, longitude: 0,
      rotationFromBase: axisAngle(new THREE.Vector3(0, 1, 0), 15),
    })
    expect(c.entry(child)?.parentId).toBe(root)
    expect(c.get(child)?.rotationFromNominal.angleDegrees).toBeCloseTo(25, 10)
  })

  it('removing a parent clears the child\'s reference but keeps the child', () => {
    const c = new SquareCollection()
    const root = c.add(square(0))
    const child = c.add(square(1), root)
    const grandchild = c.add(square(2), child)

    expect(c.remove(root)).toBe(true)
    expect(c.get(root)).toBeUndefined()
    expect(c.get(child)).toBeDefined()
    expect(c.entry(child)?.parentId).toBeNull()
    expect(c.parentOf(child)).toBeUndefined()
    expect(c.entry(grandchild)?.parentId).toBe(child)
  })

  it('remove of an unknown id is a no-op', () => {
    const c = new SquareCollection()
    c.add(square(0))
    expect(c.remove(42)).toBe(false)
    expect(c.size).toBe(1)
  })

  it('replace keeps lineage', () => {
    const c = new SquareCollection()
    const root = c.add(square(0))
    const child = c.add(square(1), root)
    const replacement = square(5)
    c.replace(child, replacement)
    expect(c.get(child)).toBe(replacement)
    expect(c.entry(child)?.parentId).toBe(root)
    expect(() => c.replace(99, replacement)).toThrow(RangeError)
  })

  it('entries lists id, square and parent in insertion order', () => {
    const c = new SquareCollection()
    const root = c.add(square(0))
    const child = c.add(square(1), root)
    expect(c.entries().map(e => [e.id, e.parentId])).toEqual([[root, null], [child, root]])
    expect(c.entries()[1]?.square).toBe(c.get(child))

    c.remove(root)
    expect(c.entries().map(e => [e.id, e.parentId])).toEqual([[child, null]])
  })

  it('clear empties the collection', () => {
    const c = new SquareCollection()
    c.add(square(0))
    c.clear()
    expect(c.size).toBe(0)
    expect(c.squares()).toEqual([])
  })
})

describe('SquareCollection.next', () => {
  const c = new SquareCollection()
  const ids = [c.add(square(0)), c.add(square(1)), c.add(square(2))]

  it('cycles forward through a "none" slot', () => {
    expect(c.next(null, true)).toBe(ids[0])
    expect(c.next(ids[0], true)).toBe(ids[1])
    expect(c.next(ids[2], true)).toBeNull()
  })

  it('cycles backward through a "none" slot', () => {
    expect(c.next(null, false)).toBe(ids[2])
    expect(c.next(ids[1], false)).toBe(ids[0])
    expect(c.next(ids[0], false)).toBeNull()
  })

  it('returns null for an unknown id or an empty collection', () => {
    expect(c.next(99, true)).toBeNull()
    expect(new SquareCollection().next(null, true)).toBeNull()
  })
})
