/**
 * Flat, id-addressed collection of surface squares.
 *
 * Lineage is a weak back-reference: an entry stores its parent's id, not
 * the parent. Removing a square clears `parentId` on every child; the
 * children themselves stay.
 */

import type { SurfaceSquare, RotatedSquareParams } from './surface-square.ts'
import { squareFromRotation } from './surface-square.ts'

export interface SquareEntry {
  readonly id: number
  square: SurfaceSquare
  /** Id of the square this one was derived from, or null */
  parentId: number | null
}

export class SquareCollection {
  private readonly byId = new Map<number, SquareEntry>()
  private nextId = 1

  get size(): number {
    return this.byId.size
  }

  /** Add `square`; returns its id. `parentId` must name a square already present. */
  add(square: SurfaceSquare, parentId: number | null = null): number {
    if (parentId !== null && !this.byId.has(parentId)) {
      throw new RangeError(`SquareCollection.add: no square with id ${parentId}`)
    }
    const id = this.nextId++
    this.byId.set(id, { id, square, parentId })
    return id
  }

  /**
   * Build a square from `params` relative to the square `parentId`
   * (its rotation composed onto the parent's) and add it.
   */
  addDerived(parentId: number, params: RotatedSquareParams): number {
    const parent = this.get(parentId)
    if (!parent) {
      throw new RangeError(`SquareCollection.addDerived: no square with id ${parentId}`)
    }
    return this.add(squareFromRotation(params, parent), parentId)
  }

  get(id: number): SurfaceSquare | undefined {
    return this.byId.get(id)?.square
  }

  entry(id: number): Readonly<SquareEntry> | undefined {
    return this.byId.get(id)
  }

  /** Swap the square stored under `id`, keeping its lineage. */
  replace(id: number, square: SurfaceSquare): void {
    const e = this.byId.get(id)
    if (!e) throw new RangeError(`SquareCollection.replace: no square with id ${id}`)
    e.square = square
  }

  parentOf(id: number): SurfaceSquare | undefined {
    const parentId = this.byId.get(id)?.parentId
    return parentId == null ? undefined : this.get(parentId)
  }

  childrenOf(id: number): number[] {
    return this.ids().filter(c => this.byId.get(c)?.parentId === id)
  }

  /** Remove one square and clear every dangling parent reference to it. */
  remove(id: number): boolean {
    if (!this.byId.delete(id)) return false
    for (const e of this.byId.values()) {
      if (e.parentId === id) e.parentId = null
    }
    return true
  }

  clear(): void {
    this.byId.clear()
  }

  /** Ids in insertion order. */
  ids(): number[] {
    return [...this.byId.keys()]
  }

  /** Every entry (id, square, parentId) in insertion order. */
  entries(): Readonly<SquareEntry>[] {
    return [...this.byId.values()]
  }

  squares(): SurfaceSquare[] {
    return [...this.byId.values()].map(e => e.square)
  }

  /**
   * Step through the squares as if the list had one extra slot, null,
   * meaning "nothing selected".
   *
   *   next(null, true)  → first id       next(last, true)  → null
   *   next(null, false) → last id        next(first, false) → null
   *
   * An unknown id gives null.
   */
  next(current: number | null, forward: boolean): number | null {
    const ids = this.ids()
    if (ids.length === 0) return null
    if (current === null) return forward ? ids[0] : ids[ids.length - 1]

    const i = ids.indexOf(current)
    if (i < 0) return null
    const j = forward ? i + 1 : i - 1
    return j >= 0 && j < ids.length ? ids[j] : null
  }
}
