import { describe, it, expect } from 'vitest'
import {
  intersect,
  intersectAll,
  toIdSet,
  toSortedList,
  unionAll,
} from '../src/search/set-algebra.js'

const a = { id: 1, label: 'a' }
const b = { id: 2, label: 'b' }
const c = { id: 3, label: 'c' }

describe('set algebra', () => {
  it('should key items by id', () => {
    const set = toIdSet([a, b, { id: 1, label: 'a again' }])

    expect([...set.keys()]).toEqual([1, 2])
    expect(set.get(1)?.label).toBe('a again')
  })

  it('should intersect by id, keeping items from the left side', () => {
    const left = toIdSet([a, b])
    const right = toIdSet([{ id: 2, label: 'other b' }, c])

    expect(toSortedList(intersect(left, right))).toEqual([b])
  })

  it('should intersect many sets seeded from the first', () => {
    const sets = [toIdSet([a, b, c]), toIdSet([b, c]), toIdSet([c, a])]

    expect(toSortedList(intersectAll(sets))).toEqual([c])
  })

  it('should give an empty intersection for no sets', () => {
    expect(intersectAll([]).size).toBe(0)
  })

  it('should not mutate the first set when intersecting', () => {
    const first = toIdSet([a, b])
    intersectAll([first, toIdSet([a])])

    expect(first.size).toBe(2)
  })

  it('should union without duplicates', () => {
    expect(toSortedList(unionAll([toIdSet([c, a]), toIdSet([a, b])]))).toEqual([a, b, c])
    expect(unionAll([]).size).toBe(0)
  })
})
