/**
 * Id-keyed set operations over entities
 *
 * Entities read in separate queries are distinct objects, so set identity
 * is the record id rather than object identity.
 */

export interface Identified {
  id: number
}

export type IdSet<T extends Identified> = Map<number, T>

export function toIdSet<T extends Identified>(items: Iterable<T>): IdSet<T> {
  const set: IdSet<T> = new Map()
  for (const item of items) {
    set.set(item.id, item)
  }
  return set
}

/**
 * Entries of `left` whose id is also in `right`
 */
export function intersect<T extends Identified>(left: IdSet<T>, right: IdSet<T>): IdSet<T> {
  const result: IdSet<T> = new Map()
  for (const [id, item] of left) {
    if (right.has(id)) {
      result.set(id, item)
    }
  }
  return result
}

/**
 * Intersection seeded from the first set; no sets gives an empty set
 */
export function intersectAll<T extends Identified>(sets: readonly IdSet<T>[]): IdSet<T> {
  const [first, ...rest] = sets
  if (!first) {
    return new Map()
  }
  return rest.reduce((acc, set) => intersect(acc, set), new Map(first))
}

export function unionAll<T extends Identified>(sets: readonly IdSet<T>[]): IdSet<T> {
  const result: IdSet<T> = new Map()
  for (const set of sets) {
    for (const [id, item] of set) {
      if (!result.has(id)) {
        result.set(id, item)
      }
    }
  }
  return result
}

/**
 * Set members ordered by id
 */
export function toSortedList<T extends Identified>(set: IdSet<T>): T[] {
  return [...set.values()].sort((a, b) => a.id - b.id)
}
