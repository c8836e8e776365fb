/**
 * RecordStore - generic persistence contract used by the validator, the
 * catalog service and the search layer.
 */

import type {
  EntityKind,
  EntityMap,
  LookupField,
  RecordMap,
  RelationKey,
  RelationTarget,
} from '../types/entities.js'

export interface FieldMatch<K extends EntityKind> {
  field: LookupField<K>
  value: string
  /** `equals` (default) or substring `contains` */
  mode?: 'equals' | 'contains'
  caseInsensitive?: boolean
}

/**
 * Field matches combined by OR, optionally ignoring one record id
 */
export interface WhereClause<K extends EntityKind> {
  anyOf: FieldMatch<K>[]
  excludeId?: number
}

export interface RecordStore {
  getById<K extends EntityKind>(kind: K, id: number): EntityMap[K] | null

  /** First match by id, or null. An empty `anyOf` matches nothing. */
  findOneWhere<K extends EntityKind>(kind: K, where: WhereClause<K>): EntityMap[K] | null

  findAllWhere<K extends EntityKind>(kind: K, where: WhereClause<K>): EntityMap[K][]

  listAll<K extends EntityKind>(kind: K): EntityMap[K][]

  count(kind: EntityKind): number

  /** Entities linked to `ownerId` through `relation`, ordered by id */
  listAssociated<P extends RelationKey>(
    relation: P,
    ownerId: number
  ): EntityMap[RelationTarget<P>][]

  insert<K extends EntityKind>(kind: K, record: RecordMap[K]): EntityMap[K]

  /** @returns the updated entity, or null when no row has that id */
  update<K extends EntityKind>(
    kind: K,
    id: number,
    changes: Partial<RecordMap[K]>
  ): EntityMap[K] | null

  delete(kind: EntityKind, id: number): boolean

  /** @returns false when the link already existed */
  associate(relation: RelationKey, ownerId: number, targetId: number): boolean

  /** @returns false when there was no link to remove */
  dissociate(relation: RelationKey, ownerId: number, targetId: number): boolean

  /**
   * Remove every association of one record
   *
   * @returns number of links removed
   */
  clearAssociations(kind: EntityKind, id: number): number
}
