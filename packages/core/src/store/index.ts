/**
 * Persistence exports
 */

export type { RecordStore, FieldMatch, WhereClause } from './RecordStore.js'
export { SqliteRecordStore, escapeLike } from './SqliteRecordStore.js'
export { TABLES, RELATIONS, RELATION_KEYS, type RelationSpec } from './tables.js'
