/**
 * SqliteRecordStore - RecordStore backed by a better-sqlite3 connection
 *
 * The store owns no transaction of its own; it runs inside whatever
 * transaction the session has opened on the connection.
 */

import Database from 'better-sqlite3'
import type { Database as DatabaseType } from 'better-sqlite3'
import { z } from 'zod'
import { DatabaseError } from '../errors/index.js'
import type {
  EntityKind,
  EntityMap,
  RecordMap,
  RelationKey,
  RelationTarget,
} from '../types/entities.js'
import { createLogger } from '../utils/logger.js'
import type { FieldMatch, RecordStore, WhereClause } from './RecordStore.js'
import { RELATIONS, RELATION_KEYS, TABLES, type SqlValue } from './tables.js'

const log = createLogger('RecordStore')

const CountRowSchema = z.object({ count: z.number() })

interface SqlFragment {
  sql: string
  params: SqlValue[]
}

/**
 * Escape LIKE wildcards so user input matches literally
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`)
}

/**
 * Record store for the catalog tables
 *
 * @example
 * ```typescript
 * const store = new SqliteRecordStore(createDatabase(':memory:'))
 * const tag = store.insert('tag', { name: 'life' })
 * store.findOneWhere('tag', { anyOf: [{ field: 'name', value: 'LIFE', caseInsensitive: true }] })
 * ```
 */
export class SqliteRecordStore implements RecordStore {
  private db: DatabaseType

  constructor(db: DatabaseType) {
    this.db = db
  }

  getById<K extends EntityKind>(kind: K, id: number): EntityMap[K] | null {
    const spec = TABLES[kind]
    const row = this.db.prepare(`SELECT * FROM ${spec.table} WHERE id = ?`).get(id)
    return row === undefined ? null : spec.parse(row)
  }

  findOneWhere<K extends EntityKind>(kind: K, where: WhereClause<K>): EntityMap[K] | null {
    const fragment = this.buildWhere(where)
    if (!fragment) {
      return null
    }

    const spec = TABLES[kind]
    const row = this.db
      .prepare(`SELECT * FROM ${spec.table} WHERE ${fragment.sql} ORDER BY id LIMIT 1`)
      .get(...fragment.params)
    return row === undefined ? null : spec.parse(row)
  }

  findAllWhere<K extends EntityKind>(kind: K, where: WhereClause<K>): EntityMap[K][] {
    const fragment = this.buildWhere(where)
    if (!fragment) {
      return []
    }

    const spec = TABLES[kind]
    const rows = this.db
      .prepare(`SELECT * FROM ${spec.table} WHERE ${fragment.sql} ORDER BY id`)
      .all(...fragment.params)
    return rows.map((row) => spec.parse(row))
  }

  listAll<K extends EntityKind>(kind: K): EntityMap[K][] {
    const spec = TABLES[kind]
    const rows = this.db.prepare(`SELECT * FROM ${spec.table} ORDER BY id`).all()
    return rows.map((row) => spec.parse(row))
  }

  count(kind: EntityKind): number {
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM ${TABLES[kind].table}`).get()
    return CountRowSchema.parse(row).count
  }

  listAssociated<P extends RelationKey>(
    relation: P,
    ownerId: number
  ): EntityMap[RelationTarget<P>][] {
    const spec = RELATIONS[relation]
    const target = TABLES[spec.target]

    const rows =
      spec.type === 'join'
        ? this.db
            .prepare(
              `SELECT t.* FROM ${target.table} t
               INNER JOIN ${spec.table} j ON j.${spec.targetColumn} = t.id
               WHERE j.${spec.ownColumn} = ?
               ORDER BY t.id`
            )
            .all(ownerId)
        : this.db
            .prepare(`SELECT * FROM ${target.table} WHERE ${spec.column} = ? ORDER BY id`)
            .all(ownerId)

    return rows.map((row) => target.parse(row))
  }

  insert<K extends EntityKind>(kind: K, record: RecordMap[K]): EntityMap[K] {
    const spec = TABLES[kind]
    const columns = spec.toColumns(record)
    const names = Object.keys(columns)
    const placeholders = names.map(() => '?').join(', ')

    const result = this.write(`insert ${kind}`, () =>
      this.db
        .prepare(`INSERT INTO ${spec.table} (${names.join(', ')}) VALUES (${placeholders})`)
        .run(...Object.values(columns))
    )

    const id = Number(result.lastInsertRowid)
    const created = this.getById(kind, id)
    if (!created) {
      throw new DatabaseError(`Inserted ${kind} ${id} could not be read back`, {
        context: { kind, id },
      })
    }

    log.debug('Inserted record', { kind, id })
    return created
  }

  update<K extends EntityKind>(
    kind: K,
    id: number,
    changes: Partial<RecordMap[K]>
  ): EntityMap[K] | null {
    const spec = TABLES[kind]
    const columns = spec.toColumns(changes)
    const names = Object.keys(columns)

    if (names.length > 0) {
      const assignments = names.map((name) => `${name} = ?`).join(', ')
      const result = this.write(`update ${kind}`, () =>
        this.db
          .prepare(`UPDATE ${spec.table} SET ${assignments} WHERE id = ?`)
          .run(...Object.values(columns), id)
      )
      if (result.changes === 0) {
        return null
      }
      log.debug('Updated record', { kind, id, columns: names })
    }

    return this.getById(kind, id)
  }

  delete(kind: EntityKind, id: number): boolean {
    const result = this.write(`delete ${kind}`, () =>
      this.db.prepare(`DELETE FROM ${TABLES[kind].table} WHERE id = ?`).run(id)
    )
    return result.changes > 0
  }

  associate(relation: RelationKey, ownerId: number, targetId: number): boolean {
    const spec = RELATIONS[relation]

    const result = this.write(`associate ${relation}`, () =>
      spec.type === 'join'
        ? this.db
            .prepare(
              `INSERT OR IGNORE INTO ${spec.table} (${spec.ownColumn}, ${spec.targetColumn}) VALUES (?, ?)`
            )
            .run(ownerId, targetId)
        : this.db
            .prepare(
              `UPDATE ${TABLES[spec.target].table} SET ${spec.column} = ?
               WHERE id = ? AND (${spec.column} IS NULL OR ${spec.column} != ?)`
            )
            .run(ownerId, targetId, ownerId)
    )
    return result.changes > 0
  }

  dissociate(relation: RelationKey, ownerId: number, targetId: number): boolean {
    const spec = RELATIONS[relation]

    const result = this.write(`dissociate ${relation}`, () =>
      spec.type === 'join'
        ? this.db
            .prepare(
              `DELETE FROM ${spec.table} WHERE ${spec.ownColumn} = ? AND ${spec.targetColumn} = ?`
            )
            .run(ownerId, targetId)
        : this.db
            .prepare(
              `UPDATE ${TABLES[spec.target].table} SET ${spec.column} = NULL
               WHERE id = ? AND ${spec.column} = ?`
            )
            .run(targetId, ownerId)
    )
    return result.changes > 0
  }

  clearAssociations(kind: EntityKind, id: number): number {
    let removed = 0

    for (const key of RELATION_KEYS) {
      const spec = RELATIONS[key]
      if (spec.owner !== kind) {
        continue
      }

      const result = this.write(`clear ${key}`, () =>
        spec.type === 'join'
          ? this.db.prepare(`DELETE FROM ${spec.table} WHERE ${spec.ownColumn} = ?`).run(id)
          : this.db
              .prepare(
                `UPDATE ${TABLES[spec.target].table} SET ${spec.column} = NULL WHERE ${spec.column} = ?`
              )
              .run(id)
      )
      removed += result.changes
    }

    return removed
  }

  private buildWhere<K extends EntityKind>(where: WhereClause<K>): SqlFragment | null {
    if (where.anyOf.length === 0) {
      return null
    }

    const params: SqlValue[] = []
    const matches = where.anyOf.map((match) => {
      const fragment = this.buildMatch(match)
      params.push(...fragment.params)
      return fragment.sql
    })

    let sql = `(${matches.join(' OR ')})`
    if (where.excludeId !== undefined) {
      sql += ' AND id != ?'
      params.push(where.excludeId)
    }

    return { sql, params }
  }

  private buildMatch<K extends EntityKind>(match: FieldMatch<K>): SqlFragment {
    const column: string = match.field

    if (match.mode === 'contains') {
      return match.caseInsensitive
        ? { sql: `${column} LIKE ? ESCAPE '\\'`, params: [`%${escapeLike(match.value)}%`] }
        : { sql: `instr(${column}, ?) > 0`, params: [match.value] }
    }

    const collation = match.caseInsensitive ? 'NOCASE' : 'BINARY'
    return { sql: `${column} = ? COLLATE ${collation}`, params: [match.value] }
  }

  /**
   * Run a write statement, wrapping driver failures in DatabaseError
   */
  private write<T>(action: string, fn: () => T): T {
    try {
      return fn()
    } catch (error) {
      const sqliteCode = error instanceof Database.SqliteError ? error.code : undefined
      throw new DatabaseError(`Failed to ${action}`, {
        cause: error,
        context: { action, sqliteCode },
      })
    }
  }
}
