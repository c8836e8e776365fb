/**
 * Catalog session - one connection, one open transaction and the services
 * bound to it
 *
 * @example
 * ```typescript
 * const tagId = withSession({ dbPath: ':memory:' }, (session) => {
 *   return session.catalog.create({ kind: 'tag', name: 'Wisdom' }).id
 * })
 * ```
 */

import { existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import type { Database as DatabaseType } from 'better-sqlite3'
import { loadConfig, type CatalogConfig } from '../config.js'
import { DatabaseError } from '../errors/index.js'
import { QuoteSearch } from '../search/QuoteSearch.js'
import { CatalogService } from '../services/CatalogService.js'
import { FavoritesService } from '../services/FavoritesService.js'
import { QuoteBuilder } from '../services/QuoteBuilder.js'
import { UserBuilder } from '../services/UserBuilder.js'
import type { RecordStore } from '../store/RecordStore.js'
import { SqliteRecordStore } from '../store/SqliteRecordStore.js'
import { createAuditEvent, createLogger, type AuditResult, type Logger } from '../utils/logger.js'
import { EntityValidator } from '../validation/EntityValidator.js'
import { closeDatabase, createDatabase } from './schema.js'

export interface SessionOptions {
  /** Borrow an open connection; the session never closes it */
  db?: DatabaseType
  /** Database path, overriding the configured one */
  dbPath?: string
  /** Settings to use instead of reading the environment */
  config?: CatalogConfig
  logger?: Logger
}

const log = createLogger('Session')

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

function ensureDbDirectory(dbPath: string): void {
  const dir = dirname(dbPath)
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
}

export class Session {
  readonly db: DatabaseType
  readonly store: RecordStore
  readonly validator: EntityValidator
  readonly catalog: CatalogService
  readonly search: QuoteSearch
  readonly favorites: FavoritesService

  private ownsDb: boolean
  private closed = false
  private log: Logger

  constructor(db: DatabaseType, ownsDb: boolean, logger?: Logger) {
    this.db = db
    this.ownsDb = ownsDb
    this.log = logger ?? log

    this.store = new SqliteRecordStore(db)
    this.validator = new EntityValidator(this.store)
    this.catalog = new CatalogService(this.store, this.validator, { logger: this.log })
    this.search = new QuoteSearch(this.store)
    this.favorites = new FavoritesService(this.store, this.catalog, { logger: this.log })

    this.begin()
  }

  get isClosed(): boolean {
    return this.closed
  }

  newQuote(): QuoteBuilder {
    return new QuoteBuilder(this.catalog)
  }

  newUser(): UserBuilder {
    return new UserBuilder(this.catalog, this.favorites)
  }

  /**
   * Commit pending changes and start a new transaction. A failed commit
   * rolls its changes back before throwing.
   *
   * @throws {DatabaseError} if the session is closed or the commit fails
   */
  commit(): void {
    this.finish('COMMIT', 'session.commit')
  }

  /**
   * Discard pending changes and start a new transaction
   *
   * @throws {DatabaseError} if the session is closed or the rollback fails
   */
  rollback(): void {
    this.finish('ROLLBACK', 'session.rollback')
  }

  /**
   * Discard uncommitted changes and release the connection if the session
   * opened it. Closing twice is a no-op.
   */
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true

    if (this.db.open && this.db.inTransaction) {
      this.db.exec('ROLLBACK')
    }
    if (this.ownsDb) {
      closeDatabase(this.db)
    }
  }

  private begin(): void {
    this.db.exec('BEGIN')
  }

  private finish(statement: 'COMMIT' | 'ROLLBACK', eventType: 'session.commit' | 'session.rollback'): void {
    const action = statement.toLowerCase()

    if (this.closed) {
      throw new DatabaseError(`Cannot ${action} a closed session`, { context: { action } })
    }

    try {
      this.db.exec(statement)
      this.begin()
    } catch (error) {
      this.reset()
      this.audit(eventType, action, 'error')
      throw new DatabaseError(`Failed to ${action} session`, { cause: error, context: { action } })
    }

    this.audit(eventType, action, 'success')
  }

  /**
   * Discard whatever a failed commit left pending and open a fresh
   * transaction, so the session stays usable
   */
  private reset(): void {
    if (!this.db.open) {
      return
    }
    try {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK')
      }
      this.begin()
    } catch (resetError) {
      this.log.error('Failed to reset session transaction', toError(resetError))
    }
  }

  private audit(
    eventType: 'session.commit' | 'session.rollback',
    action: string,
    result: AuditResult
  ): void {
    this.log.auditLog(createAuditEvent(eventType, 'Session', 'session', action, result))
  }
}

/**
 * Open a session on a borrowed connection, or on a new one at the
 * configured path
 */
export function openSession(options: SessionOptions = {}): Session {
  if (options.db) {
    return new Session(options.db, false, options.logger)
  }

  const config = options.config ?? loadConfig()
  const dbPath = options.dbPath ?? config.dbPath

  if (dbPath !== ':memory:') {
    ensureDbDirectory(dbPath)
  }

  const db = createDatabase(dbPath, {
    readonly: config.readonly,
    timeout: config.busyTimeoutMs,
  })

  try {
    return new Session(db, true, options.logger)
  } catch (error) {
    closeDatabase(db)
    throw new DatabaseError('Failed to open session', { cause: error, context: { dbPath } })
  }
}

/**
 * Run `fn` in a session: commit on success, roll back and rethrow on
 * failure, then close
 */
export function withSession<T>(options: SessionOptions, fn: (session: Session) => T): T {
  const session = openSession(options)
  try {
    const result = fn(session)
    session.commit()
    return result
  } catch (error) {
    if (session.db.open && session.db.inTransaction) {
      try {
        session.rollback()
      } catch (rollbackError) {
        log.error('Rollback after failure also failed', toError(rollbackError))
      }
    }
    throw error
  } finally {
    session.close()
  }
}
