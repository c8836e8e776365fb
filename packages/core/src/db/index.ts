/**
 * Database exports
 */

export {
  SCHEMA_VERSION,
  createDatabase,
  closeDatabase,
  initializeSchema,
  getSchemaVersion,
  runMigrations,
  type DatabaseOptions,
  type Migration,
} from './schema.js'
export { Session, openSession, withSession, type SessionOptions } from './session.js'
