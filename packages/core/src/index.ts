/**
 * @quotebook/core - Quotes catalog data access
 */

// Version
export const VERSION = '0.1.0'

// Types
export {
  ENTITY_KINDS,
  type EntityKind,
  type Entity,
  type EntityMap,
  type RecordMap,
  type DraftMap,
  type EntityDraft,
  type QuoteDraft,
  type AuthorDraft,
  type TagDraft,
  type CategoryDraft,
  type UserDraft,
  type ChangesOf,
  type LookupField,
  type RelationKey,
  type RelationOwner,
  type RelationTarget,
  type Quote,
  type Author,
  type Tag,
  type Category,
  type User,
} from './types/entities.js'

// Database and sessions
export * from './db/index.js'

// Configuration
export { loadConfig, DEFAULT_DB_PATH, DEFAULT_BUSY_TIMEOUT_MS, type CatalogConfig } from './config.js'

// Errors
export * from './errors/index.js'

// Persistence
export * from './store/index.js'

// Validation
export * from './validation/index.js'

// Search
export * from './search/index.js'

// Services
export * from './services/index.js'

// Logging
export * from './utils/index.js'
