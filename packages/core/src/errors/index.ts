/**
 * Error Classes Module
 *
 * @example
 * ```typescript
 * import { DuplicateError, NotFoundError, wrapError } from '@quotebook/core/errors'
 *
 * try {
 *   catalog.create({ kind: 'tag', name: 'Life' })
 * } catch (error) {
 *   if (error instanceof DuplicateError) {
 *     console.warn(`Tag already stored as #${error.existingId}`)
 *   } else {
 *     throw wrapError(error, 'Failed to create tag')
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  CatalogError,
  ValidationError,
  DuplicateError,
  NotFoundError,
  DatabaseError,
  ConfigurationError,
  wrapError,
  getErrorMessage,
  isCatalogError,
} from './CatalogError.js'
