/**
 * Validation Module
 *
 * Name sanitizers, the per-kind entity validator and its outcome type.
 */

export { sanitizeTag, sanitizeAuthorName, MAX_TAG_LENGTH } from './sanitize.js'
export {
  EntityValidator,
  MAX_QUOTE_LENGTH,
  MAX_SOURCE_LENGTH,
  MAX_CATEGORY_LENGTH,
  MIN_USER_NAME_LENGTH,
} from './EntityValidator.js'
export {
  valid,
  duplicate,
  isDuplicate,
  type ValidationOutcome,
  type ValidOutcome,
  type DuplicateOutcome,
} from './outcome.js'
