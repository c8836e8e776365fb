/**
 * EntityValidator - validates and sanitizes drafts before persistence
 *
 * One rule per entity kind. A draft either fails a rule (ValidationError),
 * collides with a stored record (duplicate outcome) or comes back sanitized
 * and ready to insert. Store errors are not caught here.
 */

import { ValidationError } from '../errors/index.js'
import type { RecordStore } from '../store/RecordStore.js'
import { ENTITY_KINDS, type EntityDraft, type EntityKind } from '../types/entities.js'
import { createLogger } from '../utils/logger.js'
import { duplicate, valid, type ValidationOutcome } from './outcome.js'
import { sanitizeAuthorName, sanitizeTag } from './sanitize.js'

const log = createLogger('EntityValidator')

export const MAX_QUOTE_LENGTH = 5000
export const MAX_SOURCE_LENGTH = 300
export const MAX_CATEGORY_LENGTH = 50
export const MIN_USER_NAME_LENGTH = 3

type Rule<K extends EntityKind> = (draft: EntityDraft<K>, excludeId?: number) => ValidationOutcome<K>

/**
 * Length in characters; astral symbols count once, as in SQLite `length()`
 */
function charLength(value: string): number {
  return [...value].length
}

function isBlank(value: string | null | undefined): boolean {
  return typeof value !== 'string' || value.trim().length === 0
}

/**
 * Validator for catalog entities
 *
 * @example
 * ```typescript
 * const validator = new EntityValidator(store)
 * const outcome = validator.validate({ kind: 'author', name: 'mark twain' })
 * if (outcome.status === 'duplicate') {
 *   throw new DuplicateError('Author exists', outcome)
 * }
 * store.insert('author', outcome.value) // { name: 'Mark Twain' }
 * ```
 */
export class EntityValidator {
  private store: RecordStore
  private rules: { [K in EntityKind]: Rule<K> }

  constructor(store: RecordStore) {
    this.store = store
    this.rules = {
      quote: (draft, excludeId) => this.validateQuote(draft, excludeId),
      author: (draft, excludeId) => this.validateAuthor(draft, excludeId),
      tag: (draft, excludeId) => this.validateTag(draft, excludeId),
      category: (draft, excludeId) => this.validateCategory(draft, excludeId),
      user: (draft, excludeId) => this.validateUser(draft, excludeId),
    }
  }

  /**
   * Validate and sanitize a draft
   *
   * @param excludeId - Id of the record being updated, ignored by the
   * duplicate check
   * @throws {ValidationError} if a rule fails or the kind is unknown
   */
  validate<K extends EntityKind>(draft: EntityDraft<K>, excludeId?: number): ValidationOutcome<K> {
    if (!ENTITY_KINDS.includes(draft.kind)) {
      throw new ValidationError(`Unknown entity kind: ${String(draft.kind)}`, { field: 'kind' })
    }

    const outcome = this.rules[draft.kind](draft, excludeId)
    if (outcome.status === 'duplicate') {
      log.debug('Duplicate draft', { kind: outcome.kind, existingId: outcome.existingId })
    }
    return outcome
  }

  private validateQuote(draft: EntityDraft<'quote'>, excludeId?: number): ValidationOutcome<'quote'> {
    if (isBlank(draft.text)) {
      throw new ValidationError('Quote text cannot be empty', { field: 'text' })
    }

    const text = draft.text.trim()
    if (charLength(text) > MAX_QUOTE_LENGTH) {
      throw new ValidationError(`Quote text cannot exceed ${MAX_QUOTE_LENGTH} characters`, {
        field: 'text',
        context: { length: charLength(text) },
      })
    }

    const existing = this.store.findOneWhere('quote', {
      anyOf: [{ field: 'text', value: text }],
      excludeId,
    })
    if (existing) {
      return duplicate('quote', existing.id)
    }

    let source: string | null = null
    if (typeof draft.source === 'string' && !isBlank(draft.source)) {
      source = draft.source.trim()
      if (charLength(source) > MAX_SOURCE_LENGTH) {
        throw new ValidationError(`Source cannot exceed ${MAX_SOURCE_LENGTH} characters`, {
          field: 'source',
          context: { length: charLength(source) },
        })
      }
    }

    const authorId = draft.authorId ?? null
    if (authorId !== null && !this.store.getById('author', authorId)) {
      throw new ValidationError(`Author with ID ${authorId} does not exist`, {
        field: 'authorId',
        context: { authorId },
      })
    }

    return valid('quote', { text, authorId, source })
  }

  private validateAuthor(
    draft: EntityDraft<'author'>,
    excludeId?: number
  ): ValidationOutcome<'author'> {
    if (isBlank(draft.name)) {
      throw new ValidationError('Author name cannot be empty', { field: 'name' })
    }

    const name = sanitizeAuthorName(draft.name)
    if (!name) {
      throw new ValidationError('Author name must contain at least one letter', {
        field: 'name',
        context: { input: draft.name },
      })
    }

    const existing = this.store.findOneWhere('author', {
      anyOf: [{ field: 'name', value: name, caseInsensitive: true }],
      excludeId,
    })
    return existing ? duplicate('author', existing.id) : valid('author', { name })
  }

  private validateTag(draft: EntityDraft<'tag'>, excludeId?: number): ValidationOutcome<'tag'> {
    if (isBlank(draft.name)) {
      throw new ValidationError('Tag name cannot be empty', { field: 'name' })
    }

    const name = sanitizeTag(draft.name)

    const existing = this.store.findOneWhere('tag', {
      anyOf: [{ field: 'name', value: name, caseInsensitive: true }],
      excludeId,
    })
    return existing ? duplicate('tag', existing.id) : valid('tag', { name })
  }

  private validateCategory(
    draft: EntityDraft<'category'>,
    excludeId?: number
  ): ValidationOutcome<'category'> {
    if (isBlank(draft.name)) {
      throw new ValidationError('Category name cannot be empty', { field: 'name' })
    }

    const name = draft.name.trim()
    if (charLength(name) > MAX_CATEGORY_LENGTH) {
      throw new ValidationError(`Category name cannot exceed ${MAX_CATEGORY_LENGTH} characters`, {
        field: 'name',
        context: { length: charLength(name) },
      })
    }

    const existing = this.store.findOneWhere('category', {
      anyOf: [{ field: 'name', value: name, caseInsensitive: true }],
      excludeId,
    })
    if (existing) {
      return duplicate('category', existing.id)
    }

    const keywords = (draft.keywords ?? [])
      .map((keyword) => keyword.trim())
      .filter((keyword) => keyword.length > 0)

    return valid('category', { name, keywords })
  }

  private validateUser(draft: EntityDraft<'user'>, excludeId?: number): ValidationOutcome<'user'> {
    if (isBlank(draft.name)) {
      throw new ValidationError('Name cannot be empty', { field: 'name' })
    }

    const name = draft.name.trim()
    if (charLength(name) < MIN_USER_NAME_LENGTH) {
      throw new ValidationError(
        `Name must be at least ${MIN_USER_NAME_LENGTH} characters`,
        { field: 'name', context: { length: charLength(name) } }
      )
    }

    if (typeof draft.email !== 'string' || !draft.email.includes('@')) {
      throw new ValidationError('Invalid email format', { field: 'email' })
    }

    const email = draft.email.trim().toLowerCase()

    const existing = this.store.findOneWhere('user', {
      anyOf: [
        { field: 'name', value: name },
        { field: 'email', value: email },
      ],
      excludeId,
    })
    return existing ? duplicate('user', existing.id) : valid('user', { name, email })
  }
}
