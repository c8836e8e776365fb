/**
 * CatalogService - validated create, update and delete for every entity
 * kind, plus category keywords and quote and author associations
 *
 * The validator reports duplicates as data; this is the layer that turns a
 * duplicate outcome into a DuplicateError at the point of persistence.
 */

import { DuplicateError, NotFoundError } from '../errors/index.js'
import type { RecordStore } from '../store/RecordStore.js'
import type {
  Category,
  ChangesOf,
  EntityDraft,
  EntityKind,
  EntityMap,
  Quote,
  RelationKey,
} from '../types/entities.js'
import { createAuditEvent, createLogger, type Logger } from '../utils/logger.js'
import type { EntityValidator } from '../validation/EntityValidator.js'

/**
 * Kinds looked up by name; users by exact name, the rest ignoring case
 */
export type NamedKind = 'author' | 'tag' | 'category' | 'user'

type DraftBuilder<K extends EntityKind> = (entity: EntityMap[K], changes: ChangesOf<K>) => EntityDraft<K>

/**
 * Merge stored values with requested changes into a full draft
 */
const MERGE: { [K in EntityKind]: DraftBuilder<K> } = {
  quote: (quote, changes) => ({
    kind: 'quote',
    text: changes.text ?? quote.text,
    authorId: changes.authorId !== undefined ? changes.authorId : quote.authorId,
    source: changes.source !== undefined ? changes.source : quote.source,
  }),
  author: (author, changes) => ({ kind: 'author', name: changes.name ?? author.name }),
  tag: (tag, changes) => ({ kind: 'tag', name: changes.name ?? tag.name }),
  category: (category, changes) => ({
    kind: 'category',
    name: changes.name ?? category.name,
    keywords: changes.keywords ?? category.keywords,
  }),
  user: (user, changes) => ({
    kind: 'user',
    name: changes.name ?? user.name,
    email: changes.email ?? user.email,
  }),
}

export interface CatalogServiceOptions {
  logger?: Logger
}

/**
 * Service for catalog writes and simple reads
 *
 * @example
 * ```typescript
 * const catalog = new CatalogService(store, new EntityValidator(store))
 * const author = catalog.create({ kind: 'author', name: 'mark twain' })
 * const quote = catalog.create({ kind: 'quote', text: 'Be yourself.', authorId: author.id })
 * catalog.tagQuote(quote.id, catalog.create({ kind: 'tag', name: 'Life' }).id)
 * ```
 */
export class CatalogService {
  private store: RecordStore
  private validator: EntityValidator
  private log: Logger

  constructor(store: RecordStore, validator: EntityValidator, options: CatalogServiceOptions = {}) {
    this.store = store
    this.validator = validator
    this.log = options.logger ?? createLogger('CatalogService')
  }

  /**
   * Validate and insert a new entity
   *
   * @throws {ValidationError} if the draft breaks a rule
   * @throws {DuplicateError} if an equivalent record exists
   */
  create<K extends EntityKind>(draft: EntityDraft<K>): EntityMap[K] {
    const outcome = this.validator.validate(draft)

    if (outcome.status === 'duplicate') {
      this.audit('entity.create', `${outcome.kind}:${outcome.existingId}`, 'create', 'duplicate')
      throw new DuplicateError(`${outcome.kind} already exists`, {
        kind: outcome.kind,
        existingId: outcome.existingId,
      })
    }

    const created = this.store.insert(outcome.kind, outcome.value)
    this.audit('entity.create', `${outcome.kind}:${created.id}`, 'create', 'success')
    return created
  }

  /**
   * Apply changes to a stored entity, re-validating the merged result
   *
   * @throws {NotFoundError} if no entity has that id
   * @throws {ValidationError} if the merged values break a rule
   * @throws {DuplicateError} if the change collides with another record
   */
  update<K extends EntityKind>(kind: K, id: number, changes: ChangesOf<K>): EntityMap[K] {
    const existing = this.get(kind, id)
    const outcome = this.validator.validate(MERGE[kind](existing, changes), id)

    if (outcome.status === 'duplicate') {
      this.audit('entity.update', `${kind}:${id}`, 'update', 'duplicate', {
        existingId: outcome.existingId,
      })
      throw new DuplicateError(`${kind} already exists`, {
        kind,
        existingId: outcome.existingId,
      })
    }

    const updated = this.store.update(kind, id, outcome.value)
    if (!updated) {
      throw new NotFoundError(kind, id)
    }

    this.audit('entity.update', `${kind}:${id}`, 'update', 'success')
    return updated
  }

  /**
   * Delete an entity after clearing its associations
   *
   * @throws {NotFoundError} if no entity has that id
   */
  remove(kind: EntityKind, id: number): void {
    this.get(kind, id)

    const unlinked = this.store.clearAssociations(kind, id)
    this.store.delete(kind, id)

    this.audit('entity.delete', `${kind}:${id}`, 'delete', 'success', { unlinked })
  }

  /**
   * @throws {NotFoundError} if no entity has that id
   */
  get<K extends EntityKind>(kind: K, id: number): EntityMap[K] {
    const entity = this.store.getById(kind, id)
    if (!entity) {
      throw new NotFoundError(kind, id)
    }
    return entity
  }

  list<K extends EntityKind>(kind: K): EntityMap[K][] {
    return this.store.listAll(kind)
  }

  count(kind: EntityKind): number {
    return this.store.count(kind)
  }

  findByName<K extends NamedKind>(kind: K, name: string): EntityMap[K] | null {
    return this.store.findOneWhere(kind, {
      anyOf: [{ field: 'name', value: name.trim(), caseInsensitive: kind !== 'user' }],
    })
  }

  listKeywords(categoryId: number): string[] {
    return this.get('category', categoryId).keywords
  }

  /**
   * Append keywords to a category, keeping the existing order. Keywords are
   * stored trimmed and blank ones are dropped.
   */
  addKeywords(categoryId: number, keywords: string[]): Category {
    const category = this.get('category', categoryId)
    return this.update('category', categoryId, {
      keywords: [...category.keywords, ...keywords],
    })
  }

  /**
   * Replace a category's keywords, normalized as in `addKeywords`
   */
  setKeywords(categoryId: number, keywords: string[]): Category {
    return this.update('category', categoryId, { keywords })
  }

  /**
   * @returns false when the quote already had the tag
   */
  tagQuote(quoteId: number, tagId: number): boolean {
    return this.link('quote.tags', 'quote', quoteId, 'tag', tagId)
  }

  untagQuote(quoteId: number, tagId: number): boolean {
    return this.unlink('quote.tags', 'quote', quoteId, 'tag', tagId)
  }

  /**
   * @returns false when the quote was already in the category
   */
  categorizeQuote(quoteId: number, categoryId: number): boolean {
    return this.link('quote.categories', 'quote', quoteId, 'category', categoryId)
  }

  uncategorizeQuote(quoteId: number, categoryId: number): boolean {
    return this.unlink('quote.categories', 'quote', quoteId, 'category', categoryId)
  }

  /**
   * @returns false when the author already had the tag
   */
  tagAuthor(authorId: number, tagId: number): boolean {
    return this.link('author.tags', 'author', authorId, 'tag', tagId)
  }

  untagAuthor(authorId: number, tagId: number): boolean {
    return this.unlink('author.tags', 'author', authorId, 'tag', tagId)
  }

  tagsOfAuthor(authorId: number): EntityMap['tag'][] {
    this.get('author', authorId)
    return this.store.listAssociated('author.tags', authorId)
  }

  tagsOf(quoteId: number): EntityMap['tag'][] {
    this.get('quote', quoteId)
    return this.store.listAssociated('quote.tags', quoteId)
  }

  categoriesOf(quoteId: number): EntityMap['category'][] {
    this.get('quote', quoteId)
    return this.store.listAssociated('quote.categories', quoteId)
  }

  quotesOfAuthor(authorId: number): Quote[] {
    this.get('author', authorId)
    return this.store.listAssociated('author.quotes', authorId)
  }

  private link(
    relation: RelationKey,
    owner: EntityKind,
    ownerId: number,
    kind: EntityKind,
    targetId: number
  ): boolean {
    this.get(owner, ownerId)
    this.get(kind, targetId)

    const changed = this.store.associate(relation, ownerId, targetId)
    if (changed) {
      this.audit('association.change', `${owner}:${ownerId}`, `link ${relation}`, 'success', {
        targetId,
      })
    }
    return changed
  }

  private unlink(
    relation: RelationKey,
    owner: EntityKind,
    ownerId: number,
    kind: EntityKind,
    targetId: number
  ): boolean {
    this.get(owner, ownerId)
    this.get(kind, targetId)

    const changed = this.store.dissociate(relation, ownerId, targetId)
    if (changed) {
      this.audit('association.change', `${owner}:${ownerId}`, `unlink ${relation}`, 'success', {
        targetId,
      })
    }
    return changed
  }

  private audit(
    eventType: 'entity.create' | 'entity.update' | 'entity.delete' | 'association.change',
    resource: string,
    action: string,
    result: 'success' | 'duplicate',
    metadata?: Record<string, unknown>
  ): void {
    this.log.auditLog(createAuditEvent(eventType, 'CatalogService', resource, action, result, metadata))
  }
}
