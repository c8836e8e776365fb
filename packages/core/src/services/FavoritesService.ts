/**
 * FavoritesService - a user's favorite quotes, authors and tags
 */

import type { RecordStore } from '../store/RecordStore.js'
import type { Author, EntityKind, Quote, RelationKey, Tag, User } from '../types/entities.js'
import { createAuditEvent, createLogger, type Logger } from '../utils/logger.js'
import type { CatalogService } from './CatalogService.js'

export interface UserProfile {
  user: User
  quotes: Quote[]
  authors: Author[]
  tags: Tag[]
  quoteCount: number
  authorCount: number
  tagCount: number
}

export interface FavoritesServiceOptions {
  logger?: Logger
}

export class FavoritesService {
  private store: RecordStore
  private catalog: CatalogService
  private log: Logger

  constructor(store: RecordStore, catalog: CatalogService, options: FavoritesServiceOptions = {}) {
    this.store = store
    this.catalog = catalog
    this.log = options.logger ?? createLogger('FavoritesService')
  }

  /**
   * @throws {NotFoundError} if no user has that id
   */
  profile(userId: number): UserProfile {
    const user = this.catalog.get('user', userId)
    const quotes = this.store.listAssociated('user.quotes', userId)
    const authors = this.store.listAssociated('user.authors', userId)
    const tags = this.store.listAssociated('user.tags', userId)

    return {
      user,
      quotes,
      authors,
      tags,
      quoteCount: quotes.length,
      authorCount: authors.length,
      tagCount: tags.length,
    }
  }

  addFavoriteQuote(userId: number, quoteId: number): boolean {
    return this.change('link', 'user.quotes', userId, 'quote', quoteId)
  }

  removeFavoriteQuote(userId: number, quoteId: number): boolean {
    return this.change('unlink', 'user.quotes', userId, 'quote', quoteId)
  }

  addFavoriteAuthor(userId: number, authorId: number): boolean {
    return this.change('link', 'user.authors', userId, 'author', authorId)
  }

  removeFavoriteAuthor(userId: number, authorId: number): boolean {
    return this.change('unlink', 'user.authors', userId, 'author', authorId)
  }

  tagUser(userId: number, tagId: number): boolean {
    return this.change('link', 'user.tags', userId, 'tag', tagId)
  }

  untagUser(userId: number, tagId: number): boolean {
    return this.change('unlink', 'user.tags', userId, 'tag', tagId)
  }

  private change(
    action: 'link' | 'unlink',
    relation: RelationKey,
    userId: number,
    kind: EntityKind,
    targetId: number
  ): boolean {
    this.catalog.get('user', userId)
    this.catalog.get(kind, targetId)

    const changed =
      action === 'link'
        ? this.store.associate(relation, userId, targetId)
        : this.store.dissociate(relation, userId, targetId)

    if (changed) {
      this.log.auditLog(
        createAuditEvent(
          'association.change',
          'FavoritesService',
          `user:${userId}`,
          `${action} ${relation}`,
          'success',
          { targetId }
        )
      )
    }
    return changed
  }
}
