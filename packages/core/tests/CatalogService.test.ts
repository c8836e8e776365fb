/**
 * CatalogService tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createDatabase, closeDatabase } from '../src/db/schema.js'
import { SqliteRecordStore } from '../src/store/SqliteRecordStore.js'
import { EntityValidator } from '../src/validation/EntityValidator.js'
import { CatalogService } from '../src/services/CatalogService.js'
import { DuplicateError, NotFoundError, ValidationError } from '../src/errors/index.js'
import { silentLogger, type Logger } from '../src/utils/logger.js'

describe('CatalogService', () => {
  let db: ReturnType<typeof createDatabase>
  let store: SqliteRecordStore
  let catalog: CatalogService
  let auditLog: ReturnType<typeof vi.fn>

  beforeEach(() => {
    db = createDatabase(':memory:')
    store = new SqliteRecordStore(db)
    auditLog = vi.fn()
    const logger: Logger = { ...silentLogger, auditLog }
    catalog = new CatalogService(store, new EntityValidator(store), { logger })
  })

  afterEach(() => {
    if (db) closeDatabase(db)
  })

  describe('create', () => {
    it('should persist the sanitized entity', () => {
      const author = catalog.create({ kind: 'author', name: 'mark twain' })

      expect(author).toEqual({ id: 1, name: 'Mark Twain' })
      expect(catalog.count('author')).toBe(1)
    })

    it('should raise DuplicateError carrying the existing id', () => {
      const first = catalog.create({ kind: 'author', name: 'Mark Twain' })

      let caught: unknown
      try {
        catalog.create({ kind: 'author', name: 'MARK TWAIN' })
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(DuplicateError)
      expect(caught).toMatchObject({ kind: 'author', existingId: first.id })
      expect(catalog.count('author')).toBe(1)
    })

    it('should propagate validation failures', () => {
      expect(() => catalog.create({ kind: 'quote', text: 'Hello', authorId: 7 })).toThrow(
        ValidationError
      )
      expect(catalog.count('quote')).toBe(0)
    })

    it('should record an audit event', () => {
      catalog.create({ kind: 'tag', name: 'Life' })

      expect(auditLog).toHaveBeenCalledWith(
        expect.objectContaining({
          eventType: 'entity.create',
          actor: 'CatalogService',
          resource: 'tag:1',
          result: 'success',
        })
      )
    })
  })

  describe('update', () => {
    it('should merge changes with stored values', () => {
      const author = catalog.create({ kind: 'author', name: 'Mark Twain' })
      const quote = catalog.create({ kind: 'quote', text: 'Hello', authorId: author.id })

      expect(catalog.update('quote', quote.id, { source: ' Letters ' })).toEqual({
        id: quote.id,
        text: 'Hello',
        authorId: author.id,
        source: 'Letters',
      })
    })

    it('should clear a nullable field set to null', () => {
      const author = catalog.create({ kind: 'author', name: 'Mark Twain' })
      const quote = catalog.create({ kind: 'quote', text: 'Hello', authorId: author.id })

      expect(catalog.update('quote', quote.id, { authorId: null }).authorId).toBeNull()
    })

    it('should allow keeping the same name', () => {
      const category = catalog.create({ kind: 'category', name: 'Philosophy' })

      expect(catalog.update('category', category.id, { name: 'philosophy' }).name).toBe(
        'philosophy'
      )
    })

    it('should reject a name taken by another record', () => {
      catalog.create({ kind: 'tag', name: 'life' })
      const love = catalog.create({ kind: 'tag', name: 'love' })

      expect(() => catalog.update('tag', love.id, { name: 'Life' })).toThrow(DuplicateError)
      expect(catalog.get('tag', love.id).name).toBe('love')
    })

    it('should raise NotFoundError for a missing record', () => {
      expect(() => catalog.update('tag', 99, { name: 'life' })).toThrow(NotFoundError)
      expect(() => catalog.update('tag', 99, { name: 'life' })).toThrow('Tag 99 not found')
    })
  })

  describe('remove', () => {
    it('should delete a record and its associations', () => {
      const quote = catalog.create({ kind: 'quote', text: 'Hello' })
      const tag = catalog.create({ kind: 'tag', name: 'greeting' })
      catalog.tagQuote(quote.id, tag.id)

      catalog.remove('tag', tag.id)

      expect(catalog.count('tag')).toBe(0)
      expect(catalog.tagsOf(quote.id)).toEqual([])
    })

    it('should keep quotes when their author is removed', () => {
      const author = catalog.create({ kind: 'author', name: 'Mark Twain' })
      const quote = catalog.create({ kind: 'quote', text: 'Hello', authorId: author.id })

      catalog.remove('author', author.id)

      expect(catalog.get('quote', quote.id).authorId).toBeNull()
    })

    it('should raise NotFoundError for a missing record', () => {
      expect(() => catalog.remove('quote', 5)).toThrow('Quote 5 not found')
    })
  })

  describe('lookups', () => {
    it('should find entity names ignoring case', () => {
      const author = catalog.create({ kind: 'author', name: 'Mark Twain' })

      expect(catalog.findByName('author', '  mark twain ')).toEqual(author)
      expect(catalog.findByName('tag', 'missing')).toBeNull()
    })

    it('should find user names exactly', () => {
      const user = catalog.create({ kind: 'user', name: 'alice', email: 'alice@example.com' })

      expect(catalog.findByName('user', 'alice')).toEqual(user)
      expect(catalog.findByName('user', 'Alice')).toBeNull()
    })

    it('should list records in id order', () => {
      catalog.create({ kind: 'tag', name: 'b' })
      catalog.create({ kind: 'tag', name: 'a' })

      expect(catalog.list('tag').map((t) => t.name)).toEqual(['b', 'a'])
    })
  })

  describe('keywords', () => {
    it('should list, add and replace category keywords', () => {
      const category = catalog.create({ kind: 'category', name: 'Philosophy', keywords: ['stoic'] })

      expect(catalog.listKeywords(category.id)).toEqual(['stoic'])
      expect(catalog.addKeywords(category.id, ['zen', ' ']).keywords).toEqual(['stoic', 'zen'])
      expect(catalog.setKeywords(category.id, ['ethics']).keywords).toEqual(['ethics'])
      expect(catalog.listKeywords(category.id)).toEqual(['ethics'])
    })

    it('should raise NotFoundError for a missing category', () => {
      expect(() => catalog.listKeywords(3)).toThrow('Category 3 not found')
    })
  })

  describe('quote associations', () => {
    it('should tag and untag a quote once', () => {
      const quote = catalog.create({ kind: 'quote', text: 'Hello' })
      const tag = catalog.create({ kind: 'tag', name: 'greeting' })

      expect(catalog.tagQuote(quote.id, tag.id)).toBe(true)
      expect(catalog.tagQuote(quote.id, tag.id)).toBe(false)
      expect(catalog.tagsOf(quote.id)).toEqual([tag])

      expect(catalog.untagQuote(quote.id, tag.id)).toBe(true)
      expect(catalog.untagQuote(quote.id, tag.id)).toBe(false)
    })

    it('should categorize and uncategorize a quote', () => {
      const quote = catalog.create({ kind: 'quote', text: 'Hello' })
      const category = catalog.create({ kind: 'category', name: 'Manners' })

      expect(catalog.categorizeQuote(quote.id, category.id)).toBe(true)
      expect(catalog.categoriesOf(quote.id)).toEqual([category])
      expect(catalog.uncategorizeQuote(quote.id, category.id)).toBe(true)
      expect(catalog.categoriesOf(quote.id)).toEqual([])
    })

    it('should refuse to link missing records', () => {
      const quote = catalog.create({ kind: 'quote', text: 'Hello' })

      expect(() => catalog.tagQuote(quote.id, 42)).toThrow('Tag 42 not found')
      expect(() => catalog.categorizeQuote(42, 1)).toThrow('Quote 42 not found')
    })

    it('should list the quotes of an author', () => {
      const author = catalog.create({ kind: 'author', name: 'Mark Twain' })
      const quote = catalog.create({ kind: 'quote', text: 'Hello', authorId: author.id })

      expect(catalog.quotesOfAuthor(author.id)).toEqual([quote])
    })
  })

  describe('author associations', () => {
    it('should tag and untag an author once', () => {
      const author = catalog.create({ kind: 'author', name: 'Mark Twain' })
      const tag = catalog.create({ kind: 'tag', name: 'humor' })

      expect(catalog.tagAuthor(author.id, tag.id)).toBe(true)
      expect(catalog.tagAuthor(author.id, tag.id)).toBe(false)
      expect(catalog.tagsOfAuthor(author.id)).toEqual([tag])

      expect(catalog.untagAuthor(author.id, tag.id)).toBe(true)
      expect(catalog.untagAuthor(author.id, tag.id)).toBe(false)
      expect(catalog.tagsOfAuthor(author.id)).toEqual([])
    })

    it('should audit author tag changes against the author', () => {
      const author = catalog.create({ kind: 'author', name: 'Mark Twain' })
      const tag = catalog.create({ kind: 'tag', name: 'humor' })

      catalog.tagAuthor(author.id, tag.id)

      expect(auditLog).toHaveBeenCalledWith(
        expect.objectContaining({
          eventType: 'association.change',
          resource: `author:${author.id}`,
          action: 'link author.tags',
          result: 'success',
        })
      )
    })

    it('should refuse to tag missing records', () => {
      const author = catalog.create({ kind: 'author', name: 'Mark Twain' })

      expect(() => catalog.tagAuthor(author.id, 42)).toThrow('Tag 42 not found')
      expect(() => catalog.untagAuthor(42, 1)).toThrow('Author 42 not found')
      expect(() => catalog.tagsOfAuthor(42)).toThrow(NotFoundError)
    })
  })
})
