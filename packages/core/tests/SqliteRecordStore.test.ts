/**
 * SqliteRecordStore tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createDatabase, closeDatabase } from '../src/db/schema.js'
import { SqliteRecordStore, escapeLike } from '../src/store/SqliteRecordStore.js'
import { DatabaseError } from '../src/errors/index.js'

describe('escapeLike', () => {
  it('should escape LIKE wildcards and the escape character', () => {
    expect(escapeLike('a%b_c\\d')).toBe('a\\%b\\_c\\\\d')
  })
})

describe('SqliteRecordStore', () => {
  let db: ReturnType<typeof createDatabase>
  let store: SqliteRecordStore

  beforeEach(() => {
    db = createDatabase(':memory:')
    store = new SqliteRecordStore(db)
  })

  afterEach(() => {
    if (db) closeDatabase(db)
  })

  describe('insert and getById', () => {
    it('should insert a quote and read it back', () => {
      const quote = store.insert('quote', { text: 'Be yourself.', authorId: null, source: null })

      expect(quote).toEqual({ id: 1, text: 'Be yourself.', authorId: null, source: null })
      expect(store.getById('quote', quote.id)).toEqual(quote)
    })

    it('should return null for a missing id', () => {
      expect(store.getById('author', 42)).toBeNull()
    })

    it('should fill in creation timestamps', () => {
      const tag = store.insert('tag', { name: 'life' })

      expect(tag.name).toBe('life')
      expect(typeof tag.createdAt).toBe('string')
      expect(tag.createdAt.length).toBeGreaterThan(0)
    })

    it('should store category keywords as a list', () => {
      const category = store.insert('category', { name: 'Philosophy', keywords: ['stoic', 'zen'] })

      expect(store.getById('category', category.id)?.keywords).toEqual(['stoic', 'zen'])
    })

    it('should wrap constraint failures in DatabaseError', () => {
      store.insert('tag', { name: 'life' })

      let caught: unknown
      try {
        store.insert('tag', { name: 'LIFE' })
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(DatabaseError)
      expect(caught).toMatchObject({
        message: 'Failed to insert tag',
        context: { action: 'insert tag', sqliteCode: 'SQLITE_CONSTRAINT_UNIQUE' },
      })
    })
  })

  describe('findOneWhere and findAllWhere', () => {
    beforeEach(() => {
      store.insert('tag', { name: 'life' })
      store.insert('tag', { name: 'lifestyle' })
      store.insert('tag', { name: 'love' })
    })

    it('should match case-insensitively when asked', () => {
      const tag = store.findOneWhere('tag', {
        anyOf: [{ field: 'name', value: 'LIFE', caseInsensitive: true }],
      })
      expect(tag?.name).toBe('life')
    })

    it('should match exactly by default', () => {
      expect(store.findOneWhere('tag', { anyOf: [{ field: 'name', value: 'LIFE' }] })).toBeNull()
    })

    it('should match nothing for an empty clause', () => {
      expect(store.findOneWhere('tag', { anyOf: [] })).toBeNull()
      expect(store.findAllWhere('tag', { anyOf: [] })).toEqual([])
    })

    it('should combine matches with OR', () => {
      const tags = store.findAllWhere('tag', {
        anyOf: [
          { field: 'name', value: 'love' },
          { field: 'name', value: 'life' },
        ],
      })
      expect(tags.map((t) => t.name)).toEqual(['life', 'love'])
    })

    it('should find substrings', () => {
      const tags = store.findAllWhere('tag', {
        anyOf: [{ field: 'name', value: 'LIF', mode: 'contains', caseInsensitive: true }],
      })
      expect(tags.map((t) => t.name)).toEqual(['life', 'lifestyle'])

      const exact = store.findAllWhere('tag', {
        anyOf: [{ field: 'name', value: 'LIF', mode: 'contains' }],
      })
      expect(exact).toEqual([])
    })

    it('should skip the excluded id', () => {
      const life = store.findOneWhere('tag', { anyOf: [{ field: 'name', value: 'life' }] })
      expect(life).not.toBeNull()

      expect(
        store.findOneWhere('tag', { anyOf: [{ field: 'name', value: 'life' }], excludeId: life?.id })
      ).toBeNull()
    })

    it('should treat LIKE wildcards in the value literally', () => {
      store.insert('quote', { text: '100% sure', authorId: null, source: null })
      store.insert('quote', { text: '100 percent', authorId: null, source: null })

      const quotes = store.findAllWhere('quote', {
        anyOf: [{ field: 'text', value: '100%', mode: 'contains', caseInsensitive: true }],
      })
      expect(quotes.map((q) => q.text)).toEqual(['100% sure'])
    })
  })

  describe('listAll and count', () => {
    it('should list records ordered by id', () => {
      store.insert('author', { name: 'Oscar Wilde' })
      store.insert('author', { name: 'Mark Twain' })

      expect(store.listAll('author')).toEqual([
        { id: 1, name: 'Oscar Wilde' },
        { id: 2, name: 'Mark Twain' },
      ])
      expect(store.count('author')).toBe(2)
      expect(store.count('quote')).toBe(0)
    })
  })

  describe('update', () => {
    it('should change the given fields', () => {
      const tag = store.insert('tag', { name: 'life' })

      expect(store.update('tag', tag.id, { name: 'love' })?.name).toBe('love')
    })

    it('should leave omitted fields alone', () => {
      const quote = store.insert('quote', { text: 'Hello', authorId: null, source: 'Letters' })

      expect(store.update('quote', quote.id, { text: 'Hello there' })).toEqual({
        id: quote.id,
        text: 'Hello there',
        authorId: null,
        source: 'Letters',
      })
    })

    it('should return null for a missing id', () => {
      expect(store.update('tag', 99, { name: 'love' })).toBeNull()
      expect(store.update('tag', 99, {})).toBeNull()
    })
  })

  describe('delete', () => {
    it('should report whether a row was removed', () => {
      const tag = store.insert('tag', { name: 'life' })

      expect(store.delete('tag', tag.id)).toBe(true)
      expect(store.delete('tag', tag.id)).toBe(false)
    })

    it('should clear the author of quotes when the author is deleted', () => {
      const author = store.insert('author', { name: 'Mark Twain' })
      const quote = store.insert('quote', { text: 'Hello', authorId: author.id, source: null })

      store.delete('author', author.id)

      expect(store.getById('quote', quote.id)?.authorId).toBeNull()
    })
  })

  describe('associations', () => {
    it('should link through a join table in both directions', () => {
      const quote = store.insert('quote', { text: 'Hello', authorId: null, source: null })
      const tag = store.insert('tag', { name: 'greeting' })

      expect(store.associate('quote.tags', quote.id, tag.id)).toBe(true)
      expect(store.associate('quote.tags', quote.id, tag.id)).toBe(false)

      expect(store.listAssociated('quote.tags', quote.id)).toEqual([tag])
      expect(store.listAssociated('tag.quotes', tag.id)).toEqual([quote])
    })

    it('should unlink through a join table', () => {
      const quote = store.insert('quote', { text: 'Hello', authorId: null, source: null })
      const tag = store.insert('tag', { name: 'greeting' })
      store.associate('quote.tags', quote.id, tag.id)

      expect(store.dissociate('quote.tags', quote.id, tag.id)).toBe(true)
      expect(store.dissociate('quote.tags', quote.id, tag.id)).toBe(false)
      expect(store.listAssociated('quote.tags', quote.id)).toEqual([])
    })

    it('should link an author to quotes through the foreign key', () => {
      const author = store.insert('author', { name: 'Mark Twain' })
      const quote = store.insert('quote', { text: 'Hello', authorId: null, source: null })

      expect(store.associate('author.quotes', author.id, quote.id)).toBe(true)
      expect(store.associate('author.quotes', author.id, quote.id)).toBe(false)
      expect(store.listAssociated('author.quotes', author.id)).toEqual([
        { ...quote, authorId: author.id },
      ])

      expect(store.dissociate('author.quotes', author.id, quote.id)).toBe(true)
      expect(store.getById('quote', quote.id)?.authorId).toBeNull()
    })

    it('should share favorites between user and quote sides', () => {
      const user = store.insert('user', { name: 'alice', email: 'alice@example.com' })
      const quote = store.insert('quote', { text: 'Hello', authorId: null, source: null })

      store.associate('user.quotes', user.id, quote.id)

      expect(store.listAssociated('quote.users', quote.id)).toEqual([user])
    })

    it('should clear every association owned by a record', () => {
      const quote = store.insert('quote', { text: 'Hello', authorId: null, source: null })
      const tag = store.insert('tag', { name: 'greeting' })
      const category = store.insert('category', { name: 'Manners', keywords: [] })
      const user = store.insert('user', { name: 'alice', email: 'alice@example.com' })

      store.associate('quote.tags', quote.id, tag.id)
      store.associate('quote.categories', quote.id, category.id)
      store.associate('user.quotes', user.id, quote.id)

      expect(store.clearAssociations('quote', quote.id)).toBe(3)
      expect(store.listAssociated('tag.quotes', tag.id)).toEqual([])
      expect(store.listAssociated('category.quotes', category.id)).toEqual([])
      expect(store.listAssociated('user.quotes', user.id)).toEqual([])
    })

    it('should detach quotes when clearing an author', () => {
      const author = store.insert('author', { name: 'Mark Twain' })
      store.insert('quote', { text: 'One', authorId: author.id, source: null })
      store.insert('quote', { text: 'Two', authorId: author.id, source: null })

      expect(store.clearAssociations('author', author.id)).toBe(2)
      expect(store.listAssociated('author.quotes', author.id)).toEqual([])
    })
  })
})
