/**
 * QuoteSearch - multi-criteria quote search over tags, categories, authors
 * and text
 *
 * Criteria resolve to quote sets that are combined by union ("match any")
 * or intersection ("match all"). Results are de-duplicated by id and
 * ordered by id.
 */

import type { RecordStore } from '../store/RecordStore.js'
import type { Author, Quote, Tag } from '../types/entities.js'
import { createLogger } from '../utils/logger.js'
import { intersect, intersectAll, toIdSet, toSortedList, unionAll, type IdSet } from './set-algebra.js'

const log = createLogger('QuoteSearch')

export interface AdvancedSearchCriteria {
  /** Case-insensitive substring of the quote text */
  text?: string
  /** Author name, matched case-insensitively */
  author?: string
  tags?: string[]
  categories?: string[]
  /** Require every tag instead of any tag */
  matchAllTags?: boolean
  /** Require every category instead of any category */
  matchAllCategories?: boolean
}

export interface SearchAllResult {
  quotes: Quote[]
  authors: Author[]
  tags: Tag[]
}

export interface AuthorWithQuotes {
  author: Author
  quotes: Quote[]
  quoteCount: number
}

type GroupingKind = 'tag' | 'category'

function hasText(value: string | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0
}

function hasItems(values: string[] | undefined): values is string[] {
  return Array.isArray(values) && values.length > 0
}

/**
 * Search service for quotes
 *
 * @example
 * ```typescript
 * const search = new QuoteSearch(store)
 * search.byTagNames(['love', 'life'], true)  // quotes tagged with both
 * search.advanced({ author: 'Mark Twain', tags: ['humor'] })
 * ```
 */
export class QuoteSearch {
  private store: RecordStore

  constructor(store: RecordStore) {
    this.store = store
  }

  /**
   * Quotes carrying any (or, with `matchAll`, every) of the named tags.
   * Names that match no tag are skipped.
   */
  byTagNames(names: string[], matchAll = false): Quote[] {
    return toSortedList(this.quoteSetByNames('tag', names, matchAll))
  }

  /**
   * Quotes in any (or, with `matchAll`, every) of the named categories.
   * Names that match no category are skipped.
   */
  byCategoryNames(names: string[], matchAll = false): Quote[] {
    return toSortedList(this.quoteSetByNames('category', names, matchAll))
  }

  /**
   * Intersection of every criterion given
   *
   * No criterion at all yields an empty result, as does an author name that
   * matches no author. Empty strings and empty lists count as omitted.
   */
  advanced(criteria: AdvancedSearchCriteria = {}): Quote[] {
    let results: IdSet<Quote> | null = null

    const narrow = (next: IdSet<Quote>): IdSet<Quote> =>
      results === null ? next : intersect(results, next)

    if (hasText(criteria.text)) {
      results = narrow(toIdSet(this.quotesByText(criteria.text)))
    }

    if (hasText(criteria.author)) {
      const author = this.findAuthor(criteria.author)
      if (!author) {
        log.debug('Author not found, short-circuiting search', { author: criteria.author })
        return []
      }
      results = narrow(toIdSet(this.store.listAssociated('author.quotes', author.id)))
    }

    if (hasItems(criteria.tags)) {
      results = narrow(this.quoteSetByNames('tag', criteria.tags, criteria.matchAllTags ?? false))
    }

    if (hasItems(criteria.categories)) {
      results = narrow(
        this.quoteSetByNames('category', criteria.categories, criteria.matchAllCategories ?? false)
      )
    }

    return results === null ? [] : toSortedList(results)
  }

  /**
   * Quotes whose text contains `query`, ignoring case. A blank query
   * matches nothing.
   */
  quotesByText(query: string): Quote[] {
    if (!hasText(query)) {
      return []
    }
    return this.store.findAllWhere('quote', {
      anyOf: [{ field: 'text', value: query, mode: 'contains', caseInsensitive: true }],
    })
  }

  /**
   * Quotes by the named author, optionally narrowed to those containing
   * `text`
   */
  quotesByAuthor(authorName: string, text?: string): Quote[] {
    const author = this.findAuthor(authorName)
    if (!author) {
      return []
    }

    const quotes = this.store.listAssociated('author.quotes', author.id)
    if (!hasText(text)) {
      return quotes
    }

    const needle = text.toLowerCase()
    return quotes.filter((quote) => quote.text.toLowerCase().includes(needle))
  }

  /**
   * Substring search across quotes, authors and tags. A blank query is not
   * a wildcard: it matches nothing.
   */
  searchAll(query: string): SearchAllResult {
    if (!hasText(query)) {
      return { quotes: [], authors: [], tags: [] }
    }

    return {
      quotes: this.quotesByText(query),
      authors: this.store.findAllWhere('author', {
        anyOf: [{ field: 'name', value: query, mode: 'contains', caseInsensitive: true }],
      }),
      tags: this.store.findAllWhere('tag', {
        anyOf: [{ field: 'name', value: query, mode: 'contains', caseInsensitive: true }],
      }),
    }
  }

  /**
   * Union of `searchAll` over several terms; blank terms contribute nothing
   */
  searchTerms(terms: string[]): SearchAllResult {
    const results = terms.map((term) => this.searchAll(term))

    return {
      quotes: toSortedList(unionAll(results.map((r) => toIdSet(r.quotes)))),
      authors: toSortedList(unionAll(results.map((r) => toIdSet(r.authors)))),
      tags: toSortedList(unionAll(results.map((r) => toIdSet(r.tags)))),
    }
  }

  /**
   * Authors whose name contains `query`, each with their quotes
   */
  authorsWithQuotes(query: string): AuthorWithQuotes[] {
    return this.searchAll(query).authors.map((author) => {
      const quotes = this.store.listAssociated('author.quotes', author.id)
      return { author, quotes, quoteCount: quotes.length }
    })
  }

  private findAuthor(name: string): Author | null {
    return this.store.findOneWhere('author', {
      anyOf: [{ field: 'name', value: name.trim(), caseInsensitive: true }],
    })
  }

  private quoteSetByNames(kind: GroupingKind, names: string[], matchAll: boolean): IdSet<Quote> {
    const quoteSets: IdSet<Quote>[] = []

    for (const name of names) {
      const group = this.store.findOneWhere(kind, {
        anyOf: [{ field: 'name', value: name.trim(), caseInsensitive: true }],
      })
      if (!group) {
        continue
      }

      const relation = kind === 'tag' ? 'tag.quotes' : 'category.quotes'
      quoteSets.push(toIdSet(this.store.listAssociated(relation, group.id)))
    }

    if (quoteSets.length === 0) {
      return new Map()
    }

    return matchAll ? intersectAll(quoteSets) : unionAll(quoteSets)
  }
}
