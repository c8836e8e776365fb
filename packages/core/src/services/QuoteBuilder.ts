/**
 * QuoteBuilder - fluent construction of a quote with its tags and categories
 */

import { ValidationError } from '../errors/index.js'
import type { Author, Category, Quote, Tag } from '../types/entities.js'
import type { CatalogService } from './CatalogService.js'

export class QuoteBuilder {
  private catalog: CatalogService
  private text: string | null = null
  private author: Author | null = null
  private source: string | null = null
  private tags: Tag[] = []
  private categories: Category[] = []

  constructor(catalog: CatalogService) {
    this.catalog = catalog
  }

  /**
   * @throws {ValidationError} if the text is blank
   */
  withText(text: string): this {
    if (text.trim().length === 0) {
      throw new ValidationError('Quote text cannot be empty', { field: 'text' })
    }
    this.text = text
    return this
  }

  withAuthor(author: Author): this {
    this.author = author
    return this
  }

  /**
   * @throws {NotFoundError} if no author has that id
   */
  withAuthorId(authorId: number): this {
    this.author = this.catalog.get('author', authorId)
    return this
  }

  withSource(source: string): this {
    this.source = source
    return this
  }

  addTag(tag: Tag): this {
    if (!this.tags.some((t) => t.id === tag.id)) {
      this.tags.push(tag)
    }
    return this
  }

  addTags(tags: Tag[]): this {
    tags.forEach((tag) => this.addTag(tag))
    return this
  }

  addCategory(category: Category): this {
    if (!this.categories.some((c) => c.id === category.id)) {
      this.categories.push(category)
    }
    return this
  }

  addCategories(categories: Category[]): this {
    categories.forEach((category) => this.addCategory(category))
    return this
  }

  /**
   * Create the quote and attach the collected tags and categories
   *
   * @throws {ValidationError} if text or author is missing, or the quote is invalid
   * @throws {DuplicateError} if a quote with the same text exists
   */
  build(): Quote {
    if (this.text === null) {
      throw new ValidationError('Quote text is required', { field: 'text' })
    }
    if (this.author === null) {
      throw new ValidationError('Author is required', { field: 'authorId' })
    }

    const quote = this.catalog.create<'quote'>({
      kind: 'quote',
      text: this.text,
      authorId: this.author.id,
      source: this.source,
    })

    for (const tag of this.tags) {
      this.catalog.tagQuote(quote.id, tag.id)
    }
    for (const category of this.categories) {
      this.catalog.categorizeQuote(quote.id, category.id)
    }

    return quote
  }
}
