/**
 * UserBuilder - fluent construction of a user with its tags
 */

import { ValidationError } from '../errors/index.js'
import type { Tag, User } from '../types/entities.js'
import type { CatalogService } from './CatalogService.js'
import type { FavoritesService } from './FavoritesService.js'

export class UserBuilder {
  private catalog: CatalogService
  private favorites: FavoritesService
  private name: string | null = null
  private email: string | null = null
  private tags: Tag[] = []

  constructor(catalog: CatalogService, favorites: FavoritesService) {
    this.catalog = catalog
    this.favorites = favorites
  }

  /**
   * @throws {ValidationError} if the name is blank
   */
  withName(name: string): this {
    if (name.trim().length === 0) {
      throw new ValidationError('Name cannot be empty', { field: 'name' })
    }
    this.name = name
    return this
  }

  withEmail(email: string): this {
    this.email = email
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

  /**
   * Create the user and attach the collected tags
   *
   * @throws {ValidationError} if name or email is missing, or the user is invalid
   * @throws {DuplicateError} if a user with the same name or email exists
   */
  build(): User {
    if (this.name === null) {
      throw new ValidationError('Name is required', { field: 'name' })
    }
    if (this.email === null) {
      throw new ValidationError('Email is required', { field: 'email' })
    }

    const user = this.catalog.create<'user'>({
      kind: 'user',
      name: this.name,
      email: this.email,
    })

    for (const tag of this.tags) {
      this.favorites.tagUser(user.id, tag.id)
    }

    return user
  }
}
