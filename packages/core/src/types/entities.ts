/**
 * Core type definitions for the quotes catalog
 */

export type EntityKind = 'quote' | 'author' | 'tag' | 'category' | 'user'

export const ENTITY_KINDS: readonly EntityKind[] = ['quote', 'author', 'tag', 'category', 'user']

export interface Quote {
  id: number
  text: string
  authorId: number | null
  source: string | null
}

export interface Author {
  id: number
  name: string
}

export interface Tag {
  id: number
  name: string
  createdAt: string
}

export interface Category {
  id: number
  name: string
  keywords: string[]
}

export interface User {
  id: number
  name: string
  email: string
  createdAt: string
}

/**
 * Persisted entity shape for each kind
 */
export interface EntityMap {
  quote: Quote
  author: Author
  tag: Tag
  category: Category
  user: User
}

/**
 * Column values written on insert, already sanitized
 */
export interface RecordMap {
  quote: { text: string; authorId: number | null; source: string | null }
  author: { name: string }
  tag: { name: string }
  category: { name: string; keywords: string[] }
  user: { name: string; email: string }
}

export type Entity = EntityMap[EntityKind]

/**
 * Raw, unvalidated input fields for each kind
 */
export interface DraftMap {
  quote: { text: string; authorId?: number | null; source?: string | null }
  author: { name: string }
  tag: { name: string }
  category: { name: string; keywords?: string[] }
  user: { name: string; email: string }
}

/**
 * Tagged draft of a given kind; `EntityDraft` alone is the union of all kinds
 */
export type EntityDraft<K extends EntityKind = EntityKind> = {
  [P in K]: { kind: P } & DraftMap[P]
}[K]

export type QuoteDraft = EntityDraft<'quote'>
export type AuthorDraft = EntityDraft<'author'>
export type TagDraft = EntityDraft<'tag'>
export type CategoryDraft = EntityDraft<'category'>
export type UserDraft = EntityDraft<'user'>

/**
 * Fields a caller may change on update
 */
export type ChangesOf<K extends EntityKind> = Partial<DraftMap[K]>

/**
 * String columns usable in lookups, per kind
 */
export interface LookupFieldMap {
  quote: 'text' | 'source'
  author: 'name'
  tag: 'name'
  category: 'name'
  user: 'name' | 'email'
}

export type LookupField<K extends EntityKind> = LookupFieldMap[K]

/**
 * Associations, keyed `owner.relation`, with the kinds on each side
 */
export interface RelationDefs {
  'quote.tags': { owner: 'quote'; target: 'tag' }
  'quote.categories': { owner: 'quote'; target: 'category' }
  'quote.users': { owner: 'quote'; target: 'user' }
  'author.quotes': { owner: 'author'; target: 'quote' }
  'author.tags': { owner: 'author'; target: 'tag' }
  'author.users': { owner: 'author'; target: 'user' }
  'tag.quotes': { owner: 'tag'; target: 'quote' }
  'tag.authors': { owner: 'tag'; target: 'author' }
  'tag.users': { owner: 'tag'; target: 'user' }
  'category.quotes': { owner: 'category'; target: 'quote' }
  'user.quotes': { owner: 'user'; target: 'quote' }
  'user.authors': { owner: 'user'; target: 'author' }
  'user.tags': { owner: 'user'; target: 'tag' }
}

export type RelationKey = keyof RelationDefs

export type RelationOwner<P extends RelationKey> = RelationDefs[P]['owner']

export type RelationTarget<P extends RelationKey> = RelationDefs[P]['target']
