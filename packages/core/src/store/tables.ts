/**
 * Table and association mappings for the SQLite record store
 *
 * Rows are parsed with zod so that a schema drift surfaces as a parse error
 * instead of a silently malformed entity.
 */

import { z } from 'zod'
import type {
  EntityKind,
  EntityMap,
  RecordMap,
  RelationKey,
  RelationTarget,
} from '../types/entities.js'

export type SqlValue = string | number | null

/**
 * How one entity kind maps onto its table
 */
export interface TableSpec<K extends EntityKind> {
  table: string
  parse: (row: unknown) => EntityMap[K]
  /** Column values for the fields present in `record` */
  toColumns: (record: Partial<RecordMap[K]>) => Record<string, SqlValue>
}

const KeywordsSchema = z.array(z.string())

const QuoteRowSchema = z
  .object({
    id: z.number(),
    text: z.string(),
    author_id: z.number().nullable(),
    source: z.string().nullable(),
  })
  .transform((row) => ({
    id: row.id,
    text: row.text,
    authorId: row.author_id,
    source: row.source,
  }))

const AuthorRowSchema = z.object({
  id: z.number(),
  name: z.string(),
})

const TagRowSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    created_at: z.string(),
  })
  .transform((row) => ({ id: row.id, name: row.name, createdAt: row.created_at }))

const CategoryRowSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    keywords: z.string(),
  })
  .transform((row) => ({
    id: row.id,
    name: row.name,
    keywords: parseKeywords(row.keywords),
  }))

const UserRowSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    email: z.string(),
    created_at: z.string(),
  })
  .transform((row) => ({
    id: row.id,
    name: row.name,
    email: row.email,
    createdAt: row.created_at,
  }))

/**
 * Decode the JSON keyword column; an empty column reads as no keywords
 */
export function parseKeywords(raw: string): string[] {
  if (!raw) {
    return []
  }
  return KeywordsSchema.parse(JSON.parse(raw))
}

function compact(values: Record<string, SqlValue | undefined>): Record<string, SqlValue> {
  const columns: Record<string, SqlValue> = {}
  for (const [column, value] of Object.entries(values)) {
    if (value !== undefined) {
      columns[column] = value
    }
  }
  return columns
}

export const TABLES: { [K in EntityKind]: TableSpec<K> } = {
  quote: {
    table: 'quotes',
    parse: (row) => QuoteRowSchema.parse(row),
    toColumns: (record) =>
      compact({ text: record.text, author_id: record.authorId, source: record.source }),
  },
  author: {
    table: 'authors',
    parse: (row) => AuthorRowSchema.parse(row),
    toColumns: (record) => compact({ name: record.name }),
  },
  tag: {
    table: 'tags',
    parse: (row) => TagRowSchema.parse(row),
    toColumns: (record) => compact({ name: record.name }),
  },
  category: {
    table: 'categories',
    parse: (row) => CategoryRowSchema.parse(row),
    toColumns: (record) =>
      compact({
        name: record.name,
        keywords: record.keywords === undefined ? undefined : JSON.stringify(record.keywords),
      }),
  },
  user: {
    table: 'users',
    parse: (row) => UserRowSchema.parse(row),
    toColumns: (record) => compact({ name: record.name, email: record.email }),
  },
}

/**
 * A join table row links owner and target
 */
interface JoinRelation<T extends EntityKind> {
  type: 'join'
  owner: EntityKind
  target: T
  table: string
  ownColumn: string
  targetColumn: string
}

/**
 * The target table holds a foreign key to the owner
 */
interface ForeignKeyRelation<T extends EntityKind> {
  type: 'foreignKey'
  owner: EntityKind
  target: T
  column: string
}

export type RelationSpec<T extends EntityKind> = JoinRelation<T> | ForeignKeyRelation<T>

function join<T extends EntityKind>(
  owner: EntityKind,
  target: T,
  table: string,
  ownColumn: string,
  targetColumn: string
): JoinRelation<T> {
  return { type: 'join', owner, target, table, ownColumn, targetColumn }
}

export const RELATIONS: { [P in RelationKey]: RelationSpec<RelationTarget<P>> } = {
  'quote.tags': join('quote', 'tag', 'quote_tags', 'quote_id', 'tag_id'),
  'quote.categories': join('quote', 'category', 'quote_categories', 'quote_id', 'category_id'),
  'quote.users': join('quote', 'user', 'user_quotes', 'quote_id', 'user_id'),
  'author.quotes': { type: 'foreignKey', owner: 'author', target: 'quote', column: 'author_id' },
  'author.tags': join('author', 'tag', 'author_tags', 'author_id', 'tag_id'),
  'author.users': join('author', 'user', 'user_authors', 'author_id', 'user_id'),
  'tag.quotes': join('tag', 'quote', 'quote_tags', 'tag_id', 'quote_id'),
  'tag.authors': join('tag', 'author', 'author_tags', 'tag_id', 'author_id'),
  'tag.users': join('tag', 'user', 'user_tags', 'tag_id', 'user_id'),
  'category.quotes': join('category', 'quote', 'quote_categories', 'category_id', 'quote_id'),
  'user.quotes': join('user', 'quote', 'user_quotes', 'user_id', 'quote_id'),
  'user.authors': join('user', 'author', 'user_authors', 'user_id', 'author_id'),
  'user.tags': join('user', 'tag', 'user_tags', 'user_id', 'tag_id'),
}

export const RELATION_KEYS: readonly RelationKey[] = [
  'quote.tags',
  'quote.categories',
  'quote.users',
  'author.quotes',
  'author.tags',
  'author.users',
  'tag.quotes',
  'tag.authors',
  'tag.users',
  'category.quotes',
  'user.quotes',
  'user.authors',
  'user.tags',
]
