/**
 * Catalog Configuration
 *
 * Environment-driven settings for opening the catalog database.
 */

import { join } from 'path'
import { homedir } from 'os'
import { z } from 'zod'
import { ConfigurationError } from './errors/index.js'

/**
 * Default database path: ~/.quotebook/quotes.db
 */
export const DEFAULT_DB_PATH = join(homedir(), '.quotebook', 'quotes.db')

export const DEFAULT_BUSY_TIMEOUT_MS = 5000

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const EnvSchema = z.object({
  QUOTEBOOK_DB_PATH: z.string().min(1).optional(),
  QUOTEBOOK_DB_READONLY: BooleanFlagSchema.optional(),
  QUOTEBOOK_DB_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
})

export interface CatalogConfig {
  /** SQLite file path, or `:memory:` */
  dbPath: string
  /** Open the database read-only */
  readonly: boolean
  /** How long a write waits on a locked database */
  busyTimeoutMs: number
}

/**
 * Load configuration from environment variables
 *
 * - QUOTEBOOK_DB_PATH: database file (default ~/.quotebook/quotes.db)
 * - QUOTEBOOK_DB_READONLY: `true`/`false`
 * - QUOTEBOOK_DB_TIMEOUT_MS: busy timeout in milliseconds (default 5000)
 *
 * @throws {ConfigurationError} if a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ConfigurationError(
      `Invalid catalog configuration: ${issue?.path.join('.') ?? 'env'} ${issue?.message ?? ''}`.trim(),
      { cause: parsed.error, context: { issues: parsed.error.issues.length } }
    )
  }

  return {
    dbPath: parsed.data.QUOTEBOOK_DB_PATH ?? DEFAULT_DB_PATH,
    readonly: parsed.data.QUOTEBOOK_DB_READONLY ?? false,
    busyTimeoutMs: parsed.data.QUOTEBOOK_DB_TIMEOUT_MS ?? DEFAULT_BUSY_TIMEOUT_MS,
  }
}
