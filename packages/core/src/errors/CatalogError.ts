/**
 * Catalog Error Classes
 *
 * Custom error classes with cause chaining so that store failures keep their
 * original stack when they surface through the service layer.
 */

import type { EntityKind } from '../types/entities.js'

/**
 * Base error class for all catalog errors.
 * Preserves cause chain and provides structured error information.
 */
export class CatalogError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    options?: {
      code?: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'CatalogError'
    this.code = options?.code ?? 'CATALOG_ERROR'
    this.context = options?.context

    Error.captureStackTrace?.(this, this.constructor)
  }

  /**
   * Get the full error chain as an array
   */
  getErrorChain(): Error[] {
    const chain: Error[] = [this]
    let current: unknown = this.cause

    while (current instanceof Error) {
      chain.push(current)
      current = current.cause
    }

    return chain
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }
}

/**
 * Input fails a validation or sanitization rule
 */
export class ValidationError extends CatalogError {
  /** Field that failed validation */
  readonly field?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      field?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        field: options?.field,
      },
    })
    this.name = 'ValidationError'
    this.field = options?.field
  }
}

/**
 * An equivalent record already exists.
 *
 * Raised by callers of the validator at the point of persistence, never by
 * the validator itself.
 */
export class DuplicateError extends CatalogError {
  readonly kind: EntityKind
  readonly existingId: number

  constructor(
    message: string,
    options: {
      kind: EntityKind
      existingId: number
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'DUPLICATE_ERROR',
      cause: options.cause,
      context: {
        ...options.context,
        kind: options.kind,
        existingId: options.existingId,
      },
    })
    this.name = 'DuplicateError'
    this.kind = options.kind
    this.existingId = options.existingId
  }
}

/**
 * A referenced record does not exist
 */
export class NotFoundError extends CatalogError {
  readonly kind: EntityKind
  readonly id: number

  constructor(kind: EntityKind, id: number, options?: { cause?: unknown }) {
    super(`${capitalize(kind)} ${id} not found`, {
      code: 'NOT_FOUND_ERROR',
      cause: options?.cause,
      context: { kind, id },
    })
    this.name = 'NotFoundError'
    this.kind = kind
    this.id = id
  }
}

/**
 * Storage-level failure (commit, constraint, connection)
 */
export class DatabaseError extends CatalogError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'DATABASE_ERROR',
      cause: options?.cause,
      context: options?.context,
    })
    this.name = 'DatabaseError'
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends CatalogError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      cause: options?.cause,
      context: options?.context,
    })
    this.name = 'ConfigurationError'
  }
}

/**
 * Wrap an unknown error in a CatalogError if not already one
 */
export function wrapError(
  error: unknown,
  message: string,
  options?: {
    code?: string
    context?: Record<string, unknown>
  }
): CatalogError {
  if (error instanceof CatalogError) {
    return error
  }

  return new CatalogError(message, {
    code: options?.code,
    cause: error,
    context: options?.context,
  })
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}
