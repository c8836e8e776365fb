/**
 * Catalog error class tests
 */

import { describe, it, expect } from 'vitest'
import {
  CatalogError,
  ConfigurationError,
  DatabaseError,
  DuplicateError,
  NotFoundError,
  ValidationError,
  getErrorMessage,
  isCatalogError,
  wrapError,
} from '../src/errors/index.js'

describe('CatalogError', () => {
  it('should default the code', () => {
    const error = new CatalogError('Something failed')

    expect(error.code).toBe('CATALOG_ERROR')
    expect(error.name).toBe('CatalogError')
    expect(error).toBeInstanceOf(Error)
  })

  it('should walk the cause chain', () => {
    const root = new Error('disk full')
    const middle = new DatabaseError('Failed to insert tag', { cause: root })
    const top = new CatalogError('Import failed', { cause: middle })

    expect(top.getErrorChain()).toEqual([top, middle, root])
  })

  it('should serialize to JSON', () => {
    const error = new CatalogError('Import failed', {
      code: 'IMPORT_FAILED',
      cause: new Error('disk full'),
      context: { file: 'quotes.json' },
    })

    expect(error.toJSON()).toMatchObject({
      name: 'CatalogError',
      code: 'IMPORT_FAILED',
      message: 'Import failed',
      context: { file: 'quotes.json' },
      cause: 'disk full',
    })
  })
})

describe('error subclasses', () => {
  it('should record the failing field', () => {
    const error = new ValidationError('Invalid email format', { field: 'email' })

    expect(error.code).toBe('VALIDATION_ERROR')
    expect(error.field).toBe('email')
    expect(error.context).toEqual({ field: 'email' })
    expect(error).toBeInstanceOf(CatalogError)
  })

  it('should carry the existing record of a duplicate', () => {
    const error = new DuplicateError('tag already exists', { kind: 'tag', existingId: 4 })

    expect(error.code).toBe('DUPLICATE_ERROR')
    expect(error.kind).toBe('tag')
    expect(error.existingId).toBe(4)
    expect(error.context).toEqual({ kind: 'tag', existingId: 4 })
  })

  it('should name the missing record', () => {
    const error = new NotFoundError('author', 5)

    expect(error.message).toBe('Author 5 not found')
    expect(error.code).toBe('NOT_FOUND_ERROR')
    expect(error.kind).toBe('author')
    expect(error.id).toBe(5)
  })

  it('should use distinct codes for storage and configuration failures', () => {
    expect(new DatabaseError('x').code).toBe('DATABASE_ERROR')
    expect(new ConfigurationError('x').code).toBe('CONFIGURATION_ERROR')
  })
})

describe('helpers', () => {
  it('should pass catalog errors through wrapError', () => {
    const original = new NotFoundError('quote', 1)

    expect(wrapError(original, 'ignored')).toBe(original)
  })

  it('should wrap foreign errors', () => {
    const cause = new TypeError('bad')
    const wrapped = wrapError(cause, 'Lookup failed', { code: 'LOOKUP_FAILED' })

    expect(wrapped.message).toBe('Lookup failed')
    expect(wrapped.code).toBe('LOOKUP_FAILED')
    expect(wrapped.cause).toBe(cause)
  })

  it('should extract messages from anything', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom')
    expect(getErrorMessage('plain')).toBe('plain')
    expect(getErrorMessage(42)).toBe('Unknown error')
  })

  it('should recognize catalog errors', () => {
    expect(isCatalogError(new ValidationError('x'))).toBe(true)
    expect(isCatalogError(new Error('x'))).toBe(false)
  })
})
