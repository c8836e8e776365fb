import { describe, it, expect } from 'vitest'
import { loadConfig, DEFAULT_DB_PATH, DEFAULT_BUSY_TIMEOUT_MS } from '../src/config.js'
import { ConfigurationError } from '../src/errors/index.js'

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      dbPath: DEFAULT_DB_PATH,
      readonly: false,
      busyTimeoutMs: DEFAULT_BUSY_TIMEOUT_MS,
    })
    expect(DEFAULT_DB_PATH.endsWith('quotes.db')).toBe(true)
    expect(DEFAULT_BUSY_TIMEOUT_MS).toBe(5000)
  })

  it('should read every variable', () => {
    expect(
      loadConfig({
        QUOTEBOOK_DB_PATH: '/tmp/catalog.db',
        QUOTEBOOK_DB_READONLY: 'true',
        QUOTEBOOK_DB_TIMEOUT_MS: '250',
      })
    ).toEqual({ dbPath: '/tmp/catalog.db', readonly: true, busyTimeoutMs: 250 })
  })

  it('should accept numeric flags', () => {
    expect(loadConfig({ QUOTEBOOK_DB_READONLY: '1' }).readonly).toBe(true)
    expect(loadConfig({ QUOTEBOOK_DB_READONLY: '0' }).readonly).toBe(false)
  })

  it('should reject an invalid flag', () => {
    expect(() => loadConfig({ QUOTEBOOK_DB_READONLY: 'yes' })).toThrow(ConfigurationError)
    expect(() => loadConfig({ QUOTEBOOK_DB_READONLY: 'yes' })).toThrow(
      /^Invalid catalog configuration: QUOTEBOOK_DB_READONLY/
    )
  })

  it('should reject a negative or non-numeric timeout', () => {
    expect(() => loadConfig({ QUOTEBOOK_DB_TIMEOUT_MS: '-5' })).toThrow(
      /^Invalid catalog configuration: QUOTEBOOK_DB_TIMEOUT_MS/
    )
    expect(() => loadConfig({ QUOTEBOOK_DB_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError)
  })

  it('should ignore unrelated variables', () => {
    expect(loadConfig({ HOME: '/home/test', PATH: '/usr/bin' }).readonly).toBe(false)
  })
})
