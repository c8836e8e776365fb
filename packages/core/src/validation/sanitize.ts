/**
 * Name sanitization for tags and authors
 *
 * Pure, deterministic text normalization applied before uniqueness checks
 * and storage. Both functions are idempotent.
 */

import { ValidationError } from '../errors/index.js'

export const MAX_TAG_LENGTH = 100

/**
 * Decompose accented characters and drop every non-ASCII code point.
 * Whitespace is kept when `keepWhitespace` is set, whatever its code point.
 */
function toAscii(value: string, keepWhitespace: boolean): string {
  let result = ''
  for (const char of value.normalize('NFKD')) {
    const code = char.codePointAt(0) ?? 0
    if (code < 128 || (keepWhitespace && /\s/.test(char))) {
      result += char
    }
  }
  return result
}

/**
 * True when the token has letters and they are all uppercase
 */
function isUppercase(token: string): boolean {
  return token !== token.toLowerCase() && token === token.toUpperCase()
}

/**
 * Two uppercase characters (`JR`, `J.`), or two uppercase letters already
 * closed by a period (`JR.`)
 */
function isAbbreviation(token: string): boolean {
  return (token.length === 2 && isUppercase(token)) || /^[A-Z]{2}\.$/.test(token)
}

function capitalize(token: string): string {
  return token.charAt(0).toUpperCase() + token.slice(1).toLowerCase()
}

/**
 * Sanitize a tag name into a single lowercase alphanumeric token
 *
 * @throws {ValidationError} if nothing alphanumeric remains, or the result
 * is longer than 100 characters
 *
 * @example
 * ```typescript
 * sanitizeTag('Café-Time!')   // 'cafetime'
 * sanitizeTag('  Self Help ') // 'selfhelp'
 * ```
 */
export function sanitizeTag(name: string): string {
  const ascii = toAscii(name.toLowerCase().trim(), false)
  const sanitized = ascii.replace(/[^a-z0-9]/g, '')

  if (!sanitized) {
    throw new ValidationError('Tag must contain at least one alphanumeric character', {
      field: 'name',
      context: { input: name },
    })
  }

  if (sanitized.length > MAX_TAG_LENGTH) {
    throw new ValidationError(`Tag name cannot exceed ${MAX_TAG_LENGTH} characters`, {
      field: 'name',
      context: { length: sanitized.length },
    })
  }

  return sanitized
}

/**
 * Sanitize an author name
 *
 * - Only letters, whitespace, hyphens and periods survive
 * - Single letters become initials (`j` -> `J.`)
 * - Two-letter uppercase abbreviations get a trailing period
 * - Other words are capitalized, including each part of a hyphenated name
 * - Whitespace is collapsed to single spaces
 *
 * @example
 * ```typescript
 * sanitizeAuthorName('j k rowling')        // 'J. K. Rowling'
 * sanitizeAuthorName("jean-paul o'brien")  // 'Jean-Paul Obrien'
 * ```
 */
export function sanitizeAuthorName(name: string): string {
  const cleaned = toAscii(name, true).replace(/[^a-zA-Z\s\-.]/g, '')

  const parts: string[] = []
  for (const token of cleaned.split(/(\s+|-)/)) {
    if (!token) {
      continue
    }

    if (/^\s+$/.test(token)) {
      if (parts[parts.length - 1] !== ' ') {
        parts.push(' ')
      }
    } else if (token === '-') {
      parts.push('-')
    } else if (token.length === 1) {
      parts.push(`${token.toUpperCase()}.`)
    } else if (isAbbreviation(token)) {
      parts.push(token.endsWith('.') ? token : `${token}.`)
    } else {
      parts.push(capitalize(token))
    }
  }

  return parts
    .join('')
    .replace(/\s+/g, ' ')
    .replace(/\s+\./g, '.')
    .replace(/-\s+/g, '-')
    .replace(/(-\s*)([a-z])/g, (_match, hyphen: string, letter: string) => hyphen + letter.toUpperCase())
    .trim()
}
