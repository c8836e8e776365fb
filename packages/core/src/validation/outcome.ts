/**
 * Validation outcomes
 *
 * A draft that passes every rule is either ready to persist or collides
 * with a stored record. Rule failures are thrown as ValidationError.
 */

import type { EntityKind, RecordMap } from '../types/entities.js'

export interface ValidOutcome<K extends EntityKind> {
  status: 'ok'
  kind: K
  /** Sanitized values, ready to persist */
  value: RecordMap[K]
}

export interface DuplicateOutcome<K extends EntityKind> {
  status: 'duplicate'
  kind: K
  /** Id of the stored record the draft collides with */
  existingId: number
}

export type ValidationOutcome<K extends EntityKind = EntityKind> =
  | ValidOutcome<K>
  | DuplicateOutcome<K>

export function valid<K extends EntityKind>(kind: K, value: RecordMap[K]): ValidOutcome<K> {
  return { status: 'ok', kind, value }
}

export function duplicate<K extends EntityKind>(kind: K, existingId: number): DuplicateOutcome<K> {
  return { status: 'duplicate', kind, existingId }
}

export function isDuplicate<K extends EntityKind>(
  outcome: ValidationOutcome<K>
): outcome is DuplicateOutcome<K> {
  return outcome.status === 'duplicate'
}
