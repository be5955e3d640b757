/**
 * Accessors over decoded fields and document entries.
 */
import type { DecodedFields, DecodedValue, DocumentEntry } from './types.ts'

/**
 * Read a sibling as a non-negative integer count.
 * Absent, negative or non-numeric values resolve to 0.
 */
export function getCount(fields: DecodedFields, name: string): number {
  return toCount(fields.get(name))
}

export function toCount(value: DecodedValue | undefined): number {
  let n: number
  if (typeof value === 'number') {
    n = value
  } else if (typeof value === 'bigint') {
    n = value > BigInt(Number.MAX_SAFE_INTEGER) ? Number.MAX_SAFE_INTEGER : Number(value)
  } else if (typeof value === 'string') {
    n = parseInt(value, 10)
  } else {
    return 0
  }
  if (!Number.isFinite(n) || n <= 0) return 0
  return Math.trunc(n)
}

/** True when the record type occurred more than once in the file */
export function isMultiPhase(entry: DocumentEntry): entry is DecodedFields[] {
  return Array.isArray(entry)
}

/** Every occurrence of a record, in framing order */
export function occurrences(entry: DocumentEntry | undefined): DecodedFields[] {
  if (entry === undefined) return []
  return isMultiPhase(entry) ? entry : [entry]
}
