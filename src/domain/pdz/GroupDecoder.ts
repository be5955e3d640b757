/**
 * GroupDecoder - repeatable sub-record sequences.
 *
 * Each iteration gets its own DecodedFields, so `{name}_length` lookups inside
 * an iteration only see fields of that iteration. The repeat count itself is
 * resolved against the parent record.
 */
import { ByteStream } from './ByteStream.ts'
import { decodePrimitive } from './FieldDecoder.ts'
import { getCount } from './fields.ts'
import type { DecodeFailure, DecodedFields, FieldSchema, GroupField, RepeatSpec } from './types.ts'

export interface GroupOutcome {
  /** Completed iterations, in order */
  items: DecodedFields[]
  /** Bytes consumed by the completed iterations */
  size: number
  /** Set when an iteration ran out of bytes; decoding of the group stopped there */
  failure: DecodeFailure | null
}

export function resolveRepeat(repeat: RepeatSpec, parent: DecodedFields): number {
  switch (repeat.kind) {
    case 'fixed':
      return Math.max(0, Math.trunc(repeat.count))
    case 'fieldRef':
      return getCount(parent, repeat.field)
  }
}

export function decodeGroup(
  stream: ByteStream,
  group: GroupField,
  parent: DecodedFields,
): GroupOutcome {
  const count = resolveRepeat(group.repeat, parent)
  const start = stream.offset
  const items: DecodedFields[] = []

  for (let i = 0; i < count; i++) {
    const iterationStart = stream.offset
    const fields: DecodedFields = new Map()
    const failure = decodeIteration(stream, group.fields, fields)

    if (failure) {
      // Drop the partial iteration
      stream.offset = iterationStart
      return { items, size: iterationStart - start, failure }
    }
    items.push(fields)
  }

  return { items, size: stream.offset - start, failure: null }
}

function decodeIteration(
  stream: ByteStream,
  schema: FieldSchema[],
  fields: DecodedFields,
): DecodeFailure | null {
  for (const field of schema) {
    if (field.kind === 'group') {
      const nested = decodeGroup(stream, field, fields)
      if (nested.items.length > 0) fields.set(field.name, nested.items)
      if (nested.failure) return nested.failure
      continue
    }

    const outcome = decodePrimitive(stream, field, fields)
    if (!outcome.ok) return outcome.error
    if (outcome.value !== null) fields.set(field.name, outcome.value)
  }
  return null
}
