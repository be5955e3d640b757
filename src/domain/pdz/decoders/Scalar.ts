/**
 * Fixed-width scalar and skip decoders.
 */
import { ByteStream, scalarSize } from '../ByteStream.ts'
import type { FieldOutcome, ScalarField, SkipField } from '../types.ts'
import { checkBounds } from './bounds.ts'

export function decodeScalar(
  stream: ByteStream,
  field: ScalarField,
): FieldOutcome<number | bigint> {
  const size = scalarSize(field.type)
  const failure = checkBounds(stream, size, field.name)
  if (failure) return failure
  return { ok: true, value: stream.readScalar(field.type), size }
}

/** Consume reserved bytes. The outcome carries no value. */
export function decodeSkip(stream: ByteStream, field: SkipField): FieldOutcome<null> {
  const failure = checkBounds(stream, field.size, 'skip')
  if (failure) return failure
  stream.skip(field.size)
  return { ok: true, value: null, size: field.size }
}
