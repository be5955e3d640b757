/**
 * UTF-16LE text decoders (fixed and sibling-sized).
 */
import { ByteStream } from '../ByteStream.ts'
import { WCHAR_SIZE } from '../constants.ts'
import { getCount } from '../fields.ts'
import type { DecodedFields, DynamicTextField, FieldOutcome, FixedTextField } from '../types.ts'
import { checkBounds } from './bounds.ts'

function readText(stream: ByteStream, units: number, name: string): FieldOutcome<string> {
  const size = units * WCHAR_SIZE
  const failure = checkBounds(stream, size, name)
  if (failure) return failure
  return { ok: true, value: stream.readUtf16(units), size }
}

export function decodeFixedText(stream: ByteStream, field: FixedTextField): FieldOutcome<string> {
  return readText(stream, field.length, field.name)
}

/** Length comes from `{name}_length`; an absent sibling means an empty string. */
export function decodeDynamicText(
  stream: ByteStream,
  field: DynamicTextField,
  siblings: DecodedFields,
): FieldOutcome<string> {
  return readText(stream, getCount(siblings, field.lengthField), field.name)
}
