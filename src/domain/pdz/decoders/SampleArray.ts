/**
 * Sample array decoder - spectrum channel counts and LIBS float data.
 *
 * The count is a number of elements, not bytes. Float arrays described as
 * interleaved x/y pairs are still returned flat: n floats for a count of n.
 */
import { ByteStream, scalarSize } from '../ByteStream.ts'
import { getCount } from '../fields.ts'
import type { DecodedFields, FieldOutcome, SampleArrayField } from '../types.ts'
import { checkBounds } from './bounds.ts'

export function decodeSampleArray(
  stream: ByteStream,
  field: SampleArrayField,
  siblings: DecodedFields,
): FieldOutcome<number[]> {
  const count = getCount(siblings, field.countField)
  const size = count * scalarSize(field.element)
  const failure = checkBounds(stream, size, field.name)
  if (failure) return failure

  const samples = new Array<number>(count)
  for (let i = 0; i < count; i++) {
    // SampleType excludes the 64-bit types, so every read is a number
    samples[i] = Number(stream.readScalar(field.element))
  }
  return { ok: true, value: samples, size }
}
