/**
 * Raw byte decoders. Values are views over the file buffer.
 */
import { ByteStream } from '../ByteStream.ts'
import { getCount } from '../fields.ts'
import type { BlobField, DecodedFields, FieldOutcome, FixedBlobField } from '../types.ts'
import { checkBounds } from './bounds.ts'

function readBlob(stream: ByteStream, size: number, name: string): FieldOutcome<Uint8Array> {
  const failure = checkBounds(stream, size, name)
  if (failure) return failure
  return { ok: true, value: stream.readBytes(size), size }
}

/** Embedded payloads (JPEG images) sized by `{name}_length` */
export function decodeBlob(
  stream: ByteStream,
  field: BlobField,
  siblings: DecodedFields,
): FieldOutcome<Uint8Array> {
  return readBlob(stream, getCount(siblings, field.lengthField), field.name)
}

export function decodeFixedBlob(stream: ByteStream, field: FixedBlobField): FieldOutcome<Uint8Array> {
  return readBlob(stream, field.size, field.name)
}
