/**
 * FieldDecoder - dispatches one primitive field declaration to its decoder.
 *
 * The stream is positioned at the field; on success it is left just past it.
 * On failure the stream position is unspecified and the caller stops.
 */
import { ByteStream } from './ByteStream.ts'
import type { DecodedFields, DecodedValue, FieldOutcome, PrimitiveField } from './types.ts'
import {
  decodeScalar,
  decodeSkip,
  decodeFixedText,
  decodeDynamicText,
  decodeSystemTime,
  decodeBlob,
  decodeFixedBlob,
  decodeSampleArray,
} from './decoders/index.ts'

/**
 * Decode a single primitive field. A `null` value means the field consumed
 * bytes but produces no entry (skip).
 */
export function decodePrimitive(
  stream: ByteStream,
  field: PrimitiveField,
  siblings: DecodedFields,
): FieldOutcome<DecodedValue | null> {
  switch (field.kind) {
    case 'scalar':
      return decodeScalar(stream, field)
    case 'skip':
      return decodeSkip(stream, field)
    case 'fixedText':
      return decodeFixedText(stream, field)
    case 'dynamicText':
      return decodeDynamicText(stream, field, siblings)
    case 'timestamp':
      return decodeSystemTime(stream, field)
    case 'blob':
      return decodeBlob(stream, field, siblings)
    case 'fixedBlob':
      return decodeFixedBlob(stream, field)
    case 'samples':
      return decodeSampleArray(stream, field, siblings)
    default:
      return assertNever(field)
  }
}

function assertNever(field: never): never {
  throw new Error(`Unhandled field kind: ${JSON.stringify(field)}`)
}
