/**
 * RecordDecoder - turns framed records into decoded field maps.
 *
 * Fields are decoded strictly in declaration order since every offset depends
 * on the fields before it. Decoding stops at the end of the payload or at the
 * first bounds failure; whatever was decoded up to that point is kept.
 */
import { ByteStream } from './ByteStream.ts'
import { decodePrimitive } from './FieldDecoder.ts'
import { decodeGroup } from './GroupDecoder.ts'
import type {
  DecodedFields,
  ParsedDocument,
  RawRecord,
  RecordDecodeResult,
  RecordSchema,
  SchemaTable,
} from './types.ts'

/**
 * Decode one record payload against its schema.
 */
export function decodeWithSchema(bytes: Uint8Array, schema: RecordSchema): RecordDecodeResult {
  const stream = new ByteStream(bytes)
  const fields: DecodedFields = new Map()

  for (const field of schema.fields) {
    if (stream.eof) break

    if (field.kind === 'group') {
      const group = decodeGroup(stream, field, fields)
      if (group.items.length > 0) fields.set(field.name, group.items)
      if (group.failure) {
        return { fields, consumed: stream.offset, failure: group.failure }
      }
      continue
    }

    const outcome = decodePrimitive(stream, field, fields)
    if (!outcome.ok) {
      return { fields, consumed: stream.offset, failure: outcome.error }
    }
    if (outcome.value !== null) fields.set(field.name, outcome.value)
  }

  return { fields, consumed: stream.offset, failure: null }
}

/**
 * Decode a framed record. Types without a schema decode to an empty map.
 */
export function decodeRecord(record: RawRecord, table: SchemaTable): RecordDecodeResult {
  const schema = table.get(record.type)
  if (!schema) {
    return { fields: new Map(), consumed: 0, failure: null }
  }
  return decodeWithSchema(record.bytes, schema)
}

/**
 * Add one decoded record to the document. A second occurrence of the same
 * record name turns the entry into an ordered sequence.
 */
export function addToDocument(document: ParsedDocument, name: string, fields: DecodedFields): void {
  const existing = document.get(name)
  if (existing === undefined) {
    document.set(name, fields)
  } else if (Array.isArray(existing)) {
    existing.push(fields)
  } else {
    document.set(name, [existing, fields])
  }
}

/**
 * Decode every framed record into a fresh document.
 */
export function decodeDocument(
  records: RawRecord[],
  table: SchemaTable,
  onRecord?: (record: RawRecord, result: RecordDecodeResult, index: number) => void,
): ParsedDocument {
  const document: ParsedDocument = new Map()

  records.forEach((record, index) => {
    const result = decodeRecord(record, table)
    addToDocument(document, record.name, result.fields)
    if (onRecord) onRecord(record, result, index)
  })

  return document
}
