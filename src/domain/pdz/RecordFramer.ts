/**
 * RecordFramer - splits file bytes into typed record payloads.
 *
 * pdz24 framing is positional (6-byte header, then the spectrum).
 * pdz25 is a TLV stream: u16 record type, u32 data length, payload.
 *
 * Framing never throws. A truncated or malformed block ends the loop and is
 * reported through FramingResult.stop; records framed before it are kept.
 */
import { ByteStream } from './ByteStream.ts'
import { BLOCK_HEADER_SIZE, PDZ24_FILE_HEADER_SIZE, PDZ24_RECORD, type Dialect } from './constants.ts'
import { selectDialect } from './DialectSelector.ts'
import { SCHEMA_TABLES, recordName } from './schemas/schemaTables.ts'
import type { FramingResult, RawRecord, RecordInfo, SchemaTable } from './types.ts'

export function framePdz24(buffer: Uint8Array, table: SchemaTable): FramingResult {
  if (buffer.length < PDZ24_FILE_HEADER_SIZE) {
    return {
      records: [],
      stop: {
        kind: 'InsufficientBytes',
        offset: 0,
        message: `pdz24 file is ${buffer.length} bytes, shorter than the ${PDZ24_FILE_HEADER_SIZE}-byte file header`,
      },
    }
  }

  const records: RawRecord[] = [{
    type: PDZ24_RECORD.FILE_HEADER,
    name: recordName(table, PDZ24_RECORD.FILE_HEADER),
    offset: 0,
    bytes: buffer.subarray(0, PDZ24_FILE_HEADER_SIZE),
  }]

  if (buffer.length > PDZ24_FILE_HEADER_SIZE) {
    records.push({
      type: PDZ24_RECORD.XRF_SPECTRUM,
      name: recordName(table, PDZ24_RECORD.XRF_SPECTRUM),
      offset: PDZ24_FILE_HEADER_SIZE,
      bytes: buffer.subarray(PDZ24_FILE_HEADER_SIZE),
    })
  }

  return { records, stop: null }
}

export function framePdz25(buffer: Uint8Array, table: SchemaTable): FramingResult {
  const stream = new ByteStream(buffer)
  const records: RawRecord[] = []

  while (stream.remaining >= BLOCK_HEADER_SIZE) {
    const headerOffset = stream.offset
    const type = stream.readUint16()
    const dataLength = stream.readUint32()

    if (dataLength === 0 || dataLength > buffer.length) {
      return {
        records,
        stop: {
          kind: 'MalformedLength',
          offset: headerOffset,
          message: `Block type ${type} at offset ${headerOffset} declares invalid data length ${dataLength}`,
        },
      }
    }

    if (dataLength > stream.remaining) {
      return {
        records,
        stop: {
          kind: 'InsufficientBytes',
          offset: headerOffset,
          message: `Block type ${type} at offset ${headerOffset} needs ${dataLength} bytes, only ${stream.remaining} remain`,
        },
      }
    }

    const offset = stream.offset
    records.push({
      type,
      name: recordName(table, type),
      offset,
      bytes: stream.readBytes(dataLength),
    })
  }

  if (!stream.eof) {
    return {
      records,
      stop: {
        kind: 'InsufficientBytes',
        offset: stream.offset,
        message: `${stream.remaining} trailing bytes at offset ${stream.offset} are too short for a block header`,
      },
    }
  }

  return { records, stop: null }
}

/** Frame a buffer with the rule of an already selected dialect */
export function frameRecords(buffer: Uint8Array, dialect: Dialect): FramingResult {
  const table = SCHEMA_TABLES[dialect]
  switch (dialect) {
    case 'pdz24':
      return framePdz24(buffer, table)
    case 'pdz25':
      return framePdz25(buffer, table)
  }
}

/**
 * Record types present in a file, in framing order, without decoding them.
 * Throws UnrecognizedDialectError like parsePdzBuffer.
 */
export function listRecords(buffer: Uint8Array): RecordInfo[] {
  const { records } = frameRecords(buffer, selectDialect(buffer))
  return records.map(r => ({
    type: r.type,
    name: r.name,
    offset: r.offset,
    dataLength: r.bytes.length,
  }))
}
