/**
 * PdzParser - top-level orchestrator for parsing PDZ files.
 *
 * Flow: select dialect → frame records → decode each record → aggregate by name
 */
import type { Dialect } from './constants.ts'
import { selectDialect } from './DialectSelector.ts'
import { frameRecords } from './RecordFramer.ts'
import { decodeDocument } from './RecordDecoder.ts'
import { SCHEMA_TABLES } from './schemas/schemaTables.ts'
import type { ParsedDocument, ParseOptions, RecordInfo } from './types.ts'

export interface ParsePdzResult {
  dialect: Dialect
  document: ParsedDocument
  /** Every framed record, in file order */
  records: RecordInfo[]
  /** Recoverable framing problems */
  warnings: string[]
}

/**
 * Parse a PDZ buffer into a record-name keyed document.
 *
 * Only an unrecognized version tag throws. Truncated or malformed blocks end
 * framing with a warning, and a field that runs past its record leaves that
 * record partially decoded.
 *
 * @param buffer Raw file contents as Uint8Array
 */
export function parsePdzBuffer(buffer: Uint8Array, options: ParseOptions = {}): ParsePdzResult {
  const { verbose = false, onProgress, onWarning } = options

  const report = (pct: number, msg: string) => {
    if (onProgress) onProgress(pct, msg)
  }
  const debug = (msg: string) => {
    if (verbose) console.debug(`PDZ parser: ${msg}`)
  }
  const warnings: string[] = []
  const warn = (msg: string) => {
    warnings.push(msg)
    if (onWarning) onWarning(msg)
    else console.warn(`PDZ parser: ${msg}`)
  }

  // Step 1: Dialect
  report(5, 'Reading version tag...')
  const dialect = selectDialect(buffer)
  debug(`dialect ${dialect}, ${buffer.length} bytes`)

  // Step 2: Framing
  report(10, 'Framing records...')
  const { records, stop } = frameRecords(buffer, dialect)
  if (stop) warn(stop.message)
  debug(`framed ${records.length} records`)

  // Step 3: Decode
  report(15, 'Decoding records...')
  const table = SCHEMA_TABLES[dialect]
  const document = decodeDocument(records, table, (record, result, index) => {
    if (result.failure) {
      const f = result.failure
      debug(
        `${record.name} stopped at field "${f.field}": needs ${f.required} bytes, ${f.available} available`,
      )
    } else {
      debug(`${record.name}: ${result.fields.size} fields, ${result.consumed}/${record.bytes.length} bytes`)
    }
    report(15 + Math.floor(((index + 1) / records.length) * 80), 'Decoding records...')
  })

  report(100, 'Complete!')

  return {
    dialect,
    document,
    records: records.map(r => ({
      type: r.type,
      name: r.name,
      offset: r.offset,
      dataLength: r.bytes.length,
    })),
    warnings,
  }
}

/** Parse and return only the document */
export function parsePdz(buffer: Uint8Array, options?: ParseOptions): ParsedDocument {
  return parsePdzBuffer(buffer, options).document
}
