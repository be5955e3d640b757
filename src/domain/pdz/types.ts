/**
 * PDZ record model - schema variants, decoded values and framing/decoding outcomes.
 */
import type { Dialect } from './constants.ts'

export type { Dialect }

/** Fixed-width little-endian scalar types */
export type ScalarType =
  | 'u8' | 'i8'
  | 'u16' | 'i16'
  | 'u32' | 'i32'
  | 'u64' | 'i64'
  | 'f32' | 'f64'

/** Element types allowed in sample arrays (all decode to plain numbers) */
export type SampleType = Exclude<ScalarType, 'u64' | 'i64'>

/** How many times a group repeats */
export type RepeatSpec =
  | { kind: 'fixed'; count: number }
  | { kind: 'fieldRef'; field: string }

export interface ScalarField {
  kind: 'scalar'
  name: string
  type: ScalarType
}

/** Reserved or undocumented bytes. Produces no field. */
export interface SkipField {
  kind: 'skip'
  size: number
}

/** UTF-16LE text of a declared number of code units */
export interface FixedTextField {
  kind: 'fixedText'
  name: string
  length: number
}

/** UTF-16LE text whose code-unit count is read from a sibling */
export interface DynamicTextField {
  kind: 'dynamicText'
  name: string
  lengthField: string
}

/** SYSTEMTIME rendered as "YYYY-MM-DD HH:MM:SS" */
export interface TimestampField {
  kind: 'timestamp'
  name: string
}

/** Raw bytes whose length is read from a sibling (embedded images) */
export interface BlobField {
  kind: 'blob'
  name: string
  lengthField: string
}

export interface FixedBlobField {
  kind: 'fixedBlob'
  name: string
  size: number
}

/** Flat sequence of samples whose count is read from a sibling */
export interface SampleArrayField {
  kind: 'samples'
  name: string
  element: SampleType
  countField: string
}

export interface GroupField {
  kind: 'group'
  name: string
  repeat: RepeatSpec
  fields: FieldSchema[]
}

export type PrimitiveField =
  | ScalarField
  | SkipField
  | FixedTextField
  | DynamicTextField
  | TimestampField
  | BlobField
  | FixedBlobField
  | SampleArrayField

export type FieldSchema = PrimitiveField | GroupField

export interface RecordSchema {
  type: number
  name: string
  fields: FieldSchema[]
}

/** Per-dialect lookup: record type id → schema */
export type SchemaTable = ReadonlyMap<number, RecordSchema>

export type DecodedValue =
  | number
  | bigint
  | string
  | Uint8Array
  | number[]
  | DecodedFields[]

/** Insertion-ordered field name → value */
export type DecodedFields = Map<string, DecodedValue>

/** One occurrence maps to fields; N > 1 occurrences map to an ordered sequence */
export type DocumentEntry = DecodedFields | DecodedFields[]

export type ParsedDocument = Map<string, DocumentEntry>

/** A framed record: type id plus a view (not a copy) over the file bytes */
export interface RawRecord {
  type: number
  name: string
  /** Absolute offset of the payload in the file */
  offset: number
  bytes: Uint8Array
}

export interface RecordInfo {
  type: number
  name: string
  offset: number
  dataLength: number
}

export interface DecodeFailure {
  kind: 'InsufficientBytes'
  field: string
  required: number
  available: number
}

export type FieldOutcome<T> =
  | { ok: true; value: T; size: number }
  | { ok: false; error: DecodeFailure }

export interface FramingStop {
  kind: 'InsufficientBytes' | 'MalformedLength'
  offset: number
  message: string
}

export interface FramingResult {
  records: RawRecord[]
  /** Why framing ended early, if it did */
  stop: FramingStop | null
}

export interface RecordDecodeResult {
  fields: DecodedFields
  /** Bytes consumed from the record payload */
  consumed: number
  /** First failure that stopped decoding, if any */
  failure: DecodeFailure | null
}

export interface ParseOptions {
  /** Trace framing and decoding through console.debug */
  verbose?: boolean
  /** Progress callback (0-100) */
  onProgress?: (progress: number, message: string) => void
  /** Receives recoverable framing problems; defaults to console.warn */
  onWarning?: (message: string) => void
}
