/**
 * Record schema tables.
 *
 * Tables are authored as JSON in the `[field name, type tag]` style and compiled
 * once, at module load, into the FieldSchema union the decoders switch on.
 *
 * Type tags:
 *   u8 i8 u16 i16 u32 i32 u64 i64 f32 f64   fixed-width scalar
 *   skip[N]                                  N reserved bytes, no field
 *   wchar_t[N]                               N UTF-16 code units
 *   wchar_t                                  code units from `{name}_length`
 *   system_time                              16-byte SYSTEMTIME
 *   bytes                                    raw bytes, length from `{name}_length`
 *   bytes[N]                                 N raw bytes
 *   u32[field] i32[field] f32[field] ...     sample array, count from sibling `field`
 */
import { z } from 'zod'
import { LENGTH_FIELD_SUFFIX, type Dialect } from '../constants.ts'
import { SchemaTableError } from '../errors.ts'
import type {
  FieldSchema,
  RecordSchema,
  RepeatSpec,
  SampleType,
  ScalarType,
  SchemaTable,
} from '../types.ts'
import pdz24Table from './tables/pdz24.json'
import pdz25Table from './tables/pdz25.json'

type GroupEntry = {
  group: string
  repeat: number | string
  fields: FieldEntry[]
}

type FieldEntry = [string, string] | GroupEntry

const FieldEntrySchema: z.ZodType<FieldEntry> = z.lazy(() =>
  z.union([
    z.tuple([z.string().min(1), z.string().min(1)]),
    z.object({
      group: z.string().min(1),
      repeat: z.union([z.number().int().nonnegative(), z.string().min(1)]),
      fields: z.array(FieldEntrySchema),
    }),
  ]),
)

const RecordEntrySchema = z.object({
  type: z.number().int().min(0).max(0xFFFF),
  name: z.string().min(1),
  fields: z.array(FieldEntrySchema),
})

export const SchemaTableFileSchema = z.object({
  dialect: z.enum(['pdz24', 'pdz25']),
  records: z.array(RecordEntrySchema),
})
export type SchemaTableFile = z.infer<typeof SchemaTableFileSchema>

const SCALAR_TYPES: ReadonlySet<string> = new Set<ScalarType>([
  'u8', 'i8', 'u16', 'i16', 'u32', 'i32', 'u64', 'i64', 'f32', 'f64',
])

const SAMPLE_TYPES: ReadonlySet<string> = new Set<SampleType>([
  'u8', 'i8', 'u16', 'i16', 'u32', 'i32', 'f32', 'f64',
])

function isScalarType(tag: string): tag is ScalarType {
  return SCALAR_TYPES.has(tag)
}

function isSampleType(tag: string): tag is SampleType {
  return SAMPLE_TYPES.has(tag)
}

const SIZED_TAG = /^(skip|wchar_t|bytes)\[(\d+)\]$/
const ARRAY_TAG = /^([a-z0-9]+)\[([A-Za-z_][A-Za-z0-9_]*)\]$/

/**
 * Compile one `[name, tag]` declaration.
 */
export function compileField(name: string, tag: string): FieldSchema {
  if (isScalarType(tag)) return { kind: 'scalar', name, type: tag }

  switch (tag) {
    case 'wchar_t':
      return { kind: 'dynamicText', name, lengthField: name + LENGTH_FIELD_SUFFIX }
    case 'system_time':
      return { kind: 'timestamp', name }
    case 'bytes':
      return { kind: 'blob', name, lengthField: name + LENGTH_FIELD_SUFFIX }
  }

  const sized = SIZED_TAG.exec(tag)
  if (sized) {
    const n = parseInt(sized[2], 10)
    switch (sized[1]) {
      case 'skip': return { kind: 'skip', size: n }
      case 'wchar_t': return { kind: 'fixedText', name, length: n }
      case 'bytes': return { kind: 'fixedBlob', name, size: n }
    }
  }

  const array = ARRAY_TAG.exec(tag)
  if (array && isSampleType(array[1])) {
    return { kind: 'samples', name, element: array[1], countField: array[2] }
  }

  throw new SchemaTableError(`Unknown field type tag "${tag}" for field "${name}"`)
}

function compileRepeat(repeat: number | string): RepeatSpec {
  return typeof repeat === 'number'
    ? { kind: 'fixed', count: repeat }
    : { kind: 'fieldRef', field: repeat }
}

function compileEntries(entries: FieldEntry[]): FieldSchema[] {
  return entries.map((entry): FieldSchema => {
    if (Array.isArray(entry)) return compileField(entry[0], entry[1])
    return {
      kind: 'group',
      name: entry.group,
      repeat: compileRepeat(entry.repeat),
      fields: compileEntries(entry.fields),
    }
  })
}

/**
 * Validate and compile a JSON schema table.
 */
export function buildSchemaTable(json: unknown, dialect: Dialect): SchemaTable {
  const parsed = SchemaTableFileSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.') || '<root>'}: ${i.message}`)
      .join('; ')
    throw new SchemaTableError(`Invalid ${dialect} schema table: ${issues}`)
  }
  if (parsed.data.dialect !== dialect) {
    throw new SchemaTableError(`Schema table declares dialect ${parsed.data.dialect}, expected ${dialect}`)
  }

  const table = new Map<number, RecordSchema>()
  for (const record of parsed.data.records) {
    if (table.has(record.type)) {
      throw new SchemaTableError(`Duplicate record type ${record.type} in ${dialect} schema table`)
    }
    table.set(record.type, {
      type: record.type,
      name: record.name,
      fields: compileEntries(record.fields),
    })
  }
  return table
}

export const SCHEMA_TABLES: Readonly<Record<Dialect, SchemaTable>> = {
  pdz24: buildSchemaTable(pdz24Table, 'pdz24'),
  pdz25: buildSchemaTable(pdz25Table, 'pdz25'),
}

/** Record name from the table, or a synthesized one for unknown types */
export function recordName(table: SchemaTable, type: number): string {
  return table.get(type)?.name ?? `Unknown Record Type ${type}`
}
