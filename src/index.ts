export { parsePdzBuffer, parsePdz } from './domain/pdz/PdzParser.ts'
export type { ParsePdzResult } from './domain/pdz/PdzParser.ts'
export { selectDialect, readVersionCode } from './domain/pdz/DialectSelector.ts'
export { frameRecords, framePdz24, framePdz25, listRecords } from './domain/pdz/RecordFramer.ts'
export { decodeRecord, decodeWithSchema, decodeDocument, addToDocument } from './domain/pdz/RecordDecoder.ts'
export { decodeGroup } from './domain/pdz/GroupDecoder.ts'
export { decodePrimitive } from './domain/pdz/FieldDecoder.ts'
export { ByteStream } from './domain/pdz/ByteStream.ts'
export { getCount, isMultiPhase, occurrences } from './domain/pdz/fields.ts'
export { SCHEMA_TABLES, buildSchemaTable, compileField, recordName } from './domain/pdz/schemas/schemaTables.ts'
export { SUPPORTED_VERSIONS } from './domain/pdz/constants.ts'
export { UnrecognizedDialectError, PdzFileReadError, SchemaTableError } from './domain/pdz/errors.ts'
export type * from './domain/pdz/types.ts'
export { readPdzFile } from './lib/files/readPdzFile.ts'
export { PdzStore } from './stores/PdzStore.ts'
export type { ParseStatus } from './stores/PdzStore.ts'
