/**
 * Hard failures. Everything below the record boundary is reported as a value
 * (see DecodeFailure / FramingStop in types.ts), never thrown.
 */

export class UnrecognizedDialectError extends Error {
  readonly kind = 'UnrecognizedDialect'

  /** null when the buffer is too short to hold a version tag */
  readonly versionCode: number | null

  constructor(versionCode: number | null) {
    super(
      versionCode === null
        ? 'Insufficient bytes for PDZ version tag'
        : `Unknown PDZ version: ${versionCode}`,
    )
    this.name = 'UnrecognizedDialectError'
    this.versionCode = versionCode
  }
}

export class PdzFileReadError extends Error {
  readonly kind = 'FileRead'
  readonly filePath: string

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to read PDZ file ${filePath}: ${reason}`, { cause })
    this.name = 'PdzFileReadError'
    this.filePath = filePath
  }
}

export class SchemaTableError extends Error {
  readonly kind = 'SchemaTable'

  constructor(message: string) {
    super(message)
    this.name = 'SchemaTableError'
  }
}
