/**
 * DialectSelector - reads the 2-byte version tag at offset 0.
 */
import { SUPPORTED_VERSIONS, VERSION_TAG_SIZE, type Dialect } from './constants.ts'
import { UnrecognizedDialectError } from './errors.ts'

function isSupportedVersion(code: number): code is keyof typeof SUPPORTED_VERSIONS {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_VERSIONS, code)
}

/** Raw version code, or null when the buffer is shorter than the tag */
export function readVersionCode(buffer: Uint8Array): number | null {
  if (buffer.length < VERSION_TAG_SIZE) return null
  return buffer[0] | (buffer[1] << 8)
}

/**
 * Pick the dialect for a file. Throws UnrecognizedDialectError for short
 * buffers and unknown version codes.
 */
export function selectDialect(buffer: Uint8Array): Dialect {
  const code = readVersionCode(buffer)
  if (code === null || !isSupportedVersion(code)) {
    throw new UnrecognizedDialectError(code)
  }
  return SUPPORTED_VERSIONS[code]
}
