/**
 * PDZ container format constants.
 */

/** Version tag (first 2 bytes, LE) → dialect */
export const SUPPORTED_VERSIONS = {
  25: 'pdz25',
  257: 'pdz24',
} as const

export type Dialect = (typeof SUPPORTED_VERSIONS)[keyof typeof SUPPORTED_VERSIONS]

export const VERSION_TAG_SIZE = 2

/** Dialect B block header: 2-byte record type + 4-byte data length */
export const BLOCK_HEADER_SIZE = 6

/** Dialect A framing is positional: the first 6 bytes are the file header */
export const PDZ24_FILE_HEADER_SIZE = 6

export const PDZ24_RECORD = {
  FILE_HEADER: 0,
  XRF_SPECTRUM: 1,
} as const

/** Windows SYSTEMTIME: 8 × uint16 */
export const SYSTEM_TIME_SIZE = 16

/** UTF-16 code unit */
export const WCHAR_SIZE = 2

/** Suffix of the sibling field holding a dynamic text or blob length */
export const LENGTH_FIELD_SUFFIX = '_length'
