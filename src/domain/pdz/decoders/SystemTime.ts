/**
 * SYSTEMTIME decoder.
 *
 * Layout: year, month, dayOfWeek, day, hour, minute, second, milliseconds (uint16 LE each).
 * dayOfWeek and milliseconds are dropped; the value is the formatted string.
 */
import { ByteStream } from '../ByteStream.ts'
import { SYSTEM_TIME_SIZE } from '../constants.ts'
import type { FieldOutcome, TimestampField } from '../types.ts'
import { checkBounds } from './bounds.ts'

export interface SystemTime {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

export function formatSystemTime(t: SystemTime): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0')
  return `${pad(t.year, 4)}-${pad(t.month)}-${pad(t.day)} ${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}`
}

export function decodeSystemTime(stream: ByteStream, field: TimestampField): FieldOutcome<string> {
  const failure = checkBounds(stream, SYSTEM_TIME_SIZE, field.name)
  if (failure) return failure

  const year = stream.readUint16()
  const month = stream.readUint16()
  stream.readUint16() // day of week
  const day = stream.readUint16()
  const hour = stream.readUint16()
  const minute = stream.readUint16()
  const second = stream.readUint16()
  stream.readUint16() // milliseconds

  return {
    ok: true,
    value: formatSystemTime({ year, month, day, hour, minute, second }),
    size: SYSTEM_TIME_SIZE,
  }
}
