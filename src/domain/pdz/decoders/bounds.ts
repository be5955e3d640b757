import type { ByteStream } from '../ByteStream.ts'
import type { FieldOutcome } from '../types.ts'

/** Failure outcome when fewer than `required` bytes remain, otherwise null */
export function checkBounds(
  stream: ByteStream,
  required: number,
  field: string,
): FieldOutcome<never> | null {
  if (required <= stream.remaining) return null
  return {
    ok: false,
    error: { kind: 'InsufficientBytes', field, required, available: stream.remaining },
  }
}
