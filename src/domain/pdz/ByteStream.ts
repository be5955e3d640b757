/**
 * Little-endian cursor over a Uint8Array slice.
 *
 * Reads past `end` throw a RangeError; field decoders check `remaining`
 * first and report a DecodeFailure instead of letting it escape.
 */
import type { ScalarType } from './types.ts'

const SCALAR_SIZES: Record<ScalarType, number> = {
  u8: 1, i8: 1,
  u16: 2, i16: 2,
  u32: 4, i32: 4,
  u64: 8, i64: 8,
  f32: 4, f64: 8,
}

const utf16Decoder = new TextDecoder('utf-16le')

export function scalarSize(type: ScalarType): number {
  return SCALAR_SIZES[type]
}

export class ByteStream {
  private data: Uint8Array
  private view: DataView
  private _offset: number
  private _end: number

  constructor(data: Uint8Array, offset = 0, end?: number) {
    this.data = data
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength)
    this._offset = offset
    this._end = Math.min(end ?? data.length, data.length)
  }

  get offset(): number {
    return this._offset
  }

  set offset(v: number) {
    this._offset = v
  }

  get end(): number {
    return this._end
  }

  get remaining(): number {
    return Math.max(0, this._end - this._offset)
  }

  get eof(): boolean {
    return this._offset >= this._end
  }

  readUint16(): number {
    const pos = this.advance(2)
    return this.view.getUint16(pos, true)
  }

  readUint32(): number {
    const pos = this.advance(4)
    return this.view.getUint32(pos, true)
  }

  /** Read one fixed-width scalar. 64-bit integers come back as bigint. */
  readScalar(type: ScalarType): number | bigint {
    const pos = this.advance(SCALAR_SIZES[type])
    const v = this.view
    switch (type) {
      case 'u8': return v.getUint8(pos)
      case 'i8': return v.getInt8(pos)
      case 'u16': return v.getUint16(pos, true)
      case 'i16': return v.getInt16(pos, true)
      case 'u32': return v.getUint32(pos, true)
      case 'i32': return v.getInt32(pos, true)
      case 'u64': return v.getBigUint64(pos, true)
      case 'i64': return v.getBigInt64(pos, true)
      case 'f32': return v.getFloat32(pos, true)
      case 'f64': return v.getFloat64(pos, true)
    }
  }

  /**
   * Decode `units` UTF-16LE code units.
   * A leading BOM is dropped by the decoder; trailing NULs are trimmed here.
   */
  readUtf16(units: number): string {
    const bytes = this.readBytes(units * 2)
    return utf16Decoder.decode(bytes).replace(/\0+$/, '')
  }

  /** View over the next n bytes (no copy). */
  readBytes(n: number): Uint8Array {
    const pos = this.advance(n)
    return this.data.subarray(pos, pos + n)
  }

  skip(n: number): void {
    this.advance(n)
  }

  private advance(n: number): number {
    if (n < 0 || this._offset + n > this._end) {
      throw new RangeError(`ByteStream: read of ${n} bytes past end at offset ${this._offset}`)
    }
    const pos = this._offset
    this._offset += n
    return pos
  }
}
