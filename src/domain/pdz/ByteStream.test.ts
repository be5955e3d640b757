import { describe, it, expect } from 'vitest'
import { ByteStream, scalarSize } from './ByteStream'
import { bytes } from '../test-helpers'

describe('ByteStream', () => {
  describe('scalars', () => {
    it('reads little-endian integers', () => {
      const s = new ByteStream(bytes(b => b.u16(0x1234).u32(0xDEADBEEF).i16(-2)))
      expect(s.readUint16()).toBe(0x1234)
      expect(s.readUint32()).toBe(0xDEADBEEF)
      expect(s.readScalar('i16')).toBe(-2)
      expect(s.eof).toBe(true)
    })

    it('reads 64-bit integers as bigint', () => {
      const s = new ByteStream(bytes(b => b.u64(2n ** 40n + 7n)))
      expect(s.readScalar('u64')).toBe(2n ** 40n + 7n)
    })

    it('reads floats', () => {
      const s = new ByteStream(bytes(b => b.f32(1.5).f64(-0.25)))
      expect(s.readScalar('f32')).toBe(1.5)
      expect(s.readScalar('f64')).toBe(-0.25)
    })

    it('knows scalar widths', () => {
      expect(scalarSize('u8')).toBe(1)
      expect(scalarSize('i16')).toBe(2)
      expect(scalarSize('f32')).toBe(4)
      expect(scalarSize('i64')).toBe(8)
    })
  })

  describe('bounds', () => {
    it('throws RangeError when reading past end', () => {
      const s = new ByteStream(new Uint8Array([1, 2, 3]))
      s.readUint16()
      expect(() => s.readUint16()).toThrow(RangeError)
      expect(s.offset).toBe(2)
    })

    it('respects an explicit end', () => {
      const s = new ByteStream(new Uint8Array([1, 2, 3, 4, 5, 6]), 2, 4)
      expect(s.remaining).toBe(2)
      expect(s.readUint16()).toBe(0x0403)
      expect(s.eof).toBe(true)
    })
  })

  describe('text and bytes', () => {
    it('trims trailing NULs from UTF-16LE text', () => {
      const s = new ByteStream(bytes(b => b.utf16('Hi', 5)))
      expect(s.readUtf16(5)).toBe('Hi')
      expect(s.offset).toBe(10)
    })

    it('returns byte views without copying', () => {
      const data = new Uint8Array([9, 8, 7, 6])
      const s = new ByteStream(data)
      s.skip(1)
      const view = s.readBytes(2)
      expect(Array.from(view)).toEqual([8, 7])
      expect(view.buffer).toBe(data.buffer)
    })
  })
})
