import { describe, it, expect } from 'vitest'
import { ByteStream } from './ByteStream'
import { decodePrimitive } from './FieldDecoder'
import { formatSystemTime } from './decoders'
import type { DecodedFields, DecodedValue } from './types'
import { bytes } from '../test-helpers'

function siblings(entries: [string, DecodedValue][] = []): DecodedFields {
  return new Map(entries)
}

describe('decodePrimitive', () => {
  describe('scalar', () => {
    it('decodes and reports its size', () => {
      const s = new ByteStream(bytes(b => b.i32(-40)))
      const out = decodePrimitive(s, { kind: 'scalar', name: 'vacuum', type: 'i32' }, siblings())
      expect(out).toEqual({ ok: true, value: -40, size: 4 })
    })

    it('fails with InsufficientBytes when the record is short', () => {
      const s = new ByteStream(new Uint8Array([1, 2]))
      const out = decodePrimitive(s, { kind: 'scalar', name: 'raw_counts', type: 'u32' }, siblings())
      expect(out).toEqual({
        ok: false,
        error: { kind: 'InsufficientBytes', field: 'raw_counts', required: 4, available: 2 },
      })
    })
  })

  describe('skip', () => {
    it('consumes bytes without a value', () => {
      const s = new ByteStream(new Uint8Array(10))
      const out = decodePrimitive(s, { kind: 'skip', size: 8 }, siblings())
      expect(out).toEqual({ ok: true, value: null, size: 8 })
      expect(s.offset).toBe(8)
    })
  })

  describe('text', () => {
    it('trims NUL padding from fixed text', () => {
      const s = new ByteStream(bytes(b => b.utf16('Hi', 5)))
      const out = decodePrimitive(s, { kind: 'fixedText', name: 'file_type_id', length: 5 }, siblings())
      expect(out).toEqual({ ok: true, value: 'Hi', size: 10 })
    })

    it('reads dynamic text length from its sibling', () => {
      const s = new ByteStream(bytes(b => b.utf16('SN-42')))
      const out = decodePrimitive(
        s,
        { kind: 'dynamicText', name: 'serial_number', lengthField: 'serial_number_length' },
        siblings([['serial_number_length', 5]]),
      )
      expect(out).toEqual({ ok: true, value: 'SN-42', size: 10 })
    })

    it('decodes an absent length sibling as an empty string', () => {
      const s = new ByteStream(bytes(b => b.utf16('abc')))
      const out = decodePrimitive(
        s,
        { kind: 'dynamicText', name: 'cal_file_name', lengthField: 'cal_file_name_length' },
        siblings([['cal_file_length', 3]]),
      )
      expect(out).toEqual({ ok: true, value: '', size: 0 })
      expect(s.offset).toBe(0)
    })
  })

  describe('timestamp', () => {
    it('formats SYSTEMTIME', () => {
      const s = new ByteStream(bytes(b => b.systemTime(2023, 7, 4, 9, 5, 3)))
      const out = decodePrimitive(s, { kind: 'timestamp', name: 'created' }, siblings())
      expect(out).toEqual({ ok: true, value: '2023-07-04 09:05:03', size: 16 })
    })

    it('pads the year to four digits', () => {
      expect(formatSystemTime({ year: 999, month: 1, day: 2, hour: 0, minute: 0, second: 0 }))
        .toBe('0999-01-02 00:00:00')
    })
  })

  describe('blob', () => {
    it('reads length-prefixed bytes', () => {
      const s = new ByteStream(new Uint8Array([0xFF, 0xD8, 0xFF, 0xE0, 0x00]))
      const out = decodePrimitive(
        s,
        { kind: 'blob', name: 'image', lengthField: 'image_length' },
        siblings([['image_length', 4]]),
      )
      expect(out.ok).toBe(true)
      if (out.ok) {
        expect(out.value).toEqual(new Uint8Array([0xFF, 0xD8, 0xFF, 0xE0]))
        expect(out.size).toBe(4)
      }
    })

    it('reads fixed-size bytes', () => {
      const s = new ByteStream(new Uint8Array([1, 2, 3]))
      const out = decodePrimitive(s, { kind: 'fixedBlob', name: 'xilinx_vars', size: 3 }, siblings())
      expect(out.ok).toBe(true)
      if (out.ok) expect(out.value).toEqual(new Uint8Array([1, 2, 3]))
    })
  })

  describe('samples', () => {
    it('reads count elements from the named sibling', () => {
      const s = new ByteStream(bytes(b => b.u32(10).u32(20).u32(30)))
      const out = decodePrimitive(
        s,
        { kind: 'samples', name: 'spectrum_data', element: 'u32', countField: 'channels' },
        siblings([['channels', 3]]),
      )
      expect(out).toEqual({ ok: true, value: [10, 20, 30], size: 12 })
    })

    it('returns a flat float sequence', () => {
      const s = new ByteStream(bytes(b => b.f32(1).f32(2.5).f32(3).f32(4.5)))
      const out = decodePrimitive(
        s,
        { kind: 'samples', name: 'spectrum_data', element: 'f32', countField: 'spectrum_data_length' },
        siblings([['spectrum_data_length', 4]]),
      )
      expect(out).toEqual({ ok: true, value: [1, 2.5, 3, 4.5], size: 16 })
    })

    it('accepts a bigint count', () => {
      const s = new ByteStream(bytes(b => b.i32(-1).i32(7)))
      const out = decodePrimitive(
        s,
        { kind: 'samples', name: 'data', element: 'i32', countField: 'n' },
        siblings([['n', 2n]]),
      )
      expect(out).toEqual({ ok: true, value: [-1, 7], size: 8 })
    })

    it('treats a negative count as zero', () => {
      const s = new ByteStream(new Uint8Array(8))
      const out = decodePrimitive(
        s,
        { kind: 'samples', name: 'spectrum_data', element: 'u32', countField: 'channels' },
        siblings([['channels', -3]]),
      )
      expect(out).toEqual({ ok: true, value: [], size: 0 })
    })

    it('fails when the samples overrun the record', () => {
      const s = new ByteStream(new Uint8Array(8))
      const out = decodePrimitive(
        s,
        { kind: 'samples', name: 'spectrum_data', element: 'u32', countField: 'channels' },
        siblings([['channels', 3]]),
      )
      expect(out).toEqual({
        ok: false,
        error: { kind: 'InsufficientBytes', field: 'spectrum_data', required: 12, available: 8 },
      })
    })
  })
})
