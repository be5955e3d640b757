/**
 * Byte fixture builder for PDZ tests. All values little-endian.
 */
export class PdzBuilder {
  private bytes: number[] = []

  get length(): number {
    return this.bytes.length
  }

  u8(v: number): this {
    this.bytes.push(v & 0xFF)
    return this
  }

  u16(v: number): this {
    const b = new Uint8Array(2)
    new DataView(b.buffer).setUint16(0, v, true)
    return this.raw(b)
  }

  i16(v: number): this {
    const b = new Uint8Array(2)
    new DataView(b.buffer).setInt16(0, v, true)
    return this.raw(b)
  }

  u32(v: number): this {
    const b = new Uint8Array(4)
    new DataView(b.buffer).setUint32(0, v, true)
    return this.raw(b)
  }

  i32(v: number): this {
    const b = new Uint8Array(4)
    new DataView(b.buffer).setInt32(0, v, true)
    return this.raw(b)
  }

  u64(v: bigint): this {
    const b = new Uint8Array(8)
    new DataView(b.buffer).setBigUint64(0, v, true)
    return this.raw(b)
  }

  f32(v: number): this {
    const b = new Uint8Array(4)
    new DataView(b.buffer).setFloat32(0, v, true)
    return this.raw(b)
  }

  f64(v: number): this {
    const b = new Uint8Array(8)
    new DataView(b.buffer).setFloat64(0, v, true)
    return this.raw(b)
  }

  /** UTF-16LE text padded with NULs to `units` code units */
  utf16(text: string, units = text.length): this {
    for (let i = 0; i < units; i++) {
      this.u16(i < text.length ? text.charCodeAt(i) : 0)
    }
    return this
  }

  /** SYSTEMTIME, day-of-week and milliseconds zeroed */
  systemTime(year: number, month: number, day: number, hour: number, minute: number, second: number): this {
    return this.u16(year).u16(month).u16(0).u16(day)
      .u16(hour).u16(minute).u16(second).u16(0)
  }

  zeros(n: number): this {
    for (let i = 0; i < n; i++) this.bytes.push(0)
    return this
  }

  raw(data: ArrayLike<number>): this {
    for (let i = 0; i < data.length; i++) this.bytes.push(data[i])
    return this
  }

  /** pdz25 block: u16 type, u32 length, payload */
  block(type: number, payload: Uint8Array): this {
    return this.u16(type).u32(payload.length).raw(payload)
  }

  build(): Uint8Array {
    return Uint8Array.from(this.bytes)
  }
}

export function bytes(build: (b: PdzBuilder) => PdzBuilder): Uint8Array {
  return build(new PdzBuilder()).build()
}

export interface SpectrumFixture {
  phaseNumber?: number
  tubeVoltage?: number
  illumination?: string
  samples: number[]
}

/** pdz25 "XRF Spectrum" (type 3) payload; the spectrum starts at 116 + 2 × illumination length */
export function xrfSpectrumPayload(fixture: SpectrumFixture): Uint8Array {
  const { phaseNumber = 1, tubeVoltage = 40, illumination = '', samples } = fixture
  const b = new PdzBuilder()
    .u32(phaseNumber)
    .u32(1000) // raw_counts
    .u32(900) // valid_counts
    .u32(850) // valid_counts_in_range
    .u32(5) // reset_counts
    .f32(2) // time_since_trigger
    .f32(1.5) // total_packet_time
    .f32(0.25) // total_dead
    .f32(0.125) // total_reset
    .f32(1.25) // total_live
    .f32(tubeVoltage)
    .f32(10) // tube_current
    .i16(13).i16(25).i16(29).i16(50).i16(0).i16(0) // filters
    .i16(2) // filter_wheel_number
    .f32(-25) // detector_temp
    .f32(30) // ambient_temp
    .i32(0) // vacuum
    .f32(20) // ev_per_channel
    .i16(1) // gain_drift_algorithm
    .f32(0) // channel_start
    .systemTime(2024, 3, 15, 14, 30, 5)
    .f32(101.5) // atmospheric_pressure
    .i16(samples.length) // channels
    .i16(35) // nose_temp
    .i16(0) // environment
    .u32(illumination.length)
    .utf16(illumination)
    .i16(0) // normal_packet_start
  for (const v of samples) b.u32(v)
  return b.build()
}

/** pdz25 "File Header" (type 25) payload */
export function fileHeaderPayload(fileTypeId = 'pdz25', instrumentType = 3): Uint8Array {
  return bytes(b => b.utf16(fileTypeId, 5).u32(instrumentType))
}
