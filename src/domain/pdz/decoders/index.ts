/**
 * Decoder re-exports for convenience.
 * FieldDecoder dispatches to these in its per-field switch.
 */
export { decodeScalar, decodeSkip } from './Scalar.ts'
export { decodeFixedText, decodeDynamicText } from './WideText.ts'
export { decodeSystemTime, formatSystemTime } from './SystemTime.ts'
export type { SystemTime } from './SystemTime.ts'
export { decodeBlob, decodeFixedBlob } from './ByteBlob.ts'
export { decodeSampleArray } from './SampleArray.ts'
