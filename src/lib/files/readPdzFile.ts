import { readFile } from 'node:fs/promises'
import { PdzFileReadError } from '../../domain/pdz/errors.ts'

/**
 * Load a whole PDZ file into memory. Any fs failure surfaces as PdzFileReadError.
 */
export async function readPdzFile(filePath: string): Promise<Uint8Array> {
  try {
    const buffer = await readFile(filePath)
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
  } catch (err: unknown) {
    throw new PdzFileReadError(filePath, err)
  }
}
