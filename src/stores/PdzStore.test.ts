import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { autorun } from 'mobx'
import { afterAll, describe, it, expect } from 'vitest'
import { PdzStore } from './PdzStore'
import { bytes, fileHeaderPayload, xrfSpectrumPayload } from '../domain/test-helpers'

const twoPhaseFile = bytes(b => b
  .block(25, fileHeaderPayload())
  .block(3, xrfSpectrumPayload({ phaseNumber: 1, samples: [1, 2] }))
  .block(3, xrfSpectrumPayload({ phaseNumber: 2, samples: [3, 4] }))
  .block(138, bytes(g => g.i32(1).f64(51.5).f64(-0.125).f32(12))))

const dir = mkdtempSync(join(tmpdir(), 'pdz-store-'))

describe('PdzStore', () => {
  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('starts idle', () => {
    const store = new PdzStore()
    expect(store.parseStatus).toBe('idle')
    expect(store.isLoaded).toBe(false)
    expect(store.recordNames).toEqual([])
    expect(store.getOccurrences('XRF Spectrum')).toEqual([])
  })

  it('loads bytes and exposes records', () => {
    const store = new PdzStore()
    store.loadBytes(twoPhaseFile, 'two-phase.pdz')

    expect(store.parseStatus).toBe('success')
    expect(store.parseProgress).toBe(100)
    expect(store.dialect).toBe('pdz25')
    expect(store.fileName).toBe('two-phase.pdz')
    expect(store.recordNames).toEqual(['File Header', 'XRF Spectrum', 'GPS Details'])
    expect(store.multiPhaseRecordNames).toEqual(['XRF Spectrum'])
    expect(store.getOccurrences('XRF Spectrum').map(p => p.get('spectrum_data'))).toEqual([[1, 2], [3, 4]])
    expect(store.getOccurrences('GPS Details')[0].get('latitude')).toBe(51.5)
    expect(store.records).toHaveLength(4)
  })

  it('replaces the previous document on every load', () => {
    const store = new PdzStore()
    store.loadBytes(twoPhaseFile)
    store.loadBytes(bytes(b => b.block(25, fileHeaderPayload())))

    expect(store.recordNames).toEqual(['File Header'])
    expect(store.multiPhaseRecordNames).toEqual([])
  })

  it('records parse errors', () => {
    const store = new PdzStore()
    store.loadBytes(twoPhaseFile)
    store.loadBytes(new Uint8Array([7, 0]))

    expect(store.parseStatus).toBe('error')
    expect(store.parseError).toBe('Unknown PDZ version: 7')
    expect(store.document).toBeNull()
  })

  it('loads files from disk', async () => {
    const path = join(dir, 'assay.pdz')
    writeFileSync(path, twoPhaseFile)
    const store = new PdzStore()
    await store.loadFile(path)

    expect(store.parseStatus).toBe('success')
    expect(store.fileName).toBe('assay.pdz')
  })

  it('reports unreadable files', async () => {
    const store = new PdzStore()
    await store.loadFile(join(dir, 'missing.pdz'))

    expect(store.parseStatus).toBe('error')
    expect(store.parseMessage).toBe('Read failed')
    expect(store.fileName).toBe('missing.pdz')
  })

  it('notifies observers when a document loads', () => {
    const store = new PdzStore()
    const seen: number[] = []
    const dispose = autorun(() => {
      seen.push(store.recordNames.length)
    })
    store.loadBytes(twoPhaseFile)
    dispose()

    expect(seen[0]).toBe(0)
    expect(seen[seen.length - 1]).toBe(3)
  })

  it('resets to idle', () => {
    const store = new PdzStore()
    store.loadBytes(twoPhaseFile, 'x.pdz')
    store.reset()

    expect(store.parseStatus).toBe('idle')
    expect(store.document).toBeNull()
    expect(store.fileName).toBeNull()
    expect(store.warnings).toEqual([])
  })
})
