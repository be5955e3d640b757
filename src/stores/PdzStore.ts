import { basename } from 'node:path'
import { makeAutoObservable, observable, runInAction } from 'mobx'
import type { Dialect } from '../domain/pdz/constants.ts'
import { isMultiPhase, occurrences } from '../domain/pdz/fields.ts'
import { parsePdzBuffer } from '../domain/pdz/PdzParser.ts'
import type { DecodedFields, DocumentEntry, ParsedDocument, RecordInfo } from '../domain/pdz/types.ts'
import { readPdzFile } from '../lib/files/readPdzFile.ts'

export type ParseStatus = 'idle' | 'parsing' | 'success' | 'error'

/**
 * Store for one decoded PDZ file and its parsing state
 */
export class PdzStore {
  document: ParsedDocument | null = null
  dialect: Dialect | null = null
  records: RecordInfo[] = []
  warnings: string[] = []
  fileName: string | null = null
  parseStatus: ParseStatus = 'idle'
  parseProgress: number = 0
  parseMessage: string = ''
  parseError: string | null = null

  constructor() {
    makeAutoObservable(this, {
      // Replaced wholesale on every load, never mutated in place
      document: observable.ref,
      records: observable.ref,
      warnings: observable.ref,
    })
  }

  get isLoaded(): boolean {
    return this.document !== null
  }

  /** Record names in first-occurrence order */
  get recordNames(): string[] {
    return this.document ? [...this.document.keys()] : []
  }

  get multiPhaseRecordNames(): string[] {
    if (!this.document) return []
    const names: string[] = []
    for (const [name, entry] of this.document) {
      if (isMultiPhase(entry)) names.push(name)
    }
    return names
  }

  getRecord(name: string): DocumentEntry | undefined {
    return this.document?.get(name)
  }

  getOccurrences(name: string): DecodedFields[] {
    return occurrences(this.getRecord(name))
  }

  loadBytes = (bytes: Uint8Array, fileName: string | null = null): void => {
    this.clearDocument()
    this.fileName = fileName
    this.parseStatus = 'parsing'
    this.parseProgress = 0
    this.parseMessage = 'Starting parse...'
    this.parseError = null

    try {
      const result = parsePdzBuffer(bytes, {
        onProgress: (progress, message) => {
          runInAction(() => {
            this.parseProgress = progress
            this.parseMessage = message
          })
        },
      })

      this.document = result.document
      this.dialect = result.dialect
      this.records = result.records
      this.warnings = result.warnings
      this.parseStatus = 'success'
      this.parseMessage = 'Parse complete!'
    } catch (err: unknown) {
      this.parseStatus = 'error'
      this.parseError = err instanceof Error ? err.message : String(err)
      this.parseMessage = 'Parse failed'
    }
  }

  loadFile = async (filePath: string): Promise<void> => {
    runInAction(() => {
      this.clearDocument()
      this.fileName = basename(filePath)
      this.parseStatus = 'parsing'
      this.parseProgress = 0
      this.parseMessage = 'Reading file...'
      this.parseError = null
    })

    let bytes: Uint8Array
    try {
      bytes = await readPdzFile(filePath)
    } catch (err: unknown) {
      runInAction(() => {
        this.parseStatus = 'error'
        this.parseError = err instanceof Error ? err.message : String(err)
        this.parseMessage = 'Read failed'
      })
      return
    }

    this.loadBytes(bytes, basename(filePath))
  }

  reset = (): void => {
    this.clearDocument()
    this.fileName = null
    this.parseStatus = 'idle'
    this.parseProgress = 0
    this.parseMessage = ''
    this.parseError = null
  }

  private clearDocument(): void {
    this.document = null
    this.dialect = null
    this.records = []
    this.warnings = []
  }
}
