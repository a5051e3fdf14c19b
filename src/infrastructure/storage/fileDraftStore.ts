/**
 * File-backed draft store. The draft is written as JSON next to a temp file
 * and renamed into place so a crash never leaves a half-written draft.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { IDraftStore, PersistedDraft } from '../../domain/repositories'
import { StorageError } from '../../services/errors'
import { storageLogger } from '../../services/logger'
import { parseDraftJSON } from './draftStore'

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined
}

export class FileDraftStore implements IDraftStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<PersistedDraft | null> {
    let text: string
    try {
      text = await readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return null
      throw new StorageError(`Failed to read draft from ${this.filePath}`, 'load', asError(error))
    }

    const draft = parseDraftJSON(text)
    if (!draft) {
      storageLogger.warn('Ignoring unreadable stored draft', { path: this.filePath })
    }
    return draft
  }

  async save(draft: PersistedDraft): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`
    try {
      await mkdir(dirname(this.filePath), { recursive: true })
      await writeFile(tmpPath, JSON.stringify(draft), 'utf8')
      await rename(tmpPath, this.filePath)
    } catch (error) {
      throw new StorageError(`Failed to save draft to ${this.filePath}`, 'save', asError(error))
    }
  }

  async clear(): Promise<void> {
    try {
      await rm(this.filePath, { force: true })
    } catch (error) {
      throw new StorageError(`Failed to clear draft at ${this.filePath}`, 'clear', asError(error))
    }
  }
}
