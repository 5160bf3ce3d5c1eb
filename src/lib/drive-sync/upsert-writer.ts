/**
 * Upsert Writer
 *
 * Writes a local file into a remote folder by name: overwrite in place when
 * an item with that name exists, create it otherwise.
 */

import { readFile } from 'node:fs/promises'
import { PIPELINE } from '@/lib/constants'
import { UploadError, asPipelineError } from './errors'
import type { RemoteFileStore } from './types'

/**
 * Deterministic cleaned name for a source title: `report.csv` →
 * `report_cleaned.csv`.
 */
export function cleanedName(sourceTitle: string): string {
  const dot = sourceTitle.lastIndexOf('.')
  // A leading dot marks a hidden name, not an extension
  const base = dot > 0 ? sourceTitle.slice(0, dot) : sourceTitle
  return `${base}${PIPELINE.CLEANED_SUFFIX}`
}

export class UpsertWriter {
  constructor(private readonly store: RemoteFileStore) {}

  /**
   * @returns the destination item id
   */
  async upsert(containerId: string, localPayloadPath: string, name: string): Promise<string> {
    try {
      const content = await readFile(localPayloadPath)
      const existing = await this.store.findByName(containerId, name)

      return existing
        ? await this.store.overwrite(existing.id, content)
        : await this.store.create(containerId, name, content)
    } catch (error) {
      throw asPipelineError(error, UploadError)
    }
  }
}
