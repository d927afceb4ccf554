/**
 * Commit writer - materializes a confirmed assignment as named copies.
 *
 * Each copy goes next to its blob, inside the item's working directory.
 * Blobs without a name are left untouched; nothing is ever moved or
 * overwritten.
 */

import * as path from 'node:path'

import type { CommitResult, CommittedCopy, Logger, RecoveredBlob } from '../../shared/types'
import { FileWriter } from '../io/file-writer'

/**
 * Reduce an operator- or OCR-supplied name to a plain file name, or null if
 * nothing usable is left. Path components are dropped so a copy can never
 * leave the blob's directory.
 */
export function safeFileName(name: string): string | null {
  const base = path.posix.basename(name.trim().replace(/\\/g, '/'))
  if (!base || base === '.' || base === '..') return null
  return base
}

export class CommitWriter {
  constructor(
    private readonly writer: FileWriter = new FileWriter(),
    private readonly logger: Logger = console
  ) {}

  async commit(
    blobs: readonly RecoveredBlob[],
    assignment: ReadonlyMap<string, string>
  ): Promise<CommitResult> {
    const copies: CommittedCopy[] = []

    for (const blob of blobs) {
      const fileName = safeFileName(assignment.get(blob.path) ?? '')
      if (!fileName) continue

      const requested = path.join(path.dirname(blob.path), fileName)
      const { finalPath } = await this.writer.copy(blob.path, requested)
      copies.push({ blob: blob.path, destination: finalPath })
      this.logger.log(`[create] ${path.basename(blob.path)} -> ${path.basename(finalPath)}`)
    }

    this.logger.log(`[✓] Done. Created ${copies.length} file(s).`)
    return { copies, count: copies.length }
  }
}
