import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { COLLISION_MARKER } from '../../shared/constants/recovery'

// ─── Error Types ──────────────────────────────────────────────

export class FileWriterError extends Error {
  public readonly code: string
  public override readonly cause?: unknown

  constructor(message: string, code: string, cause?: unknown) {
    super(message)
    this.name = 'FileWriterError'
    this.code = code
    this.cause = cause
  }
}

// ─── Types ────────────────────────────────────────────────────

export interface CopyOptions {
  /** Inserted before the extension with a counter when the name is taken. Default: '.guess'. */
  collisionMarker?: string
  /** Carry over permission bits and access/modification times. Default: true. */
  preserveMetadata?: boolean
}

export interface CopyResult {
  /** Final absolute path (differs from the requested one after a collision). */
  finalPath: string
  bytesWritten: number
  /** True when the requested name was taken and a suffixed one was used. */
  renamed: boolean
}

// ─── Helpers ──────────────────────────────────────────────────

// Safety cap to avoid infinite loops on a pathological filesystem
const MAX_ATTEMPTS = 10_000

/**
 * Candidate path for attempt `n`: the requested path for 0, otherwise the
 * marker and counter go before the extension.
 *
 * Example: `/dst/report.pdf`, 2 -> `/dst/report.guess2.pdf`
 */
export function candidatePath(filePath: string, attempt: number, marker = COLLISION_MARKER): string {
  if (attempt === 0) return filePath
  const dir = path.dirname(filePath)
  const ext = path.extname(filePath)
  const base = path.basename(filePath, ext)
  return path.join(dir, `${base}${marker}${attempt}${ext}`)
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST'
}

/**
 * Check whether a file already exists at the given path.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

// ─── FileWriter ───────────────────────────────────────────────

/**
 * Copies recovered blobs to their chosen names.
 *
 * Never overwrites: the copy is created exclusively, and a taken name moves
 * on to `<stem>.guess1<ext>`, `<stem>.guess2<ext>`, ... Existing user files
 * and earlier copies from the same commit are left alone.
 */
export class FileWriter {
  /**
   * Copy `source` to `destinationPath`, or to the first free suffixed name.
   *
   * @throws {FileWriterError} If the copy fails or no free name is found.
   */
  async copy(source: string, destinationPath: string, options: CopyOptions = {}): Promise<CopyResult> {
    const { collisionMarker = COLLISION_MARKER, preserveMetadata = true } = options
    const requested = path.resolve(destinationPath)

    for (let attempt = 0; attempt <= MAX_ATTEMPTS; attempt++) {
      const target = candidatePath(requested, attempt, collisionMarker)
      if (await fileExists(target)) continue

      try {
        await fs.copyFile(source, target, fs.constants.COPYFILE_EXCL)
      } catch (err) {
        // Lost a race with another writer -- try the next name
        if (isAlreadyExists(err)) continue
        throw new FileWriterError(
          `Failed to copy "${source}" to "${target}": ${err instanceof Error ? err.message : String(err)}`,
          'COPY_FAILED',
          err
        )
      }

      if (preserveMetadata) {
        await this.copyMetadata(source, target)
      }
      const { size } = await fs.stat(target)
      return { finalPath: target, bytesWritten: size, renamed: attempt > 0 }
    }

    throw new FileWriterError(
      `Could not generate a unique filename for "${requested}" after ${MAX_ATTEMPTS} attempts.`,
      'UNIQUE_NAME_EXHAUSTED'
    )
  }

  // ── Private ─────────────────────────────────────────────

  private async copyMetadata(source: string, target: string): Promise<void> {
    try {
      const stat = await fs.stat(source)
      await fs.chmod(target, stat.mode)
      await fs.utimes(target, stat.atime, stat.mtime)
    } catch (err) {
      throw new FileWriterError(
        `Copied "${target}" but could not carry over metadata: ${err instanceof Error ? err.message : String(err)}`,
        'METADATA_FAILED',
        err
      )
    }
  }
}
