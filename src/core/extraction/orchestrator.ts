/**
 * ExtractionOrchestrator - drives a decoder over every container in a
 * quarantine directory.
 *
 * Each container gets its own working directory `<output>/<hash>`, where
 * `<hash>` is the container file name without extension. Re-running over
 * the same output tree is idempotent: a directory that already holds a
 * decoded artifact is skipped without invoking the decoder again.
 *
 * Failures are per item. A decoder that crashes or exits non-zero leaves its
 * output in the item's log and the loop carries on with the next container.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { v4 as uuidv4 } from 'uuid'

import {
  CONTAINER_EXTENSION,
  DECODER_LOG_NAME
} from '../../shared/constants/recovery'
import { UsageError, errorMessage } from '../../shared/errors'
import type {
  ExtractionReport,
  ItemOutcome,
  Logger,
  QuarantineItem,
  RecoveredBlob
} from '../../shared/types'
import type { Decoder, DecodeRun } from '../decoder/types'
import { formatBytes } from '../utils/size'

// ─── Helpers ──────────────────────────────────────────────────

function isContainer(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() === CONTAINER_EXTENSION
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory()
  } catch {
    return false
  }
}

/**
 * Recursively list container files under `dir`, sorted by path. Directories
 * in `exclude` are not entered, so an output tree nested inside the
 * quarantine does not feed its own container copies back in.
 */
export async function findContainers(dir: string, exclude: readonly string[] = []): Promise<string[]> {
  const skipped = new Set(exclude.map((p) => path.resolve(p)))
  const found: string[] = []

  async function walk(current: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true })
    for (const entry of entries) {
      const full = path.join(current, entry.name)
      if (entry.isDirectory()) {
        if (!skipped.has(path.resolve(full))) await walk(full)
      } else if (entry.isFile() && isContainer(entry.name)) {
        found.push(full)
      }
    }
  }

  await walk(dir)
  return found.sort()
}

/** Derive the stable item id (the hash) from a container path. */
export function containerId(containerPath: string): string {
  const base = path.basename(containerPath)
  return base.slice(0, base.length - path.extname(base).length)
}

// ─── ExtractionOrchestrator ───────────────────────────────────

export class ExtractionOrchestrator {
  /** Stamped into every decoder log so logs from repeated runs can be told apart. */
  readonly runId = uuidv4()

  constructor(
    private readonly decoder: Decoder,
    private readonly logger: Logger = console
  ) {}

  /**
   * Decode every container under `sourceDir` into `outputDir`.
   *
   * @throws {UsageError} If `sourceDir` is not a directory or holds no
   *   containers. Nothing is created under `outputDir` in that case.
   */
  async run(sourceDir: string, outputDir: string): Promise<ExtractionReport> {
    if (!(await isDirectory(sourceDir))) {
      throw new UsageError(`Quarantine directory not found: ${sourceDir}`)
    }

    const containers = await findContainers(sourceDir, [outputDir])
    this.logger.log(`[i] Scanning quarantine: ${sourceDir}`)
    if (containers.length === 0) {
      throw new UsageError(`No ${CONTAINER_EXTENSION.toUpperCase()} files in: ${sourceDir}`)
    }
    this.logger.log(`[i] Found ${containers.length} quarantined file(s).`)

    const items = this.uniqueItems(containers, outputDir)

    const outcomes: ItemOutcome[] = []
    const blobs: RecoveredBlob[] = []
    for (const item of items) {
      const outcome = await this.processItem(item)
      outcomes.push(outcome)

      const itemBlobs = await this.collectBlobs(item.workDir)
      const containerName = path.basename(item.containerPath)
      for (const blob of itemBlobs) {
        this.logger.log(
          `[ok] ${containerName} -> ${path.basename(blob.path)} (${formatBytes(blob.size)})`
        )
      }
      if (itemBlobs.length === 0 && outcome.status !== 'failed') {
        this.logger.warn(`[i] ${containerName}: decoder produced no output`)
      }
      blobs.push(...itemBlobs)
    }
    blobs.sort((a, b) => a.path.localeCompare(b.path))

    const report: ExtractionReport = {
      items: outcomes,
      decoded: outcomes.filter((o) => o.status === 'decoded').length,
      skipped: outcomes.filter((o) => o.status === 'skipped').length,
      failed: outcomes.filter((o) => o.status === 'failed').length,
      blobs
    }
    this.logger.log(
      `[i] Extraction: ${report.decoded} decoded, ${report.skipped} already done, ${report.failed} failed; ${blobs.length} recovered file(s).`
    )
    return report
  }

  /**
   * List the decoded artifacts in one working directory.
   */
  async collectBlobs(workDir: string): Promise<RecoveredBlob[]> {
    let names: string[]
    try {
      names = await fs.readdir(workDir)
    } catch {
      return []
    }

    const blobs: RecoveredBlob[] = []
    for (const name of names.sort()) {
      if (!this.decoder.isDecodedOutput(name)) continue
      const blobPath = path.join(workDir, name)
      const stat = await fs.stat(blobPath)
      if (stat.isFile()) {
        blobs.push({ path: blobPath, size: stat.size })
      }
    }
    return blobs
  }

  // ── Private ─────────────────────────────────────────────

  /**
   * One item per hash. A second container with the same hash would share the
   * first one's working directory, so it is reported and left out.
   */
  private uniqueItems(containers: readonly string[], outputDir: string): QuarantineItem[] {
    const byId = new Map<string, QuarantineItem>()
    for (const containerPath of containers) {
      const id = containerId(containerPath)
      const first = byId.get(id)
      if (first) {
        this.logger.warn(`[skip] ${containerPath}: same hash as ${first.containerPath}`)
        continue
      }
      byId.set(id, { id, containerPath, workDir: path.join(outputDir, id) })
    }
    return [...byId.values()]
  }

  private async processItem(item: QuarantineItem): Promise<ItemOutcome> {
    const containerName = path.basename(item.containerPath)
    await fs.mkdir(item.workDir, { recursive: true })

    if (await this.isDecoded(item.workDir)) {
      this.logger.log(`[skip] ${containerName} already decoded`)
      return { item, status: 'skipped' }
    }

    const localCopy = path.join(item.workDir, containerName)
    const logPath = path.join(item.workDir, DECODER_LOG_NAME)

    let run: DecodeRun
    try {
      await copyIfAbsent(item.containerPath, localCopy)
      run = await this.decoder.decode(localCopy, item.workDir)
    } catch (err) {
      run = { ok: false, log: `[${this.decoder.name}] ${errorMessage(err)}\n` }
    }

    const header = `# run ${this.runId} ${new Date().toISOString()} decoder=${this.decoder.name}\n`
    await fs.writeFile(logPath, header + run.log)

    if (!run.ok) {
      const reason =
        run.exitCode !== undefined && run.exitCode !== null
          ? `${this.decoder.name} exited with code ${run.exitCode}`
          : `${this.decoder.name} failed`
      this.logger.warn(`[fail] ${containerName}: ${reason} (see ${logPath})`)
      return { item, status: 'failed', logPath, error: reason }
    }

    return { item, status: 'decoded', logPath }
  }

  private async isDecoded(workDir: string): Promise<boolean> {
    const names = await fs.readdir(workDir)
    return names.some((name) => this.decoder.isDecodedOutput(name))
  }
}

/**
 * Copy `source` to `destination` unless something is already there.
 */
async function copyIfAbsent(source: string, destination: string): Promise<void> {
  try {
    await fs.copyFile(source, destination, fs.constants.COPYFILE_EXCL)
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') return
    throw err
  }
}
