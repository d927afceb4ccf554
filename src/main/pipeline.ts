/**
 * Recovery pipeline: decode containers, read evidence, suggest names, review,
 * commit. Every collaborator that touches the outside world (decoder, OCR,
 * operator) is injected so the whole flow runs under test without a
 * terminal or external tools.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { CommitWriter } from '../core/commit/commit-writer'
import type { Decoder } from '../core/decoder/types'
import { parseEvidence } from '../core/evidence/evidence-parser'
import type { OcrSource } from '../core/evidence/ocr-source'
import { ExtractionOrchestrator } from '../core/extraction/orchestrator'
import { FileWriter } from '../core/io/file-writer'
import { suggestNames, toAssignment } from '../core/matching/candidate-matcher'
import type { Prompter } from '../core/review/prompter'
import { ReviewSession } from '../core/review/review-session'
import { runReview, type ReviewOutcome } from '../core/review/run-review'
import { formatBytes } from '../core/utils/size'
import { OCR_TEXT_NAME } from '../shared/constants/recovery'
import { OcrError } from '../shared/errors'
import type {
  CommitResult,
  ExtractionReport,
  Logger,
  OcrEvidence,
  Suggestion
} from '../shared/types'

export interface PipelineOptions {
  quarantineDir: string
  outputDir: string
  /** Blobs below this size are kept out of naming. */
  minSize?: number
}

export interface PipelineDeps {
  decoder: Decoder
  prompter: Prompter
  ocr?: OcrSource
  writer?: FileWriter
  logger?: Logger
}

export interface PipelineResult {
  extraction: ExtractionReport
  evidence: OcrEvidence[]
  suggestions: Suggestion[]
  /** Absent when there was nothing to review. */
  review?: ReviewOutcome
  commit?: CommitResult
}

/**
 * Read the OCR text, persist it as `<output>/ocr.txt`, and parse it.
 * An unreadable source degrades to no evidence.
 */
async function gatherEvidence(
  ocr: OcrSource | undefined,
  outputDir: string,
  logger: Logger
): Promise<OcrEvidence[]> {
  if (!ocr) return []

  let text = ''
  try {
    text = await ocr.readText()
  } catch (err) {
    if (!(err instanceof OcrError)) throw err
    logger.warn(`[ocr] ${err.message}; continuing without evidence`)
  }

  await fs.writeFile(path.join(outputDir, OCR_TEXT_NAME), text)
  const evidence = parseEvidence(text)
  logger.log(`[ocr] ${evidence.length} candidate(s) from ${ocr.name}`)
  return evidence
}

export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineResult> {
  const logger = deps.logger ?? console
  const { outputDir } = options

  const extraction = await new ExtractionOrchestrator(deps.decoder, logger).run(
    options.quarantineDir,
    outputDir
  )
  const evidence = await gatherEvidence(deps.ocr, outputDir, logger)

  const minSize = options.minSize ?? 0
  const blobs = extraction.blobs.filter((blob) => blob.size >= minSize)
  for (const blob of extraction.blobs) {
    if (blob.size < minSize) {
      logger.log(`[skip] ${path.basename(blob.path)} below --min-size (${formatBytes(blob.size)})`)
    }
  }

  if (blobs.length === 0) {
    logger.log('[i] No recovered files to name.')
    return { extraction, evidence, suggestions: [] }
  }

  const suggestions = suggestNames(blobs, evidence)
  for (const s of suggestions) {
    if (s.name && s.relativeError !== undefined) {
      logger.log(
        `[match] ${path.basename(s.blob.path)} -> ${s.name} (size match Δ~${(s.relativeError * 100).toFixed(2)}%)`
      )
    }
  }

  const session = new ReviewSession(blobs, toAssignment(suggestions))
  const review = await runReview(session, deps.prompter)

  if (review.action === 'cancel') {
    logger.log('[i] Canceled. No files created.')
    return { extraction, evidence, suggestions, review }
  }

  const commit = await new CommitWriter(deps.writer ?? new FileWriter(), logger).commit(
    blobs,
    review.assignment
  )
  logger.log(`    Output root: ${outputDir}`)
  return { extraction, evidence, suggestions, review, commit }
}
