/**
 * Evidence parser - turns OCR text of quarantine-list screenshots into
 * (name, size) hypotheses.
 *
 * A line "anchors" a candidate when it contains something that looks like a
 * file name with a known extension. Sizes are read from the anchor line and
 * the lines right after it, because list views often wrap long names and put
 * the size column on the next row. Every distinct size in that window is
 * paired with the name; the matcher decides which one fits.
 */

import * as path from 'node:path'

import {
  EVIDENCE_EXCLUDE_PATTERN,
  EVIDENCE_EXTENSIONS,
  EVIDENCE_LOOKAHEAD
} from '../../shared/constants/recovery'
import type { OcrEvidence } from '../../shared/types'
import { parseSizeTokens } from './size-units'

const FILE_NAME_RE = new RegExp(
  `([A-Za-z0-9 _\\-()\\[\\].]+?\\.(?:${EVIDENCE_EXTENSIONS.join('|')}))(?![A-Za-z0-9])`,
  'i'
)

export interface EvidenceParserOptions {
  /** Lines scanned for sizes, anchor line included. */
  lookahead?: number
  /** Names matching this pattern are dropped. */
  exclude?: RegExp
}

/**
 * Pull the file-name token out of a line, reduced to its base name.
 */
export function findFileName(line: string): string | null {
  const match = FILE_NAME_RE.exec(line)
  if (!match) return null
  const name = path.posix.basename(match[1].replace(/\\/g, '/')).trim()
  return name.length > 0 ? name : null
}

export function parseEvidence(text: string, options: EvidenceParserOptions = {}): OcrEvidence[] {
  const lookahead = Math.max(1, options.lookahead ?? EVIDENCE_LOOKAHEAD)
  const exclude = options.exclude ?? EVIDENCE_EXCLUDE_PATTERN
  const lines = text.split(/\r?\n/)
  const evidence: OcrEvidence[] = []

  for (let i = 0; i < lines.length; i++) {
    const name = findFileName(lines[i])
    if (!name) continue
    // A global pattern would carry lastIndex between names.
    exclude.lastIndex = 0
    if (exclude.test(name)) continue

    const sizes = new Set<number>()
    for (const line of lines.slice(i, i + lookahead)) {
      for (const size of parseSizeTokens(line)) sizes.add(size)
    }

    for (const size of sizes) {
      evidence.push({ name, size, line: i })
    }
  }

  return evidence
}
