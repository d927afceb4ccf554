/**
 * Candidate matcher - size-based nearest match between recovered blobs and
 * OCR evidence.
 *
 * Each blob independently takes the candidate with the smallest relative size
 * error, if that error is within tolerance. Two blobs can end up with the
 * same name; {@link duplicateCounts} surfaces that to the reviewer instead of
 * resolving it. A global one-to-one assignment (min-cost bipartite matching)
 * would avoid some of those collisions but also hides the ambiguity.
 */

import { MATCH_TOLERANCE } from '../../shared/constants/recovery'
import type { Assignment, OcrEvidence, RecoveredBlob, Suggestion } from '../../shared/types'

export interface MatchOptions {
  /** Maximum accepted relative error, inclusive. Default: 0.12. */
  tolerance?: number
}

/**
 * `|size - target| / target`, or `Infinity` for a non-positive target, which
 * can never match.
 */
export function relativeError(size: number, target: number): number {
  if (!(target > 0)) return Infinity
  return Math.abs(size - target) / target
}

/**
 * Best candidate for one blob. Ties go to the earliest candidate.
 */
export function bestCandidate(
  blob: RecoveredBlob,
  candidates: readonly OcrEvidence[]
): { candidate: OcrEvidence; error: number } | null {
  let best: OcrEvidence | null = null
  let bestError = Infinity

  for (const candidate of candidates) {
    const error = relativeError(blob.size, candidate.size)
    if (error < bestError) {
      best = candidate
      bestError = error
    }
  }

  return best ? { candidate: best, error: bestError } : null
}

export function suggestNames(
  blobs: readonly RecoveredBlob[],
  candidates: readonly OcrEvidence[],
  options: MatchOptions = {}
): Suggestion[] {
  const tolerance = options.tolerance ?? MATCH_TOLERANCE

  return blobs.map((blob) => {
    const best = bestCandidate(blob, candidates)
    if (!best || best.error > tolerance) {
      return { blob, name: '' }
    }
    return { blob, name: best.candidate.name, relativeError: best.error }
  })
}

/** Initial assignment: one entry per blob, keyed by blob path. */
export function toAssignment(suggestions: readonly Suggestion[]): Assignment {
  return new Map(suggestions.map((s) => [s.blob.path, s.name]))
}

/**
 * How many blobs each non-empty name is assigned to.
 */
export function duplicateCounts(names: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>()
  for (const name of names) {
    if (!name) continue
    counts.set(name, (counts.get(name) ?? 0) + 1)
  }
  return counts
}
