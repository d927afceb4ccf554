/**
 * ReviewSession - the assignment under review and its small state machine.
 *
 *   reviewing --edit-->    reviewing
 *   reviewing --confirm--> committing  (terminal)
 *   reviewing --cancel-->  cancelled   (terminal)
 *
 * The session owns the only mutable copy of the assignment. Confirming hands
 * out a read-only snapshot for the commit writer.
 */

import * as path from 'node:path'

import { DUPLICATE_LABEL, MISSING_LABEL } from '../../shared/constants/recovery'
import { InvalidIndexError, ReviewStateError } from '../../shared/errors'
import type { Assignment, RecoveredBlob, ReviewState } from '../../shared/types'
import { duplicateCounts } from '../matching/candidate-matcher'

export class ReviewSession {
  private state: ReviewState = 'reviewing'
  private readonly assignment: Assignment

  constructor(
    readonly blobs: readonly RecoveredBlob[],
    initial: ReadonlyMap<string, string> = new Map()
  ) {
    this.assignment = new Map(blobs.map((blob) => [blob.path, initial.get(blob.path) ?? '']))
  }

  getState(): ReviewState {
    return this.state
  }

  /**
   * One line per blob: `<n> <blob file> -> <name> <status>`. An unresolved
   * row shows the missing label as both name and status.
   */
  summary(): string[] {
    const counts = duplicateCounts(this.assignment.values())
    return this.blobs.map((blob, i) => {
      const name = this.assignment.get(blob.path) ?? ''
      let status = ''
      if (!name) status = MISSING_LABEL
      else if ((counts.get(name) ?? 0) > 1) status = DUPLICATE_LABEL
      return `${i + 1} ${path.basename(blob.path)} -> ${name || MISSING_LABEL} ${status}`.trimEnd()
    })
  }

  /**
   * Parse operator input as a 1-based blob index.
   *
   * @throws {InvalidIndexError} If the input is not a whole number in range.
   */
  parseIndex(input: string): number {
    const trimmed = input.trim()
    if (!/^\d+$/.test(trimmed)) {
      throw new InvalidIndexError(trimmed, this.blobs.length)
    }
    const index = Number.parseInt(trimmed, 10)
    this.assertIndex(index, trimmed)
    return index
  }

  /**
   * Replace the name for a 1-based index. A blank name clears it.
   */
  edit(index: number, name: string): void {
    this.assertReviewing('edit')
    this.assertIndex(index, String(index))
    this.assignment.set(this.blobs[index - 1].path, name.trim())
  }

  confirm(): ReadonlyMap<string, string> {
    this.assertReviewing('confirm')
    this.state = 'committing'
    return new Map(this.assignment)
  }

  cancel(): void {
    this.assertReviewing('cancel')
    this.state = 'cancelled'
  }

  // ── Private ─────────────────────────────────────────────

  private assertReviewing(action: string): void {
    if (this.state !== 'reviewing') {
      throw new ReviewStateError(action, this.state)
    }
  }

  private assertIndex(index: number, input: string): void {
    if (!Number.isInteger(index) || index < 1 || index > this.blobs.length) {
      throw new InvalidIndexError(input, this.blobs.length)
    }
  }
}
