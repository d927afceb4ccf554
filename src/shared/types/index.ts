// ─── Quarantine Types ─────────────────────────────────────────

/**
 * One quarantined container and the working directory it is decoded into.
 * `id` is the container file name without its extension, which the
 * quarantine store sets to the item's content hash.
 */
export interface QuarantineItem {
  readonly id: string
  readonly containerPath: string
  readonly workDir: string
}

/** A payload the decoder produced inside a {@link QuarantineItem.workDir}. */
export interface RecoveredBlob {
  path: string
  /** Size on disk in bytes. */
  size: number
}

// ─── Extraction Types ─────────────────────────────────────────

export type ItemStatus = 'decoded' | 'skipped' | 'failed'

export interface ItemOutcome {
  item: QuarantineItem
  status: ItemStatus
  /** Per-item decoder log. Absent for skipped items, which keep their previous log. */
  logPath?: string
  error?: string
}

export interface ExtractionReport {
  items: ItemOutcome[]
  decoded: number
  skipped: number
  failed: number
  /** Every decoded output found across all item directories, sorted by path. */
  blobs: RecoveredBlob[]
}

// ─── Evidence Types ───────────────────────────────────────────

/** A (name, size) hypothesis scraped from OCR text. */
export interface OcrEvidence {
  name: string
  /** Size in bytes after unit conversion. */
  size: number
  /** 0-based index of the line the name was found on. */
  line: number
}

// ─── Matching Types ───────────────────────────────────────────

export interface Suggestion {
  blob: RecoveredBlob
  /** Suggested name, or '' when nothing fell within tolerance. */
  name: string
  /** Relative size error of the accepted candidate. */
  relativeError?: number
}

/**
 * Blob path -> chosen name. '' marks an unresolved blob. Every blob under
 * review has exactly one entry.
 */
export type Assignment = Map<string, string>

// ─── Review Types ─────────────────────────────────────────────

export type ReviewState = 'reviewing' | 'committing' | 'cancelled'

export type ReviewAction = 'confirm' | 'edit' | 'cancel'

// ─── Commit Types ─────────────────────────────────────────────

export interface CommittedCopy {
  blob: string
  destination: string
}

export interface CommitResult {
  copies: CommittedCopy[]
  count: number
}

// ─── Logging ──────────────────────────────────────────────────

/** Sink for the tagged progress lines every stage prints. */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>
