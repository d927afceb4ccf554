// ─── Error Types ──────────────────────────────────────────────

export class RecoveryError extends Error {
  public readonly code: string
  public override readonly cause?: unknown

  constructor(message: string, code: string, cause?: unknown) {
    super(message)
    this.name = 'RecoveryError'
    this.code = code
    this.cause = cause
  }
}

/** Fatal configuration problem: bad arguments or nothing to process. */
export class UsageError extends RecoveryError {
  constructor(message: string) {
    super(message, 'USAGE')
    this.name = 'UsageError'
  }
}

export class NotInteractiveError extends RecoveryError {
  constructor() {
    super('No interactive TTY. Aborting.', 'NOT_INTERACTIVE')
    this.name = 'NotInteractiveError'
  }
}

export class InvalidIndexError extends RecoveryError {
  constructor(
    public readonly input: string,
    public readonly max: number
  ) {
    super(`Invalid number "${input}": expected 1-${max}.`, 'INVALID_INDEX')
    this.name = 'InvalidIndexError'
  }
}

export class ReviewStateError extends RecoveryError {
  constructor(action: string, state: string) {
    super(`Cannot ${action} a review that is already ${state}.`, 'REVIEW_STATE')
    this.name = 'ReviewStateError'
  }
}

export class DecoderError extends RecoveryError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DECODER_FAILED', cause)
    this.name = 'DecoderError'
  }
}

export class OcrError extends RecoveryError {
  constructor(message: string, cause?: unknown) {
    super(message, 'OCR_FAILED', cause)
    this.name = 'OcrError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
