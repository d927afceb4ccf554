/**
 * Decoder contract.
 *
 * A decoder turns one quarantine container into zero or more recovered
 * blobs inside a working directory. Decoders are treated as unreliable black
 * boxes: a bad container is reported through {@link DecodeRun.ok} and the
 * captured log, and the orchestrator moves on to the next item.
 */

/** Outcome of a single decoder invocation. */
export interface DecodeRun {
  ok: boolean
  /** Everything the decoder printed, stdout followed by stderr. */
  log: string
  /** Process exit code for external decoders; null when killed by a signal. */
  exitCode?: number | null
}

/** Interface that all decoders must implement. */
export interface Decoder {
  /** Human-readable name of this decoder (for logging). */
  readonly name: string

  /**
   * Whether `fileName` is an artifact this decoder writes. Used to detect
   * items that were already decoded by an earlier run.
   */
  isDecodedOutput(fileName: string): boolean

  /**
   * Decode `containerPath`, writing outputs into `workDir`.
   *
   * @param containerPath - The container copy inside `workDir`.
   * @param workDir - Per-item working directory, also the process cwd for external decoders.
   */
  decode(containerPath: string, workDir: string): Promise<DecodeRun>
}
