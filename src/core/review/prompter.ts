/**
 * Interaction channel for the review loop. The terminal implementation lives
 * in the CLI; tests script one in memory.
 */
export interface Prompter {
  /** False when no operator can answer (stdin is not a TTY). */
  readonly interactive: boolean
  /** Ask a question. Resolves to null once input has ended. */
  ask(question: string): Promise<string | null>
  print(line?: string): void
}
