/**
 * TerminalPrompter - binds the review loop to a readline interface on the
 * process's stdin/stdout.
 */

import { createInterface, type Interface } from 'readline'

import type { Prompter } from '../core/review/prompter'

export class TerminalPrompter implements Prompter {
  readonly interactive: boolean
  private rl: Interface | null = null
  private closed = false
  /** Resolver of the question in flight, so end of input can settle it. */
  private pending: ((answer: string | null) => void) | null = null

  constructor(
    private readonly input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.interactive = input.isTTY === true
  }

  ask(question: string): Promise<string | null> {
    if (this.closed) return Promise.resolve(null)
    const rl = this.open()

    return new Promise((resolve) => {
      this.pending = resolve
      rl.question(question, (answer) => {
        this.pending = null
        resolve(answer)
      })
    })
  }

  print(line = ''): void {
    this.output.write(`${line}\n`)
  }

  close(): void {
    this.rl?.close()
  }

  // ── Private ─────────────────────────────────────────────

  private open(): Interface {
    if (this.rl) return this.rl

    const rl = createInterface({ input: this.input, output: this.output })
    rl.on('close', () => {
      this.closed = true
      this.pending?.(null)
      this.pending = null
    })
    this.rl = rl
    return rl
  }
}
