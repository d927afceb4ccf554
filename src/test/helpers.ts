import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'

import type { Prompter } from '../core/review/prompter'
import type { Logger } from '../shared/types'

/** Fresh directory under the OS temp dir. */
export function makeTempDir(prefix = 'nqf-recover-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

/** Logger that records every line instead of printing it. */
export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = []
  const record = (...args: unknown[]): void => {
    lines.push(args.map(String).join(' '))
  }
  return { logger: { log: record, warn: record, error: record }, lines }
}

/** Prompter that answers from a script and ends input when it runs out. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = []
  readonly printed: string[] = []
  private readonly answers: string[]

  constructor(answers: string[], readonly interactive = true) {
    this.answers = [...answers]
  }

  async ask(question: string): Promise<string | null> {
    this.questions.push(question)
    return this.answers.shift() ?? null
  }

  print(line = ''): void {
    this.printed.push(line)
  }
}

/** Inverse of the quarantine transform, for building container fixtures. */
export function encodeEsetBytes(plain: Buffer): Buffer {
  const out = Buffer.alloc(plain.length)
  for (let i = 0; i < plain.length; i++) {
    out[i] = ((plain[i] ^ 0xa5) + 84) & 0xff
  }
  return out
}
