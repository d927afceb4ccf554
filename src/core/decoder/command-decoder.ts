/**
 * CommandDecoder - runs an external decoder program once per container.
 *
 * The command is given as a template such as `perl /opt/DeXRAY.pl {container}`.
 * It runs with the item's working directory as cwd and `{container}`
 * replaced by the container's file name, so whatever the tool writes lands
 * next to the container copy. Output is captured for the per-item log; a
 * non-zero exit, a signal, or a missing executable is a failed run, never a
 * thrown error.
 */

import { execFile } from 'child_process'
import * as path from 'path'
import { promisify } from 'util'

import { DECODED_OUTPUT_SUFFIX } from '../../shared/constants/recovery'
import { DecoderError, errorMessage } from '../../shared/errors'
import type { Decoder, DecodeRun } from './types'

const execFileAsync = promisify(execFile)

export const CONTAINER_PLACEHOLDER = '{container}'

/** Decoders can be chatty on large containers. */
const MAX_OUTPUT_BUFFER = 64 * 1024 * 1024

export interface CommandDecoderOptions {
  /** Kill the decoder after this many milliseconds. 0 disables the limit. */
  timeoutMs?: number
}

/**
 * Split a command template into argv, honouring double quotes.
 * A template without `{container}` gets the container appended.
 *
 * @throws {DecoderError} If the template is empty.
 */
export function parseCommandTemplate(template: string): string[] {
  const argv: string[] = []
  for (const match of template.matchAll(/"([^"]*)"|(\S+)/g)) {
    argv.push(match[1] ?? match[2])
  }
  if (argv.length === 0) {
    throw new DecoderError('Decoder command is empty')
  }
  if (!argv.some((arg) => arg.includes(CONTAINER_PLACEHOLDER))) {
    argv.push(CONTAINER_PLACEHOLDER)
  }
  return argv
}

/**
 * Collect stdout and stderr from an execFile rejection. Node attaches both
 * streams to the error object when the child ran at all.
 */
function capturedOutput(err: unknown): { log: string; exitCode: number | null } {
  const parts: string[] = []
  let exitCode: number | null = null

  if (typeof err === 'object' && err !== null) {
    if ('stdout' in err && typeof err.stdout === 'string') parts.push(err.stdout)
    if ('stderr' in err && typeof err.stderr === 'string') parts.push(err.stderr)
    if ('code' in err && typeof err.code === 'number') exitCode = err.code
  }
  parts.push(`[decoder] ${errorMessage(err)}\n`)

  return { log: parts.join(''), exitCode }
}

export class CommandDecoder implements Decoder {
  readonly name: string
  private readonly argv: string[]
  private readonly timeoutMs: number

  constructor(template: string, options: CommandDecoderOptions = {}) {
    this.argv = parseCommandTemplate(template)
    this.name = path.basename(this.argv[0])
    this.timeoutMs = options.timeoutMs ?? 0
  }

  /** The executable the template runs, for dependency checks. */
  get executable(): string {
    return this.argv[0]
  }

  isDecodedOutput(fileName: string): boolean {
    return fileName.endsWith(DECODED_OUTPUT_SUFFIX)
  }

  async decode(containerPath: string, workDir: string): Promise<DecodeRun> {
    const containerName = path.basename(containerPath)
    const [file, ...args] = this.argv.map((arg) =>
      arg.split(CONTAINER_PLACEHOLDER).join(containerName)
    )

    try {
      const { stdout, stderr } = await execFileAsync(file, args, {
        cwd: workDir,
        timeout: this.timeoutMs,
        maxBuffer: MAX_OUTPUT_BUFFER
      })
      return { ok: true, log: stdout + stderr, exitCode: 0 }
    } catch (err) {
      const { log, exitCode } = capturedOutput(err)
      return { ok: false, log, exitCode }
    }
  }
}
