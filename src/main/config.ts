/**
 * Command-line options, parsed with node:util and validated with zod into a
 * typed {@link RunOptions}.
 */

import * as path from 'node:path'
import { parseArgs } from 'node:util'
import { z } from 'zod'

import { UsageError, errorMessage } from '../shared/errors'

export const USAGE = [
  'Usage: nqf-recover --quarantine <dir> --output <dir> [options]',
  '',
  'Options:',
  '  -q, --quarantine <dir>      folder holding the .NQF containers (searched recursively)',
  '  -o, --output <dir>          output root; one sub-folder per container hash',
  '      --ocr <file|dir>        OCR transcript, or a folder of screenshots to run tesseract on',
  '      --decoder <kind>        builtin (default) or command',
  '      --decoder-command <cmd> external decoder, e.g. "perl /opt/DeXRAY.pl {container}"',
  '      --decoder-timeout <s>   kill the external decoder after this many seconds (0: no limit)',
  '      --min-size <bytes>      ignore recovered blobs smaller than this when naming',
  '      --install-deps          check that the external tools this run needs are installed',
  '  -h, --help                  show this help'
].join('\n')

export const RunOptionsSchema = z
  .object({
    quarantine: z.string({ required_error: '--quarantine is required' }).min(1),
    output: z.string({ required_error: '--output is required' }).min(1),
    ocr: z.string().min(1).optional(),
    decoder: z.enum(['builtin', 'command']).optional(),
    decoderCommand: z.string().min(1).optional(),
    decoderTimeout: z
      .string()
      .regex(/^\d+$/, '--decoder-timeout must be a whole number of seconds')
      .transform(Number)
      .optional(),
    minSize: z
      .string()
      .regex(/^\d+$/, '--min-size must be a whole number of bytes')
      .transform(Number)
      .optional(),
    installDeps: z.boolean().optional()
  })
  .refine((o) => o.decoder !== 'command' || o.decoderCommand !== undefined, {
    message: '--decoder command needs --decoder-command',
    path: ['decoderCommand']
  })

export type DecoderKind = 'builtin' | 'command'

export interface RunOptions {
  quarantineDir: string
  outputDir: string
  ocrPath?: string
  decoder: DecoderKind
  decoderCommand?: string
  /** Seconds; 0 means no limit. */
  decoderTimeout: number
  minSize: number
  installDeps: boolean
}

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: RunOptions }

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      quarantine: { type: 'string', short: 'q' },
      output: { type: 'string', short: 'o' },
      ocr: { type: 'string' },
      decoder: { type: 'string' },
      'decoder-command': { type: 'string' },
      'decoder-timeout': { type: 'string' },
      'min-size': { type: 'string' },
      'install-deps': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    }
  }).values
}

/**
 * Parse `argv` (without the node and script entries).
 *
 * @throws {UsageError} On unknown options, missing required paths, or bad values.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let values: ReturnType<typeof readArgs>
  try {
    values = readArgs(argv)
  } catch (err) {
    throw new UsageError(errorMessage(err))
  }

  if (values.help === true) return { kind: 'help' }

  const parsed = RunOptionsSchema.safeParse({
    quarantine: values.quarantine,
    output: values.output,
    ocr: values.ocr,
    decoder: values.decoder,
    decoderCommand: values['decoder-command'],
    decoderTimeout: values['decoder-timeout'],
    minSize: values['min-size'],
    installDeps: values['install-deps']
  })
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues[0]?.message ?? 'Invalid arguments')
  }

  const o = parsed.data
  return {
    kind: 'run',
    options: {
      quarantineDir: path.resolve(o.quarantine),
      outputDir: path.resolve(o.output),
      ocrPath: o.ocr !== undefined ? path.resolve(o.ocr) : undefined,
      decoder: o.decoder ?? (o.decoderCommand !== undefined ? 'command' : 'builtin'),
      decoderCommand: o.decoderCommand,
      decoderTimeout: o.decoderTimeout ?? 0,
      minSize: o.minSize ?? 0,
      installDeps: o.installDeps ?? false
    }
  }
}
