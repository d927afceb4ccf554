import * as fs from 'node:fs/promises'

import { CommandDecoder } from '../core/decoder/command-decoder'
import type { Decoder } from '../core/decoder/types'
import { XorDecoder } from '../core/decoder/xor-decoder'
import { TesseractOcrSource, TextFileOcrSource, type OcrSource } from '../core/evidence/ocr-source'
import { UsageError, errorMessage } from '../shared/errors'
import type { Logger } from '../shared/types'
import { USAGE, parseCliArgs, type RunOptions } from './config'
import { TESSERACT_TOOL, checkDependencies, decoderTool, type ExternalTool } from './dependency-check'
import { runPipeline } from './pipeline'
import { TerminalPrompter } from './terminal-prompter'

// ─── Wiring ─────────────────────────────────────────────────

export function createDecoder(options: RunOptions): Decoder {
  if (options.decoder === 'command' && options.decoderCommand !== undefined) {
    return new CommandDecoder(options.decoderCommand, { timeoutMs: options.decoderTimeout * 1000 })
  }
  return new XorDecoder()
}

/**
 * A directory is a screenshot folder for tesseract; a file is a transcript.
 *
 * @throws {UsageError} If the path does not exist.
 */
export async function createOcrSource(ocrPath: string, logger: Logger): Promise<OcrSource> {
  let isDir: boolean
  try {
    isDir = (await fs.stat(ocrPath)).isDirectory()
  } catch {
    throw new UsageError(`OCR input not found: ${ocrPath}`)
  }
  if (isDir) {
    logger.log(`[ocr] scanning images in ${ocrPath}`)
    return new TesseractOcrSource(ocrPath, { logger })
  }
  return new TextFileOcrSource(ocrPath)
}

function requiredTools(decoder: Decoder, ocr: OcrSource | undefined): ExternalTool[] {
  const tools: ExternalTool[] = []
  if (decoder instanceof CommandDecoder) tools.push(decoderTool(decoder.executable))
  if (ocr instanceof TesseractOcrSource) tools.push({ ...TESSERACT_TOOL, command: ocr.command })
  return tools
}

// ─── Run ────────────────────────────────────────────────────

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2), logger: Logger = console): Promise<number> {
  let prompter: TerminalPrompter | null = null

  try {
    const command = parseCliArgs(argv)
    if (command.kind === 'help') {
      logger.log(USAGE)
      return 0
    }

    const { options } = command
    const decoder = createDecoder(options)
    const ocr = options.ocrPath !== undefined ? await createOcrSource(options.ocrPath, logger) : undefined

    if (options.installDeps) {
      const missing = await checkDependencies(requiredTools(decoder, ocr), logger)
      if (missing.length > 0) {
        throw new UsageError(`Missing external tools: ${missing.map((t) => t.name).join(', ')}`)
      }
    }

    prompter = new TerminalPrompter()
    await runPipeline(
      { quarantineDir: options.quarantineDir, outputDir: options.outputDir, minSize: options.minSize },
      { decoder, ocr, prompter, logger }
    )
    return 0
  } catch (err) {
    logger.error(`[!] ${errorMessage(err)}`)
    if (err instanceof UsageError) logger.error(USAGE.split('\n')[0])
    return 1
  } finally {
    prompter?.close()
  }
}
