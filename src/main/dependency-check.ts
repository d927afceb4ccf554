/**
 * Probe the external tools a run depends on. Installing them is left to the
 * operator; this only reports what is missing and how to get it.
 */

import { execFile } from 'child_process'
import { promisify } from 'util'

import type { Logger } from '../shared/types'

const execFileAsync = promisify(execFile)

export interface ExternalTool {
  name: string
  command: string
  /** Arguments that make the tool print something and exit 0. */
  probeArgs: string[]
  installHint: string
}

export const TESSERACT_TOOL: ExternalTool = {
  name: 'tesseract',
  command: 'tesseract',
  probeArgs: ['--version'],
  installHint: 'apt-get install tesseract-ocr tesseract-ocr-eng'
}

export function decoderTool(command: string): ExternalTool {
  return {
    name: command,
    command,
    probeArgs: ['--version'],
    installHint:
      command === 'perl'
        ? 'apt-get install perl libcrypt-blowfish-perl libcrypt-des-perl libcrypt-rc4-perl libdigest-md5-file-perl'
        : `install "${command}" and make sure it is on PATH`
  }
}

async function isAvailable(tool: ExternalTool): Promise<boolean> {
  try {
    await execFileAsync(tool.command, tool.probeArgs, { timeout: 10_000 })
    return true
  } catch {
    return false
  }
}

/**
 * @returns The tools that could not be run.
 */
export async function checkDependencies(
  tools: readonly ExternalTool[],
  logger: Logger = console
): Promise<ExternalTool[]> {
  const missing: ExternalTool[] = []
  for (const tool of tools) {
    if (await isAvailable(tool)) {
      logger.log(`[deps] ok: ${tool.name}`)
    } else {
      logger.warn(`[deps] missing: ${tool.name} (${tool.installHint})`)
      missing.push(tool)
    }
  }
  if (tools.length === 0) {
    logger.log('[deps] builtin decoder and text OCR input need no external tools')
  }
  return missing
}
