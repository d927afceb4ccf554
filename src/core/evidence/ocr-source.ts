/**
 * OCR sources - where the raw text of quarantine-list screenshots comes from.
 *
 * The OCR engine itself is an external collaborator. `TesseractOcrSource`
 * cleans up each screenshot with sharp and pipes it to the `tesseract` CLI;
 * `TextFileOcrSource` reads a transcript someone already produced (by hand
 * or with another engine).
 */

import { execFile } from 'child_process'
import * as fs from 'fs'
import * as path from 'path'
import sharp from 'sharp'
import { promisify } from 'util'

import { IMAGE_EXTENSIONS } from '../../shared/constants/recovery'
import { OcrError, errorMessage } from '../../shared/errors'
import type { Logger } from '../../shared/types'

const fsReadFile = promisify(fs.readFile)
const fsReaddir = promisify(fs.readdir)

export interface OcrSource {
  readonly name: string
  /** Concatenated text of every input. */
  readText(): Promise<string>
}

// ─── Pre-rendered text ────────────────────────────────────────

export class TextFileOcrSource implements OcrSource {
  readonly name = 'text'

  constructor(private readonly filePath: string) {}

  async readText(): Promise<string> {
    try {
      return await fsReadFile(this.filePath, 'utf8')
    } catch (err) {
      throw new OcrError(`Cannot read OCR text "${this.filePath}": ${errorMessage(err)}`, err)
    }
  }
}

// ─── Tesseract ────────────────────────────────────────────────

export interface TesseractOptions {
  /** Tesseract executable. Default: `tesseract` on PATH. */
  command?: string
  language?: string
  logger?: Logger
}

/** Upscale factor applied before OCR. */
const UPSCALE = 2

/**
 * Greyscale, upscale, sharpen and stretch the contrast of a screenshot,
 * returned as PNG.
 */
export async function preprocessScreenshot(imagePath: string): Promise<Buffer> {
  const image = sharp(imagePath, { failOn: 'none' })
  const { width } = await image.metadata()
  if (width === undefined) {
    throw new OcrError(`Cannot read image size of "${imagePath}"`)
  }
  return image
    .greyscale()
    .resize({ width: width * UPSCALE })
    .sharpen()
    .normalise()
    .png()
    .toBuffer()
}

/** Run `command` with `input` on its stdin and resolve to its stdout. */
function execWithInput(command: string, args: string[], input: Buffer): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = execFile(command, args, { maxBuffer: 16 * 1024 * 1024 }, (err, stdout) => {
      if (err) reject(err)
      else resolve(stdout)
    })
    // A child that never started closes its stdin under us
    child.stdin?.on('error', reject)
    child.stdin?.end(input)
  })
}

function isImage(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase()
  return IMAGE_EXTENSIONS.some((known) => known === ext)
}

export class TesseractOcrSource implements OcrSource {
  readonly name = 'tesseract'
  readonly command: string
  private readonly language: string
  private readonly logger: Logger

  constructor(
    private readonly imageDir: string,
    options: TesseractOptions = {}
  ) {
    this.command = options.command ?? 'tesseract'
    this.language = options.language ?? 'eng'
    this.logger = options.logger ?? console
  }

  /**
   * Run OCR over every image in the directory, sorted by name. An image
   * that fails to OCR is logged and left out.
   *
   * @throws {OcrError} If the directory cannot be listed.
   */
  async readText(): Promise<string> {
    let names: string[]
    try {
      names = await fsReaddir(this.imageDir)
    } catch (err) {
      throw new OcrError(`Cannot list screenshots in "${this.imageDir}": ${errorMessage(err)}`, err)
    }

    const chunks: string[] = []
    for (const name of names.filter(isImage).sort()) {
      const imagePath = path.join(this.imageDir, name)
      try {
        chunks.push(await this.recognize(imagePath))
        this.logger.log(`[ocr] parsed: ${imagePath}`)
      } catch (err) {
        this.logger.warn(`[ocr] failed: ${imagePath}: ${errorMessage(err)}`)
      }
    }
    return chunks.join('\n')
  }

  private async recognize(imagePath: string): Promise<string> {
    const image = await preprocessScreenshot(imagePath)
    return execWithInput(
      this.command,
      [
        'stdin',
        'stdout',
        '-l',
        this.language,
        '--oem',
        '1',
        '--psm',
        '6',
        '-c',
        'preserve_interword_spaces=1'
      ],
      image
    )
  }
}
