import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import sharp from 'sharp'

import { OcrError } from '../../shared/errors'
import { captureLogger, makeTempDir } from '../../test/helpers'
import { TesseractOcrSource, TextFileOcrSource, preprocessScreenshot } from './ocr-source'

async function writeScreenshot(filePath: string): Promise<void> {
  await sharp({ create: { width: 40, height: 20, channels: 3, background: { r: 200, g: 30, b: 30 } } })
    .png()
    .toFile(filePath)
}

/** Stand-in for tesseract: keeps its stdin and argv beside itself and prints a fixed line. */
async function writeFakeTesseract(dir: string): Promise<string> {
  const command = path.join(dir, 'fake-tesseract')
  await fs.writeFile(
    command,
    ['#!/bin/sh', 'cat > "$0.input"', 'echo "$@" > "$0.args"', 'echo "photos.rar 4.9 KB"', ''].join('\n'),
    { mode: 0o755 }
  )
  return command
}

describe('TextFileOcrSource', () => {
  it('returns the transcript as-is', async () => {
    const dir = await makeTempDir()
    const file = path.join(dir, 'ocr.txt')
    await fs.writeFile(file, 'invoice_final.zip 1.2 MB\n')

    expect(await new TextFileOcrSource(file).readText()).toBe('invoice_final.zip 1.2 MB\n')
  })

  it('wraps a read failure in OcrError', async () => {
    const dir = await makeTempDir()
    await expect(new TextFileOcrSource(path.join(dir, 'missing.txt')).readText()).rejects.toThrow(OcrError)
  })
})

describe('preprocessScreenshot', () => {
  it('upscales the screenshot twice and encodes it as PNG', async () => {
    const dir = await makeTempDir()
    const file = path.join(dir, 'shot.png')
    await writeScreenshot(file)

    const meta = await sharp(await preprocessScreenshot(file)).metadata()

    expect(meta.format).toBe('png')
    expect(meta.width).toBe(80)
    expect(meta.height).toBe(40)
  })
})

describe('TesseractOcrSource', () => {
  it('pipes the cleaned-up screenshot to the engine', async () => {
    const images = await makeTempDir()
    const tools = await makeTempDir()
    await writeScreenshot(path.join(images, 'shot1.png'))
    const command = await writeFakeTesseract(tools)
    const { logger, lines } = captureLogger()

    const text = await new TesseractOcrSource(images, { command, logger }).readText()

    expect(text).toBe('photos.rar 4.9 KB\n')
    expect(lines).toEqual([`[ocr] parsed: ${path.join(images, 'shot1.png')}`])
    expect(await fs.readFile(`${command}.args`, 'utf8')).toBe(
      'stdin stdout -l eng --oem 1 --psm 6 -c preserve_interword_spaces=1\n'
    )
    const piped = await sharp(await fs.readFile(`${command}.input`)).metadata()
    expect(piped.width).toBe(80)
    expect(piped.height).toBe(40)
  })

  it('skips images the engine cannot read', async () => {
    const dir = await makeTempDir()
    await fs.writeFile(path.join(dir, 'shot1.png'), 'not really a png')
    const { logger, lines } = captureLogger()

    const source = new TesseractOcrSource(dir, { command: '/nonexistent/tesseract', logger })

    expect(await source.readText()).toBe('')
    expect(lines).toHaveLength(1)
    expect(lines[0].startsWith(`[ocr] failed: ${path.join(dir, 'shot1.png')}: `)).toBe(true)
  })

  it('only looks at image files', async () => {
    const dir = await makeTempDir()
    await fs.writeFile(path.join(dir, 'notes.txt'), 'x')
    const { logger, lines } = captureLogger()

    expect(await new TesseractOcrSource(dir, { command: '/nonexistent/tesseract', logger }).readText()).toBe('')
    expect(lines).toEqual([])
  })

  it('rejects an unreadable directory', async () => {
    const dir = await makeTempDir()
    await expect(new TesseractOcrSource(path.join(dir, 'nope')).readText()).rejects.toThrow(OcrError)
  })
})
