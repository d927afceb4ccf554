import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { makeTempDir } from '../../test/helpers'
import { FileWriter, FileWriterError, candidatePath } from './file-writer'

describe('candidatePath', () => {
  it('puts the marker and counter before the extension', () => {
    expect(candidatePath('/d/report.pdf', 0)).toBe('/d/report.pdf')
    expect(candidatePath('/d/report.pdf', 2)).toBe('/d/report.guess2.pdf')
    expect(candidatePath('/d/archive.tar.gz', 1)).toBe('/d/archive.tar.guess1.gz')
    expect(candidatePath('/d/blob', 1)).toBe('/d/blob.guess1')
  })
})

describe('FileWriter', () => {
  it('copies to the requested name when it is free', async () => {
    const dir = await makeTempDir()
    const source = path.join(dir, 'blob.out')
    await fs.writeFile(source, 'payload')

    const result = await new FileWriter().copy(source, path.join(dir, 'report.pdf'))

    expect(result).toEqual({ finalPath: path.join(dir, 'report.pdf'), bytesWritten: 7, renamed: false })
    expect(await fs.readFile(source, 'utf8')).toBe('payload')
  })

  it('never overwrites an existing file', async () => {
    const dir = await makeTempDir()
    const source = path.join(dir, 'blob.out')
    await fs.writeFile(source, 'payload')
    await fs.writeFile(path.join(dir, 'report.pdf'), 'user data')
    const writer = new FileWriter()

    const first = await writer.copy(source, path.join(dir, 'report.pdf'))
    const second = await writer.copy(source, path.join(dir, 'report.pdf'))

    expect(first.finalPath).toBe(path.join(dir, 'report.guess1.pdf'))
    expect(first.renamed).toBe(true)
    expect(second.finalPath).toBe(path.join(dir, 'report.guess2.pdf'))
    expect(await fs.readFile(path.join(dir, 'report.pdf'), 'utf8')).toBe('user data')
  })

  it('carries over the modification time', async () => {
    const dir = await makeTempDir()
    const source = path.join(dir, 'blob.out')
    await fs.writeFile(source, 'payload')
    const when = new Date('2020-01-02T03:04:05Z')
    await fs.utimes(source, when, when)

    const { finalPath } = await new FileWriter().copy(source, path.join(dir, 'a.zip'))

    expect((await fs.stat(finalPath)).mtime.getTime()).toBe(when.getTime())
  })

  it('wraps copy failures', async () => {
    const dir = await makeTempDir()
    const copy = new FileWriter().copy(path.join(dir, 'missing.out'), path.join(dir, 'a.zip'))

    await expect(copy).rejects.toBeInstanceOf(FileWriterError)
    await expect(copy).rejects.toMatchObject({ code: 'COPY_FAILED' })
  })
})
