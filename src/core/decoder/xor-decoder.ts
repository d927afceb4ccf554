import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { DECODED_OUTPUT_SUFFIX } from '../../shared/constants/recovery'
import { errorMessage } from '../../shared/errors'
import type { Decoder, DecodeRun } from './types'

/** Byte offset subtracted before the XOR step. */
const BYTE_OFFSET = 84
const XOR_KEY = 0xa5

/**
 * Reverse the ESET quarantine transform: `((byte - 84) mod 256) XOR 0xA5`.
 */
export function decodeEsetBytes(data: Buffer): Buffer {
  const out = Buffer.alloc(data.length)
  for (let i = 0; i < data.length; i++) {
    out[i] = ((data[i] - BYTE_OFFSET) & 0xff) ^ XOR_KEY
  }
  return out
}

/** Output name for a container, e.g. `ABC.NQF` -> `ABC.NQF.00000000_ESET.out`. */
export function decodedOutputName(containerPath: string): string {
  return `${path.basename(containerPath)}.00000000${DECODED_OUTPUT_SUFFIX}`
}

/**
 * Built-in decoder for ESET `.NQF` containers. Needs no external tooling and
 * writes the same artifact name the DeXRAY script does, so output trees
 * produced by either decoder can be mixed across runs.
 */
export class XorDecoder implements Decoder {
  readonly name = 'builtin'

  isDecodedOutput(fileName: string): boolean {
    return fileName.endsWith(DECODED_OUTPUT_SUFFIX)
  }

  async decode(containerPath: string, workDir: string): Promise<DecodeRun> {
    const outPath = path.join(workDir, decodedOutputName(containerPath))
    try {
      const data = await fs.readFile(containerPath)
      await fs.writeFile(outPath, decodeEsetBytes(data))
      return {
        ok: true,
        log: `decoded ${data.length} bytes -> ${path.basename(outPath)}\n`
      }
    } catch (err) {
      return { ok: false, log: `decode failed: ${errorMessage(err)}\n` }
    }
  }
}
