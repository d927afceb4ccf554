import { UNIT_MULTIPLIERS } from '../../shared/constants/recovery'

/**
 * `<number><K|M|G>` with an optional unit tail. OCR regularly misreads the
 * `B` of `KB` as `8`, `T` or `E`, so those tails are accepted too.
 */
const UNIT_SIZE_RE = /(\d+(?:\.\d+)?)\s*([KMG])(?:iB|[B8TE])?\b/gi

/** Plain byte counts such as `1250000B` or `54 B`. */
const BYTE_SIZE_RE = /(?<![\d.])(\d+)\s*B\b/gi

type Unit = keyof typeof UNIT_MULTIPLIERS

function isUnit(value: string): value is Unit {
  return value in UNIT_MULTIPLIERS
}

/**
 * Extract every size token on a line, converted to bytes with binary
 * multipliers, in the order they appear. Decimal commas are read as points.
 *
 * Example: `'47,5 kB  1250000B'` -> `[48640, 1250000]`
 */
export function parseSizeTokens(line: string): number[] {
  const normalized = line.replace(/,/g, '.')
  const found: Array<{ index: number; bytes: number }> = []

  for (const match of normalized.matchAll(UNIT_SIZE_RE)) {
    const unit = match[2].toUpperCase()
    const value = Number.parseFloat(match[1])
    if (!isUnit(unit) || !Number.isFinite(value)) continue
    found.push({ index: match.index ?? 0, bytes: Math.floor(value * UNIT_MULTIPLIERS[unit]) })
  }

  for (const match of normalized.matchAll(BYTE_SIZE_RE)) {
    found.push({ index: match.index ?? 0, bytes: Number.parseInt(match[1], 10) })
  }

  return found.sort((a, b) => a.index - b.index).map((f) => f.bytes)
}
