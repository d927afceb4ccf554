// ─── Containers ───────────────────────────────────────────────

/** Quarantine container extension, matched case-insensitively. */
export const CONTAINER_EXTENSION = '.nqf'

/** Suffix of the file a decoder leaves behind for each container. */
export const DECODED_OUTPUT_SUFFIX = '_ESET.out'

/** Per-item decoder log, written inside the item's working directory. */
export const DECODER_LOG_NAME = 'decoder.log'

/** Flat OCR transcript written at the output root. */
export const OCR_TEXT_NAME = 'ocr.txt'

// ─── Evidence ─────────────────────────────────────────────────

/** Extensions that make an OCR token look like a quarantined file name. */
export const EVIDENCE_EXTENSIONS = [
  'zip', 'rar', '7z', 'exe', 'msi', 'apk', 'img', 'iso', 'bin', 'gz', 'bz2',
  'xz', 'tar', 'dll', 'scr', 'php', 'jar', 'pdf', 'sis', 'sisx'
] as const

/** Browser cache artifacts show up in quarantine lists but are never user files. */
export const EVIDENCE_EXCLUDE_PATTERN = /cache/i

/** Lines scanned for sizes, counting the line holding the name. */
export const EVIDENCE_LOOKAHEAD = 4

export const UNIT_MULTIPLIERS = {
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3
} as const

export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.bmp', '.tif', '.tiff'] as const

// ─── Matching ─────────────────────────────────────────────────

/** Maximum accepted |blob - candidate| / candidate. */
export const MATCH_TOLERANCE = 0.12

// ─── Commit ───────────────────────────────────────────────────

/** Inserted before the extension, followed by a counter, when a name is taken. */
export const COLLISION_MARKER = '.guess'

export const MISSING_LABEL = '(missing)'
export const DUPLICATE_LABEL = '(possible duplicate)'
