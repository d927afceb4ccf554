const KB = 1024
const MB = KB * 1024
const GB = MB * 1024

/**
 * Format a byte count the way file managers list it: one decimal for KB and
 * up, binary multiples.
 *
 * Example: `48640` -> `47.5 KB`
 */
export function formatBytes(bytes: number): string {
  if (bytes >= GB) return `${(bytes / GB).toFixed(1)} GB`
  if (bytes >= MB) return `${(bytes / MB).toFixed(1)} MB`
  if (bytes >= KB) return `${(bytes / KB).toFixed(1)} KB`
  return `${bytes} B`
}
