/**
 * CLI output formatting utilities
 */

/**
 * Format rows as an aligned text table.
 *
 * Column widths are the max of header and cell lengths; columns are
 * separated by ` | ` with a separator row under the header.
 *
 * @param keys - Row keys to read, in column order
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => Math.max(max, (row[key] ?? '').length), 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys
      .map((key, i) => {
        const val = row[key] ?? ''
        return val.padEnd(widths[i] ?? val.length)
      })
      .join(' | ')
      .trimEnd()
  )

  return [headerRow.trimEnd(), separator, ...dataRows].join('\n')
}

/** Shorten text to `max` characters, ending in an ellipsis when cut */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text
  return `${text.slice(0, Math.max(0, max - 1))}…`
}
