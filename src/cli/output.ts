/**
 * CLI output helpers.
 *
 * All output uses process.stdout/stderr.write for testability.
 * No colors, no emojis -- clean text output only.
 */
export const output = {
  /** Write an informational message to stdout. */
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Write a success message to stdout, prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Write a warning message to stderr, prefixed with "Warning:". */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },

  /** Write a worker trace line to stderr, prefixed with "debug:". */
  debug(message: string): void {
    process.stderr.write('debug: ' + message + '\n')
  },

  /**
   * Write rows as an aligned table to stdout. Columns are the union of every
   * row's keys, in first-seen order.
   */
  table(rows: Record<string, string>[]): void {
    if (rows.length === 0) return
    const columns: string[] = []
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!columns.includes(key)) columns.push(key)
      }
    }
    const widths = columns.map((c) => Math.max(c.length, ...rows.map((row) => (row[c] ?? '').length)))
    const line = (cells: string[]): string => cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd()

    process.stdout.write(line(columns) + '\n')
    process.stdout.write(widths.map((w) => '-'.repeat(w)).join('  ') + '\n')
    for (const row of rows) {
      process.stdout.write(line(columns.map((c) => row[c] ?? '')) + '\n')
    }
  },
}
