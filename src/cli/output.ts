/**
 * Consistent CLI output helpers.
 *
 * Everything goes through process.stdout/stderr.write so tests can spy on
 * it. Plain text only. Diagnostics from the bridge itself go to the pino
 * logger on stderr, not through here.
 */
export const output = {
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Prefixed with "Error:", to stderr. */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Prefixed with "Warning:", to stderr. */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },

  /** One indented line per item. */
  list(items: string[]): void {
    for (const item of items) {
      process.stdout.write('  ' + item + '\n')
    }
  },

  /** Column-aligned rows under a dashed header. Nothing is written for zero rows. */
  table(columns: string[], rows: string[][]): void {
    if (rows.length === 0) return
    const widths = columns.map((column, i) =>
      Math.max(column.length, ...rows.map((row) => (row[i] ?? '').length)),
    )
    const line = (cells: string[]): string =>
      widths.map((width, i) => (cells[i] ?? '').padEnd(width)).join('  ').trimEnd()

    process.stdout.write(line(columns) + '\n')
    process.stdout.write(widths.map((width) => '-'.repeat(width)).join('  ') + '\n')
    for (const row of rows) {
      process.stdout.write(line(row) + '\n')
    }
  },
}
