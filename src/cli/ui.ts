/**
 * CLI UI utilities - TTY-aware output
 *
 * - stdout carries data only (plans, reports, JSON) through output()
 * - Everything else goes to stderr, filtered by --quiet and --verbose
 */

import { Table, renderToString } from 'tuiuiu.js'
import { c, stripAnsi, symbols } from './lib/colors.js'

export const isTTY = process.stdout.isTTY ?? false

interface UiState {
  verbose: boolean
  quiet: boolean
}

const state: UiState = { verbose: false, quiet: false }

export function configureUi(options: Partial<UiState>): void {
  if (options.verbose !== undefined) state.verbose = options.verbose
  if (options.quiet !== undefined) state.quiet = options.quiet
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

export function outputJson(data: unknown): void {
  output(JSON.stringify(data, null, 2))
}

/**
 * Progress message to stderr (suppressed by --quiet)
 */
export function log(message: string): void {
  if (!state.quiet) {
    console.error(message)
  }
}

/**
 * Diagnostic message, only with --verbose
 */
export function verbose(message: string): void {
  if (state.verbose && !state.quiet) {
    console.error(c.muted(`[netstate] ${message}`))
  }
}

/**
 * Error to stderr (always shown)
 */
export function error(message: string): void {
  console.error(`${symbols.error} ${c.error(message)}`)
}

export function success(message: string): void {
  if (!state.quiet) {
    console.error(`${symbols.success} ${c.success(message)}`)
  }
}

/**
 * Warning to stderr (always shown)
 */
export function warn(message: string): void {
  console.error(`${symbols.warning} ${c.warning(message)}`)
}

/**
 * Format data as a table using tuiuiu.js
 */
export function formatTable(
  columns: Array<{ key: string; header: string; align?: 'left' | 'center' | 'right' }>,
  data: Array<Record<string, string>>
): string {
  if (!isTTY) {
    // Tab-separated for pipes
    const headers = columns.map(col => col.header).join('\t')
    const rows = data.map(row => columns.map(col => stripAnsi(row[col.key] ?? '')).join('\t'))
    return [headers, ...rows].join('\n')
  }

  const table = Table({
    columns: columns.map(col => ({
      key: col.key,
      header: col.header,
      align: col.align ?? 'left'
    })),
    data,
    borderStyle: 'round',
    showHeader: true
  })

  return renderToString(table)
}

/**
 * Format simple rows as a table (shorthand)
 */
export function formatSimpleTable(headers: string[], rows: string[][]): string {
  const columns = headers.map((h, i) => ({ key: `col${i}`, header: h }))
  const data = rows.map(row => {
    const obj: Record<string, string> = {}
    row.forEach((cell, i) => { obj[`col${i}`] = cell })
    return obj
  })

  return formatTable(columns, data)
}

/**
 * Format key-value pairs
 */
export function formatKeyValue(pairs: Array<[string, string]>): string {
  if (!isTTY) {
    return pairs.map(([k, v]) => `${k}=${stripAnsi(v)}`).join('\n')
  }

  const maxKeyLen = Math.max(...pairs.map(([k]) => k.length))
  return pairs
    .map(([k, v]) => `${c.label(k.padEnd(maxKeyLen))}  ${v}`)
    .join('\n')
}

/**
 * Print a styled header (suppressed by --quiet)
 */
export function header(text: string): void {
  if (!state.quiet) {
    console.error(`\n${c.header(text)}\n${c.muted('─'.repeat(text.length))}`)
  }
}
