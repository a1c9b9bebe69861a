/**
 * netstate CLI - Colors Utility
 *
 * Terminal colors using tuiuiu.js text-utils + ANSI 256 for the blue palette.
 * Supports NO_COLOR and FORCE_COLOR.
 */

import {
  colorize,
  style,
  styles as tuiStyles,
  stripAnsi
} from 'tuiuiu.js'

const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

const color = (text: string, col: string): string => {
  if (!enabled) return text
  return colorize(text, col)
}

const styled = (text: string, ...styleNames: (keyof typeof tuiStyles)[]): string => {
  if (!enabled) return text
  return style(text, ...styleNames)
}

/**
 * Palette (ANSI 256):
 * - 39:  Neon blue  : commands
 * - 45:  Bright cyan: highlights
 * - 75:  Steel blue : sites, bullets
 * - 245: Gray       : labels
 */
const ansi256 = (code: number) => (s: string): string =>
  enabled ? `\x1b[38;5;${code}m${s}\x1b[39m` : s

const ansi = {
  bold: (s: string) => styled(s, 'bold'),
  dim: (s: string) => styled(s, 'dim'),

  neonBlue: ansi256(39),
  brightCyan: ansi256(45),
  steelBlue: ansi256(75),
  gray: ansi256(245),

  white: (s: string) => color(s, 'whiteBright'),
  red: (s: string) => color(s, 'redBright'),
  green: (s: string) => color(s, 'greenBright'),
  yellow: (s: string) => color(s, 'yellowBright')
}

export { stripAnsi }

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.neonBlue(text)),

  site: (text: string) => ansi.steelBlue(text),

  // Status
  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),

  // Diff
  added: (text: string) => ansi.green(text),
  removed: (text: string) => ansi.red(text),
  modified: (text: string) => ansi.yellow(text),

  // Structure
  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  highlight: (text: string) => ansi.bold(ansi.brightCyan(text)),
  muted: (text: string) => ansi.dim(text)
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  bullet: enabled ? ansi.steelBlue('•') : '*'
}

/**
 * Color a rendered plan line by its leading marker (+ ~ - !)
 */
export function colorPlanLine(line: string): string {
  const marker = line.trimStart().charAt(0)
  switch (marker) {
    case '+': return c.added(line)
    case '~': return c.modified(line)
    case '-': return c.removed(line)
    case '!': return c.warning(line)
    default: return line
  }
}
