/**
 * regraft CLI - Colors Utility
 *
 * Green palette (ANSI 256) for help output, plus semantic colors for
 * repositories, paths and operation states.
 *
 * Supports NO_COLOR and FORCE_COLOR
 */

import { colorize, stripAnsi } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'
import type { Classification } from '../../types.js'
import type { OperationStatus } from '../../domain/types.js'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  // Respect FORCE_COLOR
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

/**
 * Palette (ANSI 256):
 * - 35:  Jade      : primary, commands
 * - 42:  Spring    : highlights
 * - 71:  Moss      : secondary, options
 * - 108: Sage      : muted, descriptions
 * - 150: Pale green: subtle, defaults
 */
const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  jade: (s: string) => enabled ? `\x1b[38;5;35m${s}\x1b[39m` : s,
  spring: (s: string) => enabled ? `\x1b[38;5;42m${s}\x1b[39m` : s,
  moss: (s: string) => enabled ? `\x1b[38;5;71m${s}\x1b[39m` : s,
  sage: (s: string) => enabled ? `\x1b[38;5;108m${s}\x1b[39m` : s,
  paleGreen: (s: string) => enabled ? `\x1b[38;5;150m${s}\x1b[39m` : s,

  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,

  // Semantic
  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
  green: (s: string) => enabled ? `\x1b[92m${s}\x1b[39m` : s,
  yellow: (s: string) => enabled ? `\x1b[93m${s}\x1b[39m` : s,
}

/**
 * Help/version formatter for cli-args-parser
 */
export const regraftFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.jade(s)),
  'version': s => ansi.spring(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.jade(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.spring(s),
  'option-type': s => ansi.sage(s),
  'option-default': s => ansi.dim(ansi.paleGreen(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.moss(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.jade(s),
}

export { stripAnsi }

export const cyan = (text: string) => enabled ? colorize(text, 'cyan') : text
export const magenta = (text: string) => enabled ? colorize(text, 'magenta') : text

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.jade(text)),

  repo: (text: string) => ansi.bold(ansi.spring(text)),
  path: (text: string) => cyan(text),
  op: (text: string) => ansi.sage(text),
  ref: (text: string) => magenta(text),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),
  info: (text: string) => ansi.jade(text),

  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  highlight: (text: string) => ansi.bold(ansi.spring(text)),
  muted: (text: string) => ansi.dim(text),
}

export function colorStatus(status: OperationStatus): string {
  switch (status) {
    case 'applied':
      return c.success(status)
    case 'failed':
      return c.error(status)
    case 'pending':
      return c.muted(status)
    default:
      return c.info(status)
  }
}

export function colorClassification(classification: Classification): string {
  switch (classification) {
    case 'CORE':
      return c.highlight(classification)
    case 'ACTIVE':
      return c.success(classification)
    case 'CONSOLIDATE':
      return c.info(classification)
    case 'ARCHIVE':
      return c.warning(classification)
    case 'DEPRECATE':
      return c.error(classification)
  }
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  info: enabled ? ansi.jade('ℹ') : '[INFO]',
  bullet: enabled ? ansi.sage('•') : '*',
  arrow: enabled ? ansi.jade('→') : '->',
  skip: enabled ? ansi.gray('○') : '[SKIP]',
}

// Print utilities (stderr; stdout carries data only)
export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
  info: (msg: string) => console.error(`${symbols.info} ${c.info(msg)}`),
  item: (text: string) => console.error(`  ${symbols.bullet} ${text}`),
}
