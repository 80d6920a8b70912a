/**
 * Parsed option values → CLIArgs
 */

import type { CLIArgs } from '../types.js'

type OptionValues = Readonly<Record<string, unknown>>

function str(value: unknown): string | undefined {
  if (typeof value === 'string' && value !== '') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

function bool(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined
}

function num(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

export function toCliArgs(command: readonly string[], opts: OptionValues, rest: readonly unknown[] = []): CLIArgs {
  const args: string[] = [...command]
  for (const value of rest) {
    if (typeof value === 'string') args.push(value)
  }

  return {
    _: args,
    // Global options
    config: str(opts.config),
    inventory: str(opts.inventory),
    plan: str(opts.plan),
    store: str(opts.store),
    target: str(opts.target),
    verbose: bool(opts.verbose),
    quiet: bool(opts.quiet),
    'dry-run': bool(opts['dry-run']),
    json: bool(opts.json),
    // apply
    'fail-fast': bool(opts['fail-fast']),
    parallel: num(opts.parallel),
    timeout: num(opts.timeout),
    'skip-archive': bool(opts['skip-archive']),
    'skip-extract': bool(opts['skip-extract']),
    // inventory
    write: bool(opts.write),
    // extract
    repos: str(opts.repos),
    output: str(opts.output),
    // init
    force: bool(opts.force)
  }
}

/**
 * Split a comma-separated option value
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return []
  return value.split(',').map(item => item.trim()).filter(Boolean)
}
