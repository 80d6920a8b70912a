#!/usr/bin/env node
/**
 * regraft CLI
 *
 * Consolidates many repositories into fewer, keeping their history
 */

import { createCLI, type CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { RegraftConfig } from '../types.js'
import { CONFIG_FILE, findConfigDir, loadConfig, loadConfigFromPath } from '../lib/config-loader.js'
import { formatErrorForCli, isRegraftError } from '../lib/errors.js'
import { toCliArgs } from './args.js'
import { buildContext } from './context.js'
import type { CommandContext } from './context.js'
import { c, print, regraftFormatter } from './lib/colors.js'
import * as ui from './ui.js'

// CLI commands
import { runInit } from './commands/init.js'
import { runInventory } from './commands/inventory.js'
import { runPlan } from './commands/plan.js'
import { runApply } from './commands/apply.js'
import { runExtract } from './commands/extract.js'

// Version is injected by the environment or read from package.json
const VERSION = process.env.REGRAFT_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from this module to the nearest package.json
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

/**
 * CLI Schema definition
 */
const cliSchema: CLISchema = {
  name: 'regraft',
  version: VERSION,
  description: 'Consolidate repositories into fewer, keeping their history',
  autoShort: false,
  strict: true,
  formatter: regraftFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    config: {
      short: 'c',
      type: 'string',
      description: 'Config file (default: nearest .regraft/config.yaml)'
    },
    inventory: {
      short: 'i',
      type: 'string',
      description: 'Inventory snapshot (JSON or YAML)'
    },
    plan: {
      short: 'p',
      type: 'string',
      description: 'Merge plan file (JSON or YAML)'
    },
    store: {
      short: 's',
      type: 'string',
      description: 'Repository store directory'
    },
    target: {
      short: 't',
      type: 'string',
      description: 'Target repository (overrides the merge plan target)'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output as JSON'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Verbose output'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Only errors and data'
    },
    'dry-run': {
      type: 'boolean',
      default: false,
      description: 'Show what would happen without writing'
    }
  },

  commands: {
    init: {
      description: 'Initialize a new .regraft configuration',
      options: {
        force: {
          short: 'f',
          type: 'boolean',
          default: false,
          description: 'Reinitialize an existing configuration'
        }
      }
    },

    inventory: {
      description: 'Show the repository inventory with classifications',
      options: {
        write: {
          type: 'boolean',
          default: false,
          description: 'Snapshot the store into the inventory file'
        }
      }
    },

    plan: {
      description: 'Validate the merge plan and write the plan artifact'
    },

    apply: {
      description: 'Merge histories, archive sources and extract knowledge',
      options: {
        'fail-fast': {
          type: 'boolean',
          default: false,
          description: 'Start no new operation after a failure'
        },
        parallel: {
          type: 'number',
          description: 'Concurrent merges (default: from config, 4)'
        },
        timeout: {
          type: 'number',
          description: 'Per-operation timeout in ms (0 disables)'
        },
        'skip-archive': {
          type: 'boolean',
          default: false,
          description: 'Do not archive merged sources'
        },
        'skip-extract': {
          type: 'boolean',
          default: false,
          description: 'Do not run the knowledge extractor'
        }
      }
    },

    extract: {
      description: 'Extract knowledge documents from consolidated repositories',
      options: {
        repos: {
          type: 'string',
          description: 'Comma-separated repositories (default: every repository with grafts)'
        },
        output: {
          short: 'o',
          type: 'string',
          description: 'Output directory'
        }
      }
    }
  }
}

const cli = createCLI(cliSchema)

/**
 * Explicit --config file, or the nearest .regraft/config.yaml
 */
function resolveConfig(configFlag: string | undefined): { config: RegraftConfig; configDir: string | null } {
  if (configFlag) {
    const configPath = path.resolve(configFlag)
    return { config: loadConfigFromPath(configPath), configDir: path.dirname(configPath) }
  }
  const configDir = findConfigDir()
  if (configDir) {
    return { config: loadConfigFromPath(path.join(configDir, CONFIG_FILE)), configDir }
  }
  return { config: loadConfig(), configDir: null }
}

async function dispatch(command: string, context: CommandContext): Promise<void> {
  switch (command) {
    case 'init':
      await runInit(context)
      break

    case 'inventory':
      await runInventory(context)
      break

    case 'plan':
      await runPlan(context)
      break

    case 'apply':
      await runApply(context)
      break

    case 'extract':
      await runExtract(context)
      break

    default:
      print.error(`Unknown command: ${c.command(command)}`)
      ui.log(`Run "${c.command('regraft --help')}" for usage information`)
      process.exitCode = 1
  }
}

async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs(result.command, { ...result.options }, Array.isArray(result.rest) ? result.rest : [])

  // Handle help first (before error check, so `plan --help` works)
  if (result.options.help === true || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  // Handle version
  if (result.options.version === true) {
    ui.output(`regraft v${VERSION}`)
    return
  }

  // Handle errors from parser (after help/version checks)
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(String(error))
    }
    process.exitCode = 1
    return
  }

  const command = result.command[0]
  ui.setQuiet(args.quiet ?? false)

  let context: CommandContext
  try {
    const { config, configDir } = resolveConfig(args.config)
    context = buildContext(args, config, configDir)
  } catch (err) {
    reportError(err, args.verbose ?? false)
    return
  }

  try {
    await dispatch(command, context)
  } catch (err) {
    reportError(err, context.verbose)
  }
}

function reportError(err: unknown, verbose: boolean): void {
  // Structured output for RegraftErrors
  if (isRegraftError(err)) {
    print.error(err.message)
    if (err.suggestion) {
      ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
    }
    if (verbose && err.context) {
      ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
    }
  } else if (verbose && err instanceof Error && err.stack) {
    print.error(err.stack)
  } else {
    print.error(err instanceof Error ? err.message : String(err))
  }
  process.exitCode = 1
}

// Run
main().catch((err: unknown) => {
  print.error(formatErrorForCli(err))
  process.exitCode = 1
})
