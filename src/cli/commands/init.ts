/**
 * regraft CLI - Init Command
 *
 * Initialize a new .regraft configuration in the current directory
 */

import path from 'node:path'
import type { CommandContext } from '../context.js'
import { CONFIG_DIR, CONFIG_FILE, createDefaultConfig } from '../../lib/config-loader.js'
import { c, print, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export async function runInit(context: CommandContext, cwd: string = process.cwd()): Promise<void> {
  const { args, configDir, verbose, dryRun, jsonOutput } = context
  const target = args.target || path.basename(cwd)
  const newConfigDir = path.join(cwd, CONFIG_DIR)

  // Check if already initialized
  if (configDir && !args.force) {
    if (jsonOutput) {
      ui.output(JSON.stringify({ error: 'already_initialized', path: configDir }))
    } else {
      print.error(`regraft already initialized at ${configDir}`)
      ui.log(`Use ${c.command('--force')} to reinitialize`)
    }
    process.exitCode = 1
    return
  }

  ui.verbose(`Initializing regraft with target: ${target}`, verbose)
  ui.verbose(`Config directory: ${newConfigDir}`, verbose)

  if (dryRun) {
    if (jsonOutput) {
      ui.output(JSON.stringify({ action: 'init', target, configDir: newConfigDir, dryRun: true }))
    } else {
      ui.log('Dry run - would create:')
      ui.log(`  ${path.join(newConfigDir, CONFIG_FILE)}`)
      ui.log(`  ${path.join(cwd, 'merge-plan.yaml')} (if missing)`)
    }
    return
  }

  const { configPath, planPath } = createDefaultConfig(cwd, target)

  if (jsonOutput) {
    ui.output(JSON.stringify({ success: true, target, configPath, planPath }))
    return
  }

  ui.log(`${symbols.success} Created ${c.path(path.relative(cwd, configPath))}`)
  ui.log(`${symbols.success} Merge plan at ${c.path(path.relative(cwd, planPath))}`)
  ui.log('')
  ui.log('Next steps:')
  ui.log(`  1. Add entries to ${c.path(path.relative(cwd, planPath))}`)
  ui.log(`  2. Review with ${c.command('regraft plan')}`)
  ui.log(`  3. Execute with ${c.command('regraft apply')}`)
}
