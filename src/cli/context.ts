/**
 * Command context: parsed args, loaded config and resolved paths
 */

import fs from 'node:fs'
import path from 'node:path'
import type { CLIArgs, RegraftConfig } from '../types.js'
import type { Inventory, MergePlan } from '../domain/types.js'
import { DEFAULT_CONFIG, getProjectRoot } from '../lib/config-loader.js'
import { FsRepositoryStore } from '../lib/fs-store.js'
import { loadMergePlan } from '../lib/plan-loader.js'
import { loadInventory, inventoryFromStore } from '../domain/inventory.js'
import { computePlan } from '../domain/plan.js'
import * as ui from './ui.js'

export interface ResolvedPaths {
  inventory: string
  plan: string
  store: string
  artifacts: string
  redirects: string
  knowledge: string
}

export interface CommandContext {
  args: CLIArgs
  config: RegraftConfig
  configDir: string | null
  projectRoot: string
  paths: ResolvedPaths
  verbose: boolean
  quiet: boolean
  dryRun: boolean
  jsonOutput: boolean
}

/**
 * Flags resolve against the working directory, config values against the
 * project root
 */
export function buildContext(
  args: CLIArgs,
  config: RegraftConfig,
  configDir: string | null,
  cwd: string = process.cwd()
): CommandContext {
  const projectRoot = getProjectRoot(configDir, cwd)
  const fromConfig = (value: string | undefined, fallback: string) =>
    path.resolve(projectRoot, value || fallback)
  const fromFlag = (flag: string | undefined, value: string | undefined, fallback: string) =>
    flag ? path.resolve(cwd, flag) : fromConfig(value, fallback)

  const quiet = args.quiet ?? false
  ui.setQuiet(quiet)

  return {
    args,
    config,
    configDir,
    projectRoot,
    paths: {
      inventory: fromFlag(args.inventory, config.inventory, 'inventory.yaml'),
      plan: fromFlag(args.plan, config.plan, 'merge-plan.yaml'),
      store: fromFlag(args.store, config.store, '.regraft/store'),
      artifacts: fromConfig(config.artifacts_dir, 'artifacts/regraft-plans'),
      redirects: fromConfig(config.archive?.redirect_dir, 'artifacts/redirects'),
      knowledge: fromFlag(args.output, config.knowledge?.output_dir, 'artifacts/knowledge')
    },
    verbose: args.verbose ?? false,
    quiet,
    dryRun: args['dry-run'] ?? false,
    jsonOutput: args.json ?? false
  }
}

export function openStore(context: CommandContext): FsRepositoryStore {
  ui.verbose(`Store: ${context.paths.store}`, context.verbose)
  return new FsRepositoryStore(context.paths.store)
}

/**
 * Inventory snapshot file, or a snapshot of the store when there is none
 */
export async function loadContextInventory(
  context: CommandContext,
  store: FsRepositoryStore,
  now: Date
): Promise<Inventory> {
  if (fs.existsSync(context.paths.inventory)) {
    ui.verbose(`Inventory: ${context.paths.inventory}`, context.verbose)
    return loadInventory(context.paths.inventory)
  }
  ui.verbose(`No inventory at ${context.paths.inventory}; using the store`, context.verbose)
  return inventoryFromStore(store, now)
}

/**
 * Load the merge plan file and compute the plan against the inventory
 */
export function planFromContext(context: CommandContext, inventory: Inventory, now: Date): MergePlan {
  ui.verbose(`Merge plan: ${context.paths.plan}`, context.verbose)
  const file = loadMergePlan(context.paths.plan)
  return computePlan({
    inventory,
    entries: file.entries,
    target: context.args.target || file.target,
    dryRun: context.dryRun,
    now
  })
}

export function executionSettings(context: CommandContext) {
  const execution = { ...DEFAULT_CONFIG.execution, ...context.config.execution }
  const knowledge = { ...DEFAULT_CONFIG.knowledge, ...context.config.knowledge }
  const archive = { ...DEFAULT_CONFIG.archive, ...context.config.archive }
  const { args } = context

  return {
    parallelism: args.parallel ?? execution.parallelism ?? 4,
    failFast: args['fail-fast'] || (execution.fail_fast ?? false),
    timeoutMs: args.timeout ?? execution.timeout_ms ?? 0,
    archive: {
      enabled: !args['skip-archive'] && (archive.enabled ?? true),
      redirectDir: context.paths.redirects
    },
    knowledge: {
      enabled: !args['skip-extract'] && (knowledge.enabled ?? true),
      include: knowledge.include,
      minLength: knowledge.min_length,
      minCommitBody: knowledge.min_commit_body,
      outputDir: context.paths.knowledge
    }
  }
}
