/**
 * regraft `plan` Command
 *
 * Validates the merge plan against the inventory and writes the plan
 * artifact. Never touches the store.
 *
 * Usage:
 *   regraft plan                        Validate and write artifacts
 *   regraft plan --target platform      Override the plan-level target
 *   regraft plan --json                 JSON output for CI (no artifacts)
 */

import type { CommandContext } from '../context.js'
import { openStore, loadContextInventory, planFromContext } from '../context.js'
import { writePlanArtifact } from '../../domain/plan.js'
import type { MergePlan } from '../../domain/types.js'
import { isPlanError, isValidationError } from '../../lib/errors.js'
import { toErrorDetail } from '../../domain/apply.js'
import { c, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

// ============================================================================
// Plan Command
// ============================================================================

export async function runPlan(context: CommandContext, now: Date = new Date()): Promise<void> {
  const { paths, jsonOutput } = context
  const store = openStore(context)
  const inventory = await loadContextInventory(context, store, now)

  let plan: MergePlan
  try {
    plan = planFromContext(context, inventory, now)
  } catch (err) {
    if (jsonOutput && (isPlanError(err) || isValidationError(err))) {
      ui.output(JSON.stringify({ valid: false, error: toErrorDetail(err) }, null, 2))
      process.exitCode = 1
      return
    }
    throw err
  }

  // JSON output for CI
  if (jsonOutput) {
    ui.output(JSON.stringify({ valid: true, plan }, null, 2))
    return
  }

  const artifact = writePlanArtifact(plan, paths.artifacts)

  displayPlan(plan)

  ui.log('')
  ui.log(`${c.muted('Plan saved to:')}`)
  ui.log(`  ${c.muted('JSON:')} ${artifact.json}`)
  ui.log(`  ${c.muted('Markdown:')} ${artifact.markdown}`)

  if (plan.operations.length > 0) {
    ui.log('')
    ui.log(`${symbols.info} Review the plan, then run: ${c.command('regraft apply')}`)
  }
}

// ============================================================================
// Display
// ============================================================================

export function displayPlan(plan: MergePlan): void {
  if (plan.operations.length === 0 && plan.skipped.length === 0) {
    ui.log(`${symbols.success} Merge plan has no entries.`)
    return
  }

  ui.log('')
  ui.log(c.header(`Plan: ${plan.id}`))
  ui.log(`  ${c.success(`${plan.operations.length} operation(s)`)}`)
  if (plan.skipped.length > 0) {
    ui.log(`  ${c.muted(`${plan.skipped.length} skipped duplicate(s)`)}`)
  }
  if (plan.createdTargets.length > 0) {
    ui.log(`  ${c.muted('New targets:')} ${plan.createdTargets.map(c.repo).join(', ')}`)
  }
  ui.log('')

  for (const op of plan.operations) {
    const renamed = op.targetPath !== op.requestedPath ? ` ${c.warning(`(renamed from ${op.requestedPath})`)}` : ''
    const deps = op.dependsOn.length > 0 ? ` ${c.muted(`after ${op.dependsOn.join(', ')}`)}` : ''
    ui.log(`  ${c.op(op.id)} ${c.repo(op.source)} ${symbols.arrow} ${op.target}:${c.path(op.targetPath)}${renamed}${deps}`)
  }

  for (const skipped of plan.skipped) {
    ui.log(`  ${symbols.skip} ${c.repo(skipped.entry.source)} ${c.muted(`skipped, ${skipped.target}:${skipped.entry.targetPath} kept by ${skipped.keptBy}`)}`)
  }
}
