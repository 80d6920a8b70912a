/**
 * regraft `apply` Command
 *
 * Computes the plan, then merges, archives and extracts.
 *
 * Usage:
 *   regraft apply                        Execute the merge plan
 *   regraft apply --dry-run              Validate and report, start nothing
 *   regraft apply --fail-fast            Stop launching operations after a failure
 *   regraft apply --parallel 8           Concurrent merges
 *   regraft apply --timeout 60000        Per-operation budget (ms)
 *   regraft apply --skip-archive         Leave sources writable
 *
 * Exit code is non-zero when any operation or archival fails.
 */

import type { CommandContext } from '../context.js'
import { executionSettings, loadContextInventory, openStore, planFromContext } from '../context.js'
import { writePlanArtifact } from '../../domain/plan.js'
import { executePlan, writeReportArtifact } from '../../domain/apply.js'
import type { ExecutionEvent } from '../../domain/apply.js'
import type { ExecutionReport } from '../../domain/types.js'
import { failedOperations } from '../../domain/types.js'
import { c, colorStatus, print, symbols } from '../lib/colors.js'
import { displayPlan } from './plan.js'
import * as ui from '../ui.js'

// ============================================================================
// Apply Command
// ============================================================================

export async function runApply(context: CommandContext, now: () => Date = () => new Date()): Promise<void> {
  const { paths, verbose, jsonOutput, dryRun } = context
  const store = openStore(context)
  const inventory = await loadContextInventory(context, store, now())
  const plan = planFromContext(context, inventory, now())
  const settings = executionSettings(context)

  if (!jsonOutput) {
    writePlanArtifact(plan, paths.artifacts)
  }

  if (plan.operations.length === 0) {
    ui.log(`${symbols.success} Nothing to apply: the merge plan has no operations.`)
  } else if (dryRun) {
    ui.log(`${c.muted('[dry-run]')} Would apply ${plan.operations.length} operation(s)`)
    displayPlan(plan)
  } else {
    ui.log(`${symbols.info} Applying ${plan.operations.length} operation(s) with parallelism ${settings.parallelism}...`)
  }

  // Ctrl-C: stop launching operations, let running ones finish
  const controller = new AbortController()
  const onSigint = () => {
    ui.warn('Cancelling: waiting for running operations to finish')
    controller.abort()
  }
  process.once('SIGINT', onSigint)

  const report = await executePlan({
    plan,
    store,
    dryRun,
    parallelism: settings.parallelism,
    failFast: settings.failFast,
    timeoutMs: settings.timeoutMs,
    signal: controller.signal,
    archive: settings.archive,
    knowledge: settings.knowledge,
    onEvent: event => logEvent(event, verbose),
    now
  }).finally(() => {
    process.off('SIGINT', onSigint)
  })

  const reportPath = jsonOutput || dryRun ? undefined : writeReportArtifact(report, paths.artifacts)

  if (jsonOutput) {
    ui.output(JSON.stringify(report, null, 2))
  } else {
    displayReport(report)
    if (reportPath) {
      ui.log(`  ${c.muted('Report:')} ${reportPath}`)
    }
  }

  if (!report.success) {
    process.exitCode = 1
  }
}

// ============================================================================
// Display
// ============================================================================

function logEvent(event: ExecutionEvent, verbose: boolean): void {
  switch (event.type) {
    case 'operation:start':
      ui.verbose(`[${event.started}/${event.total}] ${event.operation.id}: ${event.operation.source} -> ${event.operation.target}:${event.operation.targetPath}`, verbose)
      break
    case 'operation:applied': {
      const note = event.result.reused ? 'already applied' : `${event.result.commitsImported} commit(s)`
      ui.log(`  ${symbols.success} ${c.op(event.operation.id)} ${c.repo(event.operation.source)} ${symbols.arrow} ${c.path(event.operation.targetPath)} ${c.muted(`(${note}, ${event.durationMs}ms)`)}`)
      break
    }
    case 'operation:failed':
      ui.log(`  ${symbols.error} ${c.op(event.operation.id)} ${c.repo(event.operation.source)}: ${c.error(event.error.message)}`)
      break
    case 'archive:done':
      ui.verbose(`archived ${event.record.repository} (${event.record.redirectDocument})`, verbose)
      break
    case 'archive:failed':
      ui.warn(`archival of ${event.failure.repository} failed: ${event.failure.error.message}`)
      break
    case 'knowledge:done':
      ui.verbose(`knowledge: ${event.documents} document(s), ${event.warnings} warning(s)`, verbose)
      break
    case 'warning':
      ui.warn(event.message)
      break
  }
}

function displayReport(report: ExecutionReport): void {
  if (report.dryRun) {
    ui.log(`${c.muted('[dry-run]')} No operation was started.`)
    return
  }

  const applied = report.operations.filter(op => op.status === 'applied').length
  const failed = failedOperations(report)
  const notStarted = report.operations.filter(op => !op.started && op.status !== 'failed').length

  ui.log('')
  if (report.success) {
    ui.log(`${symbols.success} Applied ${applied} operation(s), archived ${report.archives.length} source(s)`)
  } else {
    print.error(`Apply incomplete: ${applied} applied, ${failed.length} failed, ${notStarted} not started`)
    for (const op of report.operations) {
      if (op.status === 'applied') continue
      const reason = op.error ? `: ${op.error.message}` : ''
      ui.log(`  ${c.op(op.id)} ${colorStatus(op.status)}${reason}`)
    }
    for (const failure of report.archivalFailures) {
      ui.log(`  ${c.repo(failure.repository)} ${c.error('not archived')}: ${failure.error.message}`)
    }
    if (failed.length > 0) {
      // failed operation ids always reach stderr, even when not a TTY
      console.error(`Failed operations: ${failed.map(op => op.id).join(', ')}`)
    }
  }

  if (report.cancelled) {
    ui.warn('Execution was cancelled before every operation started')
  }
  if (report.knowledge) {
    ui.log(`  ${c.muted('Knowledge:')} ${report.knowledge.documents} document(s) extracted`)
  }
}
