/**
 * regraft Plan Execution Engine
 *
 * Applies a validated MergePlan against a repository store:
 * 1. merges run through a bounded worker pool in dependency order, each
 *    holding an exclusive lock on its target subtree
 * 2. sources of applied operations are archived
 * 3. the knowledge extractor runs over the consolidated targets
 *
 * A failed operation never stops unrelated ones (unless failFast); its
 * dependents fail with DependencyFailedError. Applied operations are never
 * rolled back.
 */

import fs from 'node:fs'
import path from 'node:path'
import type {
  ArchivalFailure,
  ArchivalRecord,
  ErrorDetail,
  ExecutionReport,
  MergeOperation,
  MergePlan,
  MergeResult,
  OperationReport
} from './types.js'
import { transition } from './types.js'
import type { RepositoryStore } from '../lib/repo-store.js'
import { runBatch } from '../lib/batch-runner.js'
import { PathLockManager } from '../lib/locks.js'
import { withTimeout } from '../lib/timeout.js'
import { DependencyFailedError, InvalidTransitionError, isRegraftError } from '../lib/errors.js'
import { mergeHistories } from './merge.js'
import { archiveRepository } from './archive.js'
import { extractKnowledge } from './knowledge.js'
import type { ExtractOptions } from './knowledge.js'

// ============================================================================
// Types
// ============================================================================

export type ExecutionEvent =
  | { type: 'operation:start'; operation: MergeOperation; started: number; total: number }
  | { type: 'operation:applied'; operation: MergeOperation; result: MergeResult; durationMs: number }
  | { type: 'operation:failed'; operation: MergeOperation; error: ErrorDetail }
  | { type: 'archive:done'; record: ArchivalRecord }
  | { type: 'archive:failed'; failure: ArchivalFailure }
  | { type: 'knowledge:done'; documents: number; warnings: number }
  | { type: 'warning'; message: string }

export interface ExecutePlanOptions {
  plan: MergePlan
  store: RepositoryStore
  /** Report without starting any operation (default: plan.dryRun) */
  dryRun?: boolean
  /** Maximum concurrent merges (default: 4) */
  parallelism?: number
  /** Start nothing new once an operation fails */
  failFast?: boolean
  /** Per-operation budget; 0 disables */
  timeoutMs?: number
  /** Aborting leaves unstarted operations validated; in-flight ones finish */
  signal?: AbortSignal
  archive?: {
    enabled?: boolean
    redirectDir?: string
  }
  knowledge?: Omit<ExtractOptions, 'warn'> & { enabled?: boolean }
  onEvent?: (event: ExecutionEvent) => void
  now?: () => Date
}

// ============================================================================
// Plan Execution
// ============================================================================

/**
 * Execute a plan and return the per-operation report.
 *
 * Rejects only when the plan itself is unusable (an operation that is not
 * validated); every operation failure is recorded in the report.
 */
export async function executePlan(options: ExecutePlanOptions): Promise<ExecutionReport> {
  const {
    plan,
    store,
    dryRun = plan.dryRun,
    parallelism = 4,
    failFast = false,
    timeoutMs = 0,
    signal,
    archive = {},
    knowledge = {},
    onEvent,
    now = () => new Date()
  } = options

  for (const op of plan.operations) {
    if (op.status !== 'validated') {
      throw new InvalidTransitionError(op.id, op.status, 'applied')
    }
  }

  const startedAt = now().toISOString()

  // Dry run: report without executing
  if (dryRun) {
    return {
      planId: plan.id,
      startedAt,
      finishedAt: now().toISOString(),
      dryRun: true,
      cancelled: false,
      success: true,
      operations: plan.operations.map(op => notStarted(op)),
      archives: [],
      archivalFailures: []
    }
  }

  // 1. Merges
  const locks = new PathLockManager()
  const inFlight: Promise<void>[] = []

  const applyOne = async (op: MergeOperation): Promise<MergeResult> => {
    const release = await locks.acquire(op.id, op.target, op.targetPath)
    const controller = new AbortController()
    const work = mergeHistories(store, op, { signal: controller.signal, now: now() })
    // the lock follows the merge, which may outlive its timeout
    inFlight.push(work.then(release, release))
    return withTimeout(work, timeoutMs, op.id, controller)
  }

  const batch = await runBatch(plan.operations, applyOne, {
    key: op => op.id,
    dependsOn: op => op.dependsOn,
    concurrency: parallelism,
    stopOnError: failFast,
    signal,
    onStart: (operation, started, total) => onEvent?.({ type: 'operation:start', operation, started, total }),
    onSettled: settled => {
      if (settled.outcome === 'succeeded' && settled.result) {
        onEvent?.({ type: 'operation:applied', operation: settled.item, result: settled.result, durationMs: settled.duration })
      } else if (settled.outcome === 'failed' && settled.error) {
        onEvent?.({ type: 'operation:failed', operation: settled.item, error: toErrorDetail(settled.error) })
      }
    }
  })
  await Promise.all(inFlight)

  const reports = new Map<string, OperationReport>()
  const appliedOps: MergeOperation[] = []

  for (const entry of batch.operations) {
    const op = entry.item
    let report: OperationReport

    if (entry.outcome === 'succeeded') {
      const applied = transition(op, 'applied')
      appliedOps.push(applied)
      report = { ...describe(applied), started: true, durationMs: entry.duration, result: entry.result }
    } else if (entry.outcome === 'failed') {
      report = {
        ...describe(transition(op, 'failed')),
        started: true,
        durationMs: entry.duration,
        error: toErrorDetail(entry.error ?? new Error('unknown failure'))
      }
    } else {
      // blocked: failed if a prerequisite failed, otherwise never reached
      const failedDeps = (entry.blockedBy ?? []).filter(dep => reports.get(dep)?.status === 'failed')
      if (failedDeps.length > 0) {
        const error = toErrorDetail(new DependencyFailedError(op.id, failedDeps))
        report = { ...describe(transition(op, 'failed')), started: false, durationMs: 0, error }
        onEvent?.({ type: 'operation:failed', operation: op, error })
      } else {
        report = notStarted(op)
      }
    }
    reports.set(op.id, report)
  }

  // 2. Archival
  const archives: ArchivalRecord[] = []
  const archivalFailures: ArchivalFailure[] = []

  if (archive.enabled !== false) {
    for (const op of appliedOps) {
      try {
        const record = await archiveRepository(store, op, { redirectDir: archive.redirectDir, now: now() })
        archives.push(record)
        onEvent?.({ type: 'archive:done', record })
      } catch (err) {
        const failure: ArchivalFailure = {
          repository: op.source,
          operationId: op.id,
          error: toErrorDetail(err)
        }
        archivalFailures.push(failure)
        onEvent?.({ type: 'archive:failed', failure })
      }
    }
  }

  // 3. Knowledge
  let knowledgeSummary: ExecutionReport['knowledge']
  const { enabled: knowledgeEnabled = true, ...extractOptions } = knowledge

  if (knowledgeEnabled && appliedOps.length > 0) {
    const targets = [...new Set(appliedOps.map(op => op.target))]
    const warn = (message: string) => onEvent?.({ type: 'warning', message })
    try {
      const result = await extractKnowledge(store, targets, { ...extractOptions, warn })
      knowledgeSummary = { documents: result.documents.length, warnings: result.warnings }
    } catch (err) {
      const message = `knowledge extraction failed: ${err instanceof Error ? err.message : String(err)}`
      warn(message)
      knowledgeSummary = { documents: 0, warnings: [message] }
    }
    onEvent?.({ type: 'knowledge:done', documents: knowledgeSummary.documents, warnings: knowledgeSummary.warnings.length })
  }

  const operations = plan.operations.map(op => reports.get(op.id) ?? notStarted(op))

  return {
    planId: plan.id,
    startedAt,
    finishedAt: now().toISOString(),
    dryRun: false,
    cancelled: batch.cancelled,
    success: operations.every(op => op.status === 'applied') && archivalFailures.length === 0,
    operations,
    archives,
    archivalFailures,
    ...(knowledgeSummary ? { knowledge: knowledgeSummary } : {})
  }
}

// ============================================================================
// Helpers
// ============================================================================

function describe(op: MergeOperation): Pick<OperationReport, 'id' | 'source' | 'target' | 'targetPath' | 'status'> {
  return {
    id: op.id,
    source: op.source,
    target: op.target,
    targetPath: op.targetPath,
    status: op.status
  }
}

function notStarted(op: MergeOperation): OperationReport {
  return { ...describe(op), started: false, durationMs: 0 }
}

export function toErrorDetail(error: unknown): ErrorDetail {
  if (isRegraftError(error)) {
    return { name: error.name, code: error.code, message: error.message, context: error.context }
  }
  if (error instanceof Error) {
    return { name: error.name, code: 'UNKNOWN_ERROR', message: error.message }
  }
  return { name: 'Error', code: 'UNKNOWN_ERROR', message: String(error) }
}

/**
 * Write an execution report artifact (JSON) next to the plan artifacts.
 */
export function writeReportArtifact(report: ExecutionReport, outputDir?: string): string {
  const dir = outputDir || path.resolve('artifacts', 'regraft-plans')
  fs.mkdirSync(dir, { recursive: true })

  const safeId = report.planId.replace(/[^a-zA-Z0-9._-]/g, '-')
  const reportPath = path.join(dir, `${safeId}.report.json`)
  fs.writeFileSync(reportPath, JSON.stringify(report, null, 2) + '\n')
  return reportPath
}
