/**
 * regraft Domain Types
 *
 * Records flowing through the consolidation pipeline:
 * inventory → plan → merge → archive → knowledge.
 *
 * Every record is readonly. Stages produce new records instead of
 * mutating the ones they receive.
 */

import type { Classification, ConflictPolicy } from '../types.js'
import { InvalidTransitionError } from '../lib/errors.js'

// ============================================================================
// Inventory
// ============================================================================

export interface RepositoryRecord {
  readonly id: string
  readonly defaultBranch: string
  readonly branches: readonly string[]
  readonly tags: readonly string[]
  /** Absent when the snapshot only reports a size */
  readonly commitCount?: number
  /** ISO timestamp of the latest commit or push */
  readonly lastActivity: string
  readonly description?: string
  readonly fork?: boolean
  readonly archived?: boolean
  readonly sizeKb?: number
  readonly openIssues?: number
}

export interface Inventory {
  readonly generatedAt: string
  /** File path or "store" when built from the repository store */
  readonly source: string
  /** Sorted by id */
  readonly records: readonly RepositoryRecord[]
  readonly byId: ReadonlyMap<string, RepositoryRecord>
}

export interface ClassifiedRecord {
  readonly record: RepositoryRecord
  readonly classification: Classification
  readonly daysSinceActivity: number
}

// ============================================================================
// Plan
// ============================================================================

export interface MergePlanEntry {
  readonly source: string
  /** Path inside the target repository */
  readonly targetPath: string
  readonly onConflict: ConflictPolicy
  /** Target repository; falls back to the plan-level target */
  readonly target?: string
}

export type OperationStatus = 'pending' | 'validated' | 'applied' | 'failed'

export interface MergeOperation {
  /** Stable identifier, e.g. "op-002-billing" */
  readonly id: string
  /** Position of the originating entry in the merge plan */
  readonly index: number
  readonly source: string
  readonly target: string
  /** Final path, after rename resolution */
  readonly targetPath: string
  /** Path as written in the merge plan */
  readonly requestedPath: string
  readonly policy: ConflictPolicy
  readonly status: OperationStatus
  /** Operations that must be applied first */
  readonly dependsOn: readonly string[]
}

export interface SkippedEntry {
  readonly entry: MergePlanEntry
  readonly target: string
  /** Source of the earlier entry that kept the path */
  readonly keptBy: string
}

export interface MergePlan {
  readonly id: string
  readonly generatedAt: string
  /** Plan-level target repository */
  readonly target: string
  readonly dryRun: boolean
  /** Topologically ordered */
  readonly operations: readonly MergeOperation[]
  readonly skipped: readonly SkippedEntry[]
  /** Target repositories that do not exist yet and are created by the plan */
  readonly createdTargets: readonly string[]
}

// ============================================================================
// Operation Status Machine
// ============================================================================

const TRANSITIONS: Record<OperationStatus, readonly OperationStatus[]> = {
  pending: ['validated', 'failed'],
  validated: ['applied', 'failed'],
  applied: [],
  failed: []
}

export function canTransition(from: OperationStatus, to: OperationStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

/**
 * The only way an operation changes status. Returns a new operation.
 */
export function transition(operation: MergeOperation, to: OperationStatus): MergeOperation {
  if (!canTransition(operation.status, to)) {
    throw new InvalidTransitionError(operation.id, operation.status, to)
  }
  return Object.freeze({ ...operation, status: to })
}

export function isTerminal(status: OperationStatus): boolean {
  return TRANSITIONS[status].length === 0
}

// ============================================================================
// Stored Repositories
// ============================================================================

export interface CommitAuthor {
  readonly name: string
  readonly email: string
}

export interface StoredCommit {
  readonly id: string
  readonly parents: readonly string[]
  readonly author: CommitAuthor
  /** ISO timestamp */
  readonly timestamp: string
  readonly message: string
  /** Full snapshot: path → file content */
  readonly tree: Readonly<Record<string, string>>
}

/**
 * A grafted subtree: the tree at `ref` is visible under `path`
 */
export interface GraftMount {
  readonly path: string
  readonly source: string
  /** Namespaced branch holding the grafted default branch */
  readonly ref: string
  readonly operationId: string
}

/**
 * Written at merge time so re-applying an operation is detected
 */
export interface ProvenanceMarker {
  readonly operationKey: string
  readonly operationId: string
  readonly source: string
  readonly targetPath: string
  readonly appliedAt: string
  readonly commitsImported: number
  readonly branches: readonly string[]
  readonly tags: readonly string[]
}

export interface RedirectNote {
  readonly path: string
  readonly content: string
  readonly createdAt: string
}

export interface StoredRepository {
  readonly id: string
  readonly defaultBranch: string
  readonly description?: string
  readonly fork?: boolean
  readonly commits: Readonly<Record<string, StoredCommit>>
  readonly branches: Readonly<Record<string, string>>
  readonly tags: Readonly<Record<string, string>>
  readonly readOnly: boolean
  readonly archivedAt?: string
  readonly permissions: { readonly archive: boolean }
  readonly mounts: readonly GraftMount[]
  readonly provenance: readonly ProvenanceMarker[]
  readonly notes: readonly RedirectNote[]
}

export function emptyRepository(id: string, defaultBranch: string): StoredRepository {
  return {
    id,
    defaultBranch,
    commits: {},
    branches: {},
    tags: {},
    readOnly: false,
    permissions: { archive: true },
    mounts: [],
    provenance: [],
    notes: []
  }
}

// ============================================================================
// Merge / Archive / Knowledge Results
// ============================================================================

export interface MergeResult {
  readonly operationId: string
  readonly source: string
  readonly target: string
  readonly targetPath: string
  readonly operationKey: string
  readonly commitsImported: number
  /** Namespaced branch names written into the target */
  readonly branches: readonly string[]
  /** Namespaced tag names written into the target */
  readonly tags: readonly string[]
  /** True when a provenance marker showed the operation was already applied */
  readonly reused: boolean
}

export interface ArchivalRecord {
  readonly repository: string
  readonly archivedAt: string
  /** File path of the redirect document, or a store:// reference */
  readonly redirectDocument: string
  readonly target: string
  readonly targetPath: string
}

export type KnowledgeKind = 'document' | 'commit-note'

export interface KnowledgeDocument {
  readonly id: string
  readonly repository: string
  readonly kind: KnowledgeKind
  /** File path in the consolidated view, or commit id */
  readonly origin: string
  readonly title: string
  readonly headings: readonly string[]
  readonly content: string
  readonly contentHash: string
}

export interface KnowledgeResult {
  readonly documents: readonly KnowledgeDocument[]
  readonly warnings: readonly string[]
  /** Written files, when an output directory was given */
  readonly written: readonly string[]
}

// ============================================================================
// Execution Report
// ============================================================================

export interface ErrorDetail {
  readonly name: string
  readonly code: string
  readonly message: string
  readonly context?: Record<string, unknown>
}

export interface OperationReport {
  readonly id: string
  readonly source: string
  readonly target: string
  readonly targetPath: string
  readonly status: OperationStatus
  /** False when the operation was never launched (dry-run, fail-fast, cancel) */
  readonly started: boolean
  readonly durationMs: number
  readonly result?: MergeResult
  readonly error?: ErrorDetail
}

export interface ArchivalFailure {
  readonly repository: string
  readonly operationId: string
  readonly error: ErrorDetail
}

export interface ExecutionReport {
  readonly planId: string
  readonly startedAt: string
  readonly finishedAt: string
  readonly dryRun: boolean
  readonly cancelled: boolean
  readonly success: boolean
  readonly operations: readonly OperationReport[]
  readonly archives: readonly ArchivalRecord[]
  readonly archivalFailures: readonly ArchivalFailure[]
  readonly knowledge?: {
    readonly documents: number
    readonly warnings: readonly string[]
  }
}

export function failedOperations(report: ExecutionReport): OperationReport[] {
  return report.operations.filter(op => op.status === 'failed')
}
