/**
 * regraft History Merger
 *
 * Grafts a source repository into a target repository:
 * - every source commit is copied verbatim (same id, parents, author,
 *   timestamp and message), so unrelated histories coexist
 * - source branches and tags land under `<targetPath>/<name>`
 * - the source default-branch tree is mounted at `targetPath`
 *
 * Nothing already in the target is overwritten. Anything that would need
 * overwriting is a HistoryDivergenceError.
 */

import { createHash } from 'node:crypto'
import type {
  GraftMount,
  MergeOperation,
  MergeResult,
  ProvenanceMarker,
  StoredCommit,
  StoredRepository
} from './types.js'
import { emptyRepository } from './types.js'
import { DEFAULT_BRANCH } from '../types.js'
import type { RepositoryStore } from '../lib/repo-store.js'
import { pathsOverlap } from '../lib/locks.js'
import { branchTree, canonicalCommit } from './history.js'
import {
  HistoryDivergenceError,
  OperationCancelledError,
  ReadOnlyRepositoryError,
  RepositoryNotFoundError,
  isRegraftError
} from '../lib/errors.js'

export interface MergeOptions {
  /** Checked before anything is persisted */
  signal?: AbortSignal
  now?: Date
}

/**
 * Identity of an operation against the current source refs. Changes when the
 * source gains commits, so a stale re-apply is detected.
 */
export function computeOperationKey(
  operation: Pick<MergeOperation, 'source' | 'target' | 'targetPath'>,
  source: StoredRepository
): string {
  const refs = (record: Readonly<Record<string, string>>) =>
    Object.keys(record).sort().map(name => [name, record[name]])

  return createHash('sha256')
    .update(JSON.stringify([
      operation.source,
      operation.target,
      operation.targetPath,
      refs(source.branches),
      refs(source.tags)
    ]))
    .digest('hex')
}

export function namespacedRef(targetPath: string, name: string): string {
  return `${targetPath}/${name}`
}

export function throwIfAborted(signal: AbortSignal | undefined, operationId: string): void {
  if (!signal?.aborted) return
  // a plain abort() carries a DOMException; report it as a cancellation
  throw isRegraftError(signal.reason) ? signal.reason : new OperationCancelledError(operationId)
}

/**
 * Merge the source history of `operation` into its target.
 *
 * Re-applying an operation whose provenance marker is present returns the
 * recorded result with `reused: true` and writes nothing.
 */
export async function mergeHistories(
  store: RepositoryStore,
  operation: MergeOperation,
  options: MergeOptions = {}
): Promise<MergeResult> {
  const { signal, now = new Date() } = options
  throwIfAborted(signal, operation.id)

  const source = await store.read(operation.source)
  if (!source) {
    throw new RepositoryNotFoundError(operation.source, operation.id)
  }

  const operationKey = computeOperationKey(operation, source)
  const outcome: { result?: MergeResult } = {}

  await store.update(operation.target, current => {
    const target = current ?? emptyRepository(operation.target, DEFAULT_BRANCH)

    const marker = target.provenance.find(
      p => p.source === operation.source && p.targetPath === operation.targetPath
    )
    if (marker) {
      if (marker.operationKey !== operationKey) {
        throw divergence(operation, [
          `${operation.source} was already grafted at ${operation.targetPath} from different refs (operation ${marker.operationId})`
        ])
      }
      outcome.result = resultFromMarker(operation, marker)
      // unchanged: the store skips the write
      return target
    }

    // an archived target may still report grafts it received before archival
    if (target.readOnly) {
      throw new ReadOnlyRepositoryError(operation.target, operation.id)
    }

    const conflicts = findConflicts(target, source, operation)
    if (conflicts.length > 0) {
      throw divergence(operation, conflicts)
    }

    throwIfAborted(signal, operation.id)

    const commits: Record<string, StoredCommit> = { ...target.commits }
    let commitsImported = 0
    for (const commit of Object.values(source.commits)) {
      if (!commits[commit.id]) {
        commits[commit.id] = commit
        commitsImported++
      }
    }

    const branches = { ...target.branches }
    const branchNames: string[] = []
    for (const [name, head] of Object.entries(source.branches)) {
      const ref = namespacedRef(operation.targetPath, name)
      branches[ref] = head
      branchNames.push(ref)
    }

    const tags = { ...target.tags }
    const tagNames: string[] = []
    for (const [name, commitId] of Object.entries(source.tags)) {
      const ref = namespacedRef(operation.targetPath, name)
      tags[ref] = commitId
      tagNames.push(ref)
    }

    const mountRef = namespacedRef(operation.targetPath, source.defaultBranch)
    const mounts: GraftMount[] = [...target.mounts]
    if (branches[mountRef]) {
      mounts.push({
        path: operation.targetPath,
        source: operation.source,
        ref: mountRef,
        operationId: operation.id
      })
    }

    const provenance: ProvenanceMarker = {
      operationKey,
      operationId: operation.id,
      source: operation.source,
      targetPath: operation.targetPath,
      appliedAt: now.toISOString(),
      commitsImported,
      branches: branchNames.sort(),
      tags: tagNames.sort()
    }

    outcome.result = { ...resultFromMarker(operation, provenance), reused: false }

    return {
      ...target,
      commits,
      branches,
      tags,
      mounts,
      provenance: [...target.provenance, provenance]
    }
  })

  if (!outcome.result) {
    throw new Error(`Merge of ${operation.id} finished without a result`)
  }
  return outcome.result
}

/**
 * Everything that would force overwriting data already in the target
 */
function findConflicts(
  target: StoredRepository,
  source: StoredRepository,
  operation: MergeOperation
): string[] {
  const conflicts: string[] = []

  for (const commit of Object.values(source.commits)) {
    const existing = target.commits[commit.id]
    if (existing && canonicalCommit(existing) !== canonicalCommit(commit)) {
      conflicts.push(`commit ${commit.id} exists in both histories with different content`)
    }
  }

  const checkRefs = (kind: 'branch' | 'tag', sourceRefs: Readonly<Record<string, string>>, targetRefs: Readonly<Record<string, string>>) => {
    for (const [name, commitId] of Object.entries(sourceRefs)) {
      const ref = namespacedRef(operation.targetPath, name)
      const existing = targetRefs[ref]
      if (existing !== undefined && existing !== commitId) {
        conflicts.push(`${kind} ${ref} already points to ${existing}`)
      }
    }
  }
  checkRefs('branch', source.branches, target.branches)
  checkRefs('tag', source.tags, target.tags)

  const blocking = Object.keys(branchTree(target, target.defaultBranch))
    .filter(file => pathsOverlap(file, operation.targetPath))
  if (blocking.length > 0) {
    conflicts.push(`${operation.targetPath} overlaps files on ${target.defaultBranch}: ${blocking.slice(0, 5).join(', ')}`)
  }

  for (const mount of target.mounts) {
    if (pathsOverlap(mount.path, operation.targetPath)) {
      conflicts.push(`${operation.targetPath} overlaps ${mount.path}, grafted from ${mount.source}`)
    }
  }

  return conflicts
}

function resultFromMarker(operation: MergeOperation, marker: ProvenanceMarker): MergeResult {
  return {
    operationId: operation.id,
    source: operation.source,
    target: operation.target,
    targetPath: operation.targetPath,
    operationKey: marker.operationKey,
    commitsImported: marker.commitsImported,
    branches: marker.branches,
    tags: marker.tags,
    reused: true
  }
}

function divergence(operation: MergeOperation, conflicts: string[]): HistoryDivergenceError {
  return new HistoryDivergenceError(
    {
      operationId: operation.id,
      source: operation.source,
      target: operation.target,
      targetPath: operation.targetPath
    },
    conflicts
  )
}
