/**
 * Repository Store
 *
 * Holds the content behind inventory records: commits, refs, mounts and
 * provenance markers. Reads return copies; every write goes through
 * `update`, which is serialized per repository so concurrent merges into
 * the same target cannot lose each other's changes.
 *
 * There is no delete operation.
 */

import type { StoredCommit, StoredRepository } from '../domain/types.js'
import { DEFAULT_BRANCH } from '../types.js'
import { KeyedMutex } from './locks.js'
import { RecordReader, isRecord } from './record-reader.js'
import { InvalidInventoryError } from './errors.js'

export type RepositoryUpdater = (current: StoredRepository | null) => StoredRepository

export interface RepositoryStore {
  /** Repository ids, sorted */
  list(): Promise<string[]>
  read(id: string): Promise<StoredRepository | null>
  /**
   * Read-modify-write under the repository's mutex. If `updater` throws,
   * nothing is written. Returns the stored value.
   */
  update(id: string, updater: RepositoryUpdater): Promise<StoredRepository>
}

/**
 * Shared update serialization; subclasses provide raw load/save
 */
export abstract class SerializedRepositoryStore implements RepositoryStore {
  private readonly mutex = new KeyedMutex()

  abstract list(): Promise<string[]>
  protected abstract load(id: string): Promise<StoredRepository | null>
  protected abstract save(repository: StoredRepository): Promise<void>

  async read(id: string): Promise<StoredRepository | null> {
    return this.load(id)
  }

  async update(id: string, updater: RepositoryUpdater): Promise<StoredRepository> {
    return this.mutex.runExclusive(id, async () => {
      const current = await this.load(id)
      const next = updater(current)
      if (next.id !== id) {
        throw new Error(`Updater for "${id}" returned repository "${next.id}"`)
      }
      if (next !== current) {
        await this.save(next)
      }
      return next
    })
  }
}

/**
 * In-process store, used by tests and by library callers that build
 * repositories themselves
 */
export class MemoryRepositoryStore extends SerializedRepositoryStore {
  private readonly repositories = new Map<string, StoredRepository>()

  constructor(initial: StoredRepository[] = []) {
    super()
    for (const repository of initial) {
      this.repositories.set(repository.id, structuredClone(repository))
    }
  }

  async list(): Promise<string[]> {
    return [...this.repositories.keys()].sort()
  }

  protected async load(id: string): Promise<StoredRepository | null> {
    const repository = this.repositories.get(id)
    return repository ? structuredClone(repository) : null
  }

  protected async save(repository: StoredRepository): Promise<void> {
    this.repositories.set(repository.id, structuredClone(repository))
  }
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Validate a repository document read from disk or a fixture
 */
export function parseStoredRepository(data: unknown, source: string): StoredRepository {
  const problems: string[] = []
  if (!isRecord(data)) {
    throw new InvalidInventoryError(['repository document must be a mapping'], source)
  }

  const reader = new RecordReader(data, 'repository', problems)
  const id = reader.requiredString('id')
  const label = `repository "${id}"`
  const repo = new RecordReader(data, label, problems)

  const commits: Record<string, StoredCommit> = {}
  const rawCommits = repo.raw('commits')
  const commitList = Array.isArray(rawCommits)
    ? rawCommits
    : isRecord(rawCommits) ? Object.values(rawCommits) : []
  if (rawCommits !== undefined && !Array.isArray(rawCommits) && !isRecord(rawCommits)) {
    repo.problem('commits must be a list or mapping')
  }

  commitList.forEach((raw, i) => {
    if (!isRecord(raw)) {
      repo.problem(`commits[${i}] must be a mapping`)
      return
    }
    const commit = new RecordReader(raw, `${label} commit ${i}`, problems)
    const author = commit.record('author') ?? {}
    const authorReader = new RecordReader(author, `${label} commit ${i} author`, problems)
    const tree: Record<string, string> = {}
    for (const [path, content] of Object.entries(commit.record('tree') ?? {})) {
      if (typeof content === 'string') tree[path] = content
      else commit.problem(`tree entry "${path}" must be a string`)
    }
    const commitId = commit.requiredString('id')
    commits[commitId] = {
      id: commitId,
      parents: commit.stringList('parents'),
      author: {
        name: authorReader.string('name') ?? 'unknown',
        email: authorReader.string('email') ?? ''
      },
      timestamp: commit.timestamp('timestamp') ?? new Date(0).toISOString(),
      message: commit.string('message') ?? '',
      tree
    }
  })

  const refs = (name: string): Record<string, string> => {
    const result: Record<string, string> = {}
    for (const [ref, target] of Object.entries(repo.record(name) ?? {})) {
      if (typeof target !== 'string') {
        repo.problem(`${name}.${ref} must be a commit id`)
      } else if (!commits[target]) {
        repo.problem(`${name}.${ref} points to unknown commit ${target}`)
      } else {
        result[ref] = target
      }
    }
    return result
  }

  const permissions = repo.record('permissions')
  const permissionReader = new RecordReader(permissions ?? {}, `${label} permissions`, problems)

  const repository: StoredRepository = {
    id,
    defaultBranch: repo.string('default_branch') ?? DEFAULT_BRANCH,
    description: repo.string('description'),
    fork: repo.boolean('fork'),
    commits,
    branches: refs('branches'),
    tags: refs('tags'),
    readOnly: repo.boolean('read_only') ?? false,
    archivedAt: repo.timestamp('archived_at'),
    permissions: { archive: permissionReader.boolean('archive') ?? true },
    mounts: readList(repo.raw('mounts')).map(m => {
      const r = new RecordReader(m, `${label} mount`, problems)
      return {
        path: r.requiredString('path'),
        source: r.requiredString('source'),
        ref: r.requiredString('ref'),
        operationId: r.requiredString('operation_id')
      }
    }),
    provenance: readList(repo.raw('provenance')).map(m => {
      const r = new RecordReader(m, `${label} provenance`, problems)
      return {
        operationKey: r.requiredString('operation_key'),
        operationId: r.requiredString('operation_id'),
        source: r.requiredString('source'),
        targetPath: r.requiredString('target_path'),
        appliedAt: r.timestamp('applied_at') ?? new Date(0).toISOString(),
        commitsImported: r.number('commits_imported') ?? 0,
        branches: r.stringList('branches'),
        tags: r.stringList('tags')
      }
    }),
    notes: readList(repo.raw('notes')).map(n => {
      const r = new RecordReader(n, `${label} note`, problems)
      return {
        path: r.requiredString('path'),
        content: r.string('content') ?? '',
        createdAt: r.timestamp('created_at') ?? new Date(0).toISOString()
      }
    })
  }

  if (problems.length > 0) {
    throw new InvalidInventoryError(problems, source)
  }
  return repository
}

function readList(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : []
}

/**
 * Inverse of parseStoredRepository: the on-disk document shape
 */
export function serializeStoredRepository(repository: StoredRepository): Record<string, unknown> {
  return {
    id: repository.id,
    default_branch: repository.defaultBranch,
    ...(repository.description !== undefined ? { description: repository.description } : {}),
    ...(repository.fork !== undefined ? { fork: repository.fork } : {}),
    read_only: repository.readOnly,
    ...(repository.archivedAt ? { archived_at: repository.archivedAt } : {}),
    permissions: { archive: repository.permissions.archive },
    branches: repository.branches,
    tags: repository.tags,
    commits: Object.values(repository.commits)
      .sort((a, b) => a.timestamp.localeCompare(b.timestamp) || a.id.localeCompare(b.id))
      .map(commit => ({
        id: commit.id,
        parents: commit.parents,
        author: commit.author,
        timestamp: commit.timestamp,
        message: commit.message,
        tree: commit.tree
      })),
    mounts: repository.mounts.map(mount => ({
      path: mount.path,
      source: mount.source,
      ref: mount.ref,
      operation_id: mount.operationId
    })),
    provenance: repository.provenance.map(marker => ({
      operation_key: marker.operationKey,
      operation_id: marker.operationId,
      source: marker.source,
      target_path: marker.targetPath,
      applied_at: marker.appliedAt,
      commits_imported: marker.commitsImported,
      branches: marker.branches,
      tags: marker.tags
    })),
    notes: repository.notes.map(note => ({
      path: note.path,
      content: note.content,
      created_at: note.createdAt
    }))
  }
}
