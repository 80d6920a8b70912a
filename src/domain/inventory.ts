/**
 * regraft Inventory Loader
 *
 * Parses a discovery snapshot into immutable RepositoryRecords.
 *
 * Accepted shapes:
 * - `{ repositories: { <id>: {...} } }` or a bare `{ <id>: {...} }` mapping
 * - the discovery scanner output: `{ scan_timestamp, repositories: [{ name, ... }] }`
 *
 * Also classifies records by activity (CORE / ACTIVE / CONSOLIDATE /
 * ARCHIVE / DEPRECATE), as the discovery scanner does.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { Classification } from '../types.js'
import { DEFAULT_BRANCH } from '../types.js'
import type { ClassifiedRecord, Inventory, RepositoryRecord } from './types.js'
import type { RepositoryStore } from '../lib/repo-store.js'
import { RecordReader, isRecord } from '../lib/record-reader.js'
import type { UnknownRecord } from '../lib/record-reader.js'
import { FileNotFoundError, InvalidInventoryError } from '../lib/errors.js'
import { latestTimestamp } from './history.js'

/** Top-level snapshot keys that are metadata, not repositories */
const META_KEYS = new Set([
  'generated_at',
  'generatedAt',
  'scan_timestamp',
  'scanner_version',
  'total_repos',
  'classifications',
  'version'
])

const DAY_MS = 24 * 60 * 60 * 1000
const ACTIVE_OPEN_ISSUES = 5

// ============================================================================
// Loading
// ============================================================================

/**
 * Read a snapshot file (JSON, or YAML by extension)
 */
export function loadInventory(filePath: string): Inventory {
  const absolute = path.resolve(filePath)
  if (!fs.existsSync(absolute)) {
    throw new FileNotFoundError(absolute)
  }

  return parseInventory(readStructuredFile(absolute), absolute)
}

/**
 * Parse JSON or YAML content by file extension
 */
export function readStructuredFile(filePath: string): unknown {
  const content = fs.readFileSync(filePath, 'utf-8')
  const ext = path.extname(filePath).toLowerCase()

  try {
    return ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content)
  } catch (err) {
    throw new InvalidInventoryError(
      [`cannot parse ${ext === '.json' ? 'JSON' : 'file'}: ${err instanceof Error ? err.message : String(err)}`],
      filePath
    )
  }
}

export function parseInventory(data: unknown, source: string, now: Date = new Date()): Inventory {
  if (!isRecord(data)) {
    throw new InvalidInventoryError(['snapshot must be a mapping'], source)
  }

  const problems: string[] = []
  const meta = new RecordReader(data, 'snapshot', problems)
  const generatedAt = meta.timestamp('generated_at') ?? meta.timestamp('scan_timestamp') ?? now.toISOString()

  const rawRecords = collectRawRecords(data, problems)
  const records: RepositoryRecord[] = []
  const seen = new Set<string>()

  for (const { id, raw } of rawRecords) {
    if (seen.has(id)) {
      problems.push(`repository "${id}": duplicate identifier`)
      continue
    }
    seen.add(id)
    const record = parseRecord(id, raw, problems)
    if (record) records.push(record)
  }

  if (problems.length > 0) {
    throw new InvalidInventoryError(problems, source)
  }

  return createInventory(records, source, generatedAt)
}

function collectRawRecords(data: UnknownRecord, problems: string[]): Array<{ id: string; raw: UnknownRecord }> {
  const container = 'repositories' in data ? data.repositories : data
  const result: Array<{ id: string; raw: UnknownRecord }> = []

  if (Array.isArray(container)) {
    container.forEach((raw, i) => {
      if (!isRecord(raw)) {
        problems.push(`repositories[${i}]: must be a mapping`)
        return
      }
      // scanner output carries a numeric platform id; the name is the identifier
      const id = typeof raw.name === 'string' ? raw.name : typeof raw.id === 'string' ? raw.id : ''
      if (!id) {
        problems.push(`repositories[${i}]: name or id is required`)
        return
      }
      result.push({ id, raw })
    })
    return result
  }

  if (!isRecord(container)) {
    problems.push('repositories must be a list or mapping')
    return result
  }

  for (const [id, raw] of Object.entries(container)) {
    if (container === data && META_KEYS.has(id)) continue
    if (!isRecord(raw)) {
      problems.push(`repository "${id}": must be a mapping`)
      continue
    }
    result.push({ id, raw })
  }
  return result
}

function parseRecord(id: string, raw: UnknownRecord, problems: string[]): RepositoryRecord | null {
  const before = problems.length
  const reader = new RecordReader(raw, `repository "${id}"`, problems)

  const defaultBranch = reader.string('default_branch') ?? DEFAULT_BRANCH
  const branches = reader.stringList('branches')
  const tags = reader.stringList('tags')
  const commitCount = reader.number('commit_count') ?? reader.number('commits')
  const openIssues = reader.number('open_issues')
  const lastActivity = reader.timestamp('last_activity')
    ?? reader.timestamp('pushed_at')
    ?? reader.timestamp('updated_at')

  if (commitCount !== undefined && (!Number.isInteger(commitCount) || commitCount < 0)) {
    reader.problem('commit_count must be a non-negative integer')
  }
  if (openIssues !== undefined && (!Number.isInteger(openIssues) || openIssues < 0)) {
    reader.problem('open_issues must be a non-negative integer')
  }
  if (lastActivity === undefined && !reader.has('last_activity')) {
    reader.problem('last_activity is required')
  }
  if (branches.length > 0 && !branches.includes(defaultBranch)) {
    reader.problem(`default branch "${defaultBranch}" is not in branches`)
  }

  const record: RepositoryRecord = {
    id,
    defaultBranch,
    branches: Object.freeze(branches.length > 0 ? branches : [defaultBranch]),
    tags: Object.freeze(tags),
    commitCount,
    lastActivity: lastActivity ?? '',
    description: reader.string('description'),
    fork: reader.boolean('fork'),
    archived: reader.boolean('archived'),
    sizeKb: reader.number('size_kb'),
    openIssues
  }

  return problems.length > before ? null : Object.freeze(record)
}

function createInventory(records: RepositoryRecord[], source: string, generatedAt: string): Inventory {
  const sorted = [...records].sort((a, b) => a.id.localeCompare(b.id))
  return Object.freeze({
    generatedAt,
    source,
    records: Object.freeze(sorted),
    byId: new Map(sorted.map(r => [r.id, r]))
  })
}

/**
 * Build a snapshot from the repositories in a store
 */
export async function inventoryFromStore(store: RepositoryStore, now: Date = new Date()): Promise<Inventory> {
  const records: RepositoryRecord[] = []

  for (const id of await store.list()) {
    const repository = await store.read(id)
    if (!repository) continue

    records.push(Object.freeze({
      id,
      defaultBranch: repository.defaultBranch,
      branches: Object.freeze(Object.keys(repository.branches).sort()),
      tags: Object.freeze(Object.keys(repository.tags).sort()),
      commitCount: Object.keys(repository.commits).length,
      lastActivity: latestTimestamp(repository) ?? new Date(0).toISOString(),
      description: repository.description,
      fork: repository.fork,
      archived: repository.readOnly
    }))
  }

  return createInventory(records, 'store', now.toISOString())
}

/**
 * Snapshot document for writing back to disk
 */
export function serializeInventory(inventory: Inventory): Record<string, unknown> {
  const repositories: Record<string, unknown> = {}
  for (const record of inventory.records) {
    repositories[record.id] = {
      default_branch: record.defaultBranch,
      branches: [...record.branches],
      tags: [...record.tags],
      ...(record.commitCount !== undefined ? { commit_count: record.commitCount } : {}),
      last_activity: record.lastActivity,
      ...(record.description !== undefined ? { description: record.description } : {}),
      ...(record.fork !== undefined ? { fork: record.fork } : {}),
      ...(record.archived !== undefined ? { archived: record.archived } : {}),
      ...(record.sizeKb !== undefined ? { size_kb: record.sizeKb } : {}),
      ...(record.openIssues !== undefined ? { open_issues: record.openIssues } : {})
    }
  }
  return { generated_at: inventory.generatedAt, repositories }
}

// ============================================================================
// Classification
// ============================================================================

export interface ClassifyOptions {
  now?: Date
  /** Always CORE */
  core?: readonly string[]
  activeDays?: number
  archiveDays?: number
}

/**
 * Classification rules:
 * - CORE: listed as core
 * - ARCHIVE: already archived on the platform
 * - ACTIVE: activity within `activeDays`, or more than 5 open issues
 * - ARCHIVE: idle longer than `archiveDays` but not empty
 * - DEPRECATE: fork or empty
 * - CONSOLIDATE: everything else
 *
 * Emptiness comes from the commit count, or from the size when a scanner
 * snapshot reports no commits. A record with neither is never judged empty
 * or non-empty.
 */
export function classifyRepository(record: RepositoryRecord, options: ClassifyOptions = {}): ClassifiedRecord {
  const { now = new Date(), core = [], activeDays = 30, archiveDays = 180 } = options
  const activity = Date.parse(record.lastActivity)
  const daysSinceActivity = Number.isNaN(activity)
    ? Number.POSITIVE_INFINITY
    : Math.floor((now.getTime() - activity) / DAY_MS)

  const empty = isEmptyRecord(record)

  let classification: Classification
  if (core.includes(record.id)) {
    classification = 'CORE'
  } else if (record.archived) {
    classification = 'ARCHIVE'
  } else if (daysSinceActivity < activeDays || (record.openIssues ?? 0) > ACTIVE_OPEN_ISSUES) {
    classification = 'ACTIVE'
  } else if (daysSinceActivity > archiveDays && empty === false) {
    classification = 'ARCHIVE'
  } else if (record.fork || empty === true) {
    classification = 'DEPRECATE'
  } else {
    classification = 'CONSOLIDATE'
  }

  return { record, classification, daysSinceActivity }
}

function isEmptyRecord(record: RepositoryRecord): boolean | undefined {
  const size = record.commitCount ?? record.sizeKb
  return size === undefined ? undefined : size === 0
}

export function classifyInventory(inventory: Inventory, options: ClassifyOptions = {}): ClassifiedRecord[] {
  return inventory.records.map(record => classifyRepository(record, options))
}

/**
 * Repository ids per classification
 */
export function summarizeInventory(classified: readonly ClassifiedRecord[]): Record<Classification, string[]> {
  const summary: Record<Classification, string[]> = {
    CORE: [],
    ACTIVE: [],
    CONSOLIDATE: [],
    ARCHIVE: [],
    DEPRECATE: []
  }
  for (const entry of classified) {
    summary[entry.classification].push(entry.record.id)
  }
  return summary
}
