/**
 * regraft Merge Planner
 *
 * Turns merge plan entries into an ordered, validated list of merge
 * operations. Planning is pure: it reads the inventory and never touches the
 * repository store, so a plan is always a dry run.
 *
 * Generates plan artifacts (JSON + Markdown) for review before apply.
 */

import fs from 'node:fs'
import path from 'node:path'
import type {
  Inventory,
  MergeOperation,
  MergePlan,
  MergePlanEntry,
  SkippedEntry
} from './types.js'
import { transition } from './types.js'
import { DependencyGraph } from './graph.js'
import { pathsOverlap } from '../lib/locks.js'
import { InvalidPlanError, PlanConflictError, PlanCycleError } from '../lib/errors.js'
import type { PathConflict } from '../lib/errors.js'

/** Upper bound on rename suffixes tried for one entry */
const MAX_RENAME_ATTEMPTS = 1000

// ============================================================================
// Plan Computation
// ============================================================================

export interface ComputePlanOptions {
  inventory: Inventory
  entries: readonly MergePlanEntry[]
  /** Target repository for entries that do not name one */
  target: string
  /** Recorded on the plan; apply does not start operations of a dry-run plan */
  dryRun?: boolean
  now?: Date
}

/**
 * Compute a merge plan.
 *
 * Algorithm:
 * 1. Validate every entry (source, target, path), collecting all problems
 * 2. Walk entries in order, resolving path overlaps per target with the
 *    later entry's policy
 * 3. Link operations: a source must be complete before it is grafted
 *    elsewhere, and a new target is created by its first operation
 * 4. Order with Kahn's algorithm (ties by entry order)
 */
export function computePlan(options: ComputePlanOptions): MergePlan {
  const { inventory, entries, target, dryRun = false, now = new Date() } = options

  const resolved = validateEntries(inventory, entries, target)
  const { accepted, skipped } = resolveConflicts(resolved)

  // step 3: arena of operations, prerequisites by index
  const graph = new DependencyGraph<MergeOperation>()
  for (const item of accepted) {
    graph.add(Object.freeze({
      id: operationId(item.index, item.entry.source),
      index: item.index,
      source: item.entry.source,
      target: item.target,
      targetPath: item.targetPath,
      requestedPath: item.requestedPath,
      policy: item.entry.onConflict,
      status: 'pending',
      dependsOn: []
    }))
  }

  const createdTargets: string[] = []
  const creators = new Map<string, number>()
  accepted.forEach((item, i) => {
    if (!inventory.byId.has(item.target) && !creators.has(item.target)) {
      creators.set(item.target, i)
      createdTargets.push(item.target)
    }
  })

  accepted.forEach((item, i) => {
    accepted.forEach((other, j) => {
      if (other.target === item.entry.source) graph.addEdge(j, i)
    })
    const creator = creators.get(item.target)
    if (creator !== undefined) graph.addEdge(creator, i)
  })

  // step 4
  const { order, cycle } = graph.topologicalOrder()
  if (cycle.length > 0) {
    throw new PlanCycleError(cycle.map(i => graph.node(i).source))
  }

  const operations = order.map(i => {
    const op = graph.node(i)
    const dependsOn = graph.prerequisitesOf(i).map(p => graph.node(p).id)
    return transition(Object.freeze({ ...op, dependsOn: Object.freeze(dependsOn) }), 'validated')
  })

  return Object.freeze({
    id: generatePlanId(target, now),
    generatedAt: now.toISOString(),
    target,
    dryRun,
    operations: Object.freeze(operations),
    skipped: Object.freeze(skipped),
    createdTargets: Object.freeze(createdTargets)
  })
}

// ============================================================================
// Validation
// ============================================================================

interface ResolvedEntry {
  entry: MergePlanEntry
  index: number
  target: string
  requestedPath: string
}

/**
 * Normalize a target path: forward slashes, no empty or "." segments,
 * no trailing slash. Returns null for empty, absolute or parent-escaping
 * paths.
 */
export function normalizeTargetPath(raw: string): string | null {
  const trimmed = raw.trim().replace(/\\/g, '/')
  if (trimmed === '' || trimmed.startsWith('/') || /^[A-Za-z]:\//.test(trimmed)) {
    return null
  }

  const segments = trimmed.split('/').filter(s => s !== '' && s !== '.')
  if (segments.length === 0 || segments.includes('..')) {
    return null
  }
  return segments.join('/')
}

function validateEntries(
  inventory: Inventory,
  entries: readonly MergePlanEntry[],
  planTarget: string
): ResolvedEntry[] {
  const problems: string[] = []
  const resolved: ResolvedEntry[] = []
  const produced = new Set(entries.map(e => e.target ?? planTarget))
  const seenSources = new Map<string, number>()

  entries.forEach((entry, index) => {
    const label = `entry ${index + 1} (${entry.source || '?'})`
    const target = entry.target ?? planTarget
    const before = problems.length

    if (!entry.source) {
      problems.push(`${label}: source is required`)
    } else if (!inventory.byId.has(entry.source) && !produced.has(entry.source)) {
      problems.push(`${label}: source repository "${entry.source}" is not in the inventory`)
    }

    if (!target) {
      problems.push(`${label}: no target repository (set target on the plan or the entry)`)
    } else if (target === entry.source) {
      problems.push(`${label}: source and target are the same repository`)
    }

    const firstSeen = seenSources.get(entry.source)
    if (entry.source && firstSeen !== undefined) {
      problems.push(`${label}: source "${entry.source}" is already merged by entry ${firstSeen + 1}`)
    } else if (entry.source) {
      seenSources.set(entry.source, index)
    }

    const requestedPath = normalizeTargetPath(entry.targetPath)
    if (requestedPath === null) {
      problems.push(`${label}: invalid target path "${entry.targetPath}" (must be relative, non-empty, without "..")`)
    }

    if (problems.length === before && requestedPath !== null) {
      resolved.push({ entry, index, target, requestedPath })
    }
  })

  if (problems.length > 0) {
    throw new InvalidPlanError(problems, 'merge plan')
  }
  return resolved
}

// ============================================================================
// Conflict Resolution
// ============================================================================

interface AcceptedEntry extends ResolvedEntry {
  targetPath: string
}

interface ConflictResolution {
  accepted: AcceptedEntry[]
  skipped: SkippedEntry[]
}

/**
 * Overlap = equal or nested paths within one target. Entries are visited in
 * plan order; an earlier entry always keeps its path.
 */
function resolveConflicts(entries: ResolvedEntry[]): ConflictResolution {
  const accepted: AcceptedEntry[] = []
  const skipped: SkippedEntry[] = []
  const conflicts = new Map<string, PathConflict>()

  const addConflict = (target: string, targetPath: string, sources: string[]): void => {
    const key = `${target}:${targetPath}`
    const existing = conflicts.get(key)
    if (!existing) {
      conflicts.set(key, { target, targetPath, sources: [...sources] })
      return
    }
    for (const source of sources) {
      if (!existing.sources.includes(source)) existing.sources.push(source)
    }
  }

  for (const item of entries) {
    const sameTarget = accepted.filter(a => a.target === item.target)
    const overlapping = sameTarget.filter(a => pathsOverlap(a.targetPath, item.requestedPath))

    if (overlapping.length === 0) {
      accepted.push({ ...item, targetPath: item.requestedPath })
      continue
    }

    const first = overlapping[0]
    switch (item.entry.onConflict) {
      case 'skip-duplicate':
        skipped.push(Object.freeze({ entry: item.entry, target: item.target, keptBy: first.entry.source }))
        break

      case 'rename': {
        const renamed = renamePath(item.requestedPath, sameTarget.map(a => a.targetPath))
        if (renamed) {
          accepted.push({ ...item, targetPath: renamed })
        } else {
          addConflict(item.target, first.targetPath, [first.entry.source, item.entry.source])
        }
        break
      }

      case 'fail':
        addConflict(item.target, first.targetPath, [first.entry.source, item.entry.source])
        break
    }
  }

  if (conflicts.size > 0) {
    throw new PlanConflictError([...conflicts.values()])
  }
  return { accepted, skipped }
}

/**
 * First `<path>-N` (N ≥ 2) that overlaps none of `taken`. Null when a taken
 * path contains `requested`, since no suffix on the last segment escapes it.
 */
export function renamePath(requested: string, taken: readonly string[]): string | null {
  if (taken.some(t => t !== requested && requested.startsWith(`${t}/`))) {
    return null
  }

  for (let n = 2; n <= MAX_RENAME_ATTEMPTS; n++) {
    const candidate = `${requested}-${n}`
    if (!taken.some(t => pathsOverlap(t, candidate))) {
      return candidate
    }
  }
  return null
}

// ============================================================================
// Plan Artifact I/O
// ============================================================================

export interface PlanArtifactPaths {
  json: string
  markdown: string
}

/**
 * Write plan artifact to filesystem (JSON + Markdown).
 */
export function writePlanArtifact(plan: MergePlan, outputDir?: string): PlanArtifactPaths {
  const dir = outputDir || path.resolve('artifacts', 'regraft-plans')
  fs.mkdirSync(dir, { recursive: true })

  const safeId = plan.id.replace(/[^a-zA-Z0-9._-]/g, '-')
  const jsonPath = path.join(dir, `${safeId}.json`)
  const mdPath = path.join(dir, `${safeId}.md`)

  fs.writeFileSync(jsonPath, JSON.stringify(plan, null, 2) + '\n')
  fs.writeFileSync(mdPath, buildPlanMarkdown(plan) + '\n')

  return { json: jsonPath, markdown: mdPath }
}

/**
 * Generate a plan ID: target-timestamp (sorts chronologically)
 */
export function generatePlanId(target: string, date: Date): string {
  const ts = date.toISOString().replace(/[:.]/g, '-')
  return `${sanitize(target) || 'plan'}-${ts}`
}

export function operationId(index: number, source: string): string {
  return `op-${String(index + 1).padStart(3, '0')}-${sanitize(source) || 'repo'}`
}

function sanitize(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

/**
 * Build markdown representation of a plan.
 */
export function buildPlanMarkdown(plan: MergePlan): string {
  const lines: string[] = []

  lines.push('# regraft Plan')
  lines.push('')
  lines.push(`- **ID:** ${plan.id}`)
  lines.push(`- **Target:** ${plan.target}`)
  lines.push(`- **Generated:** ${plan.generatedAt}`)
  lines.push(`- **Dry run:** ${plan.dryRun ? 'yes' : 'no'}`)
  lines.push('')

  lines.push('## Summary')
  lines.push('')
  lines.push('| Metric | Count |')
  lines.push('|--------|-------|')
  lines.push(`| Operations | ${plan.operations.length} |`)
  lines.push(`| Skipped duplicates | ${plan.skipped.length} |`)
  lines.push(`| New targets | ${plan.createdTargets.length} |`)
  lines.push('')

  if (plan.operations.length > 0) {
    lines.push('## Operations')
    lines.push('')
    for (const op of plan.operations) {
      const renamed = op.targetPath !== op.requestedPath ? ` (renamed from \`${op.requestedPath}\`)` : ''
      const deps = op.dependsOn.length > 0 ? ` after ${op.dependsOn.join(', ')}` : ''
      lines.push(`- \`${op.id}\` **${op.source}** → ${op.target}:\`${op.targetPath}\`${renamed}${deps}`)
    }
    lines.push('')
  }

  if (plan.skipped.length > 0) {
    lines.push('## Skipped')
    lines.push('')
    for (const s of plan.skipped) {
      lines.push(`- **${s.entry.source}** → ${s.target}:\`${s.entry.targetPath}\` (kept: ${s.keptBy})`)
    }
    lines.push('')
  }

  return lines.join('\n')
}
