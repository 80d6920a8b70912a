/**
 * Merge plan file loader
 *
 * Format (YAML or JSON):
 *
 *   target: platform
 *   entries:
 *     - source: legacy-billing
 *       target_path: legacy/billing
 *       on_conflict: fail          # fail | rename | skip-duplicate
 *       target: other-repo         # optional, overrides the plan target
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { ConflictPolicy } from '../types.js'
import { CONFLICT_POLICIES } from '../types.js'
import type { MergePlanEntry } from '../domain/types.js'
import { RecordReader, isRecord } from './record-reader.js'
import { FileNotFoundError, InvalidPlanError } from './errors.js'

export interface MergePlanFile {
  /** Plan-level target; empty when every entry names its own */
  target: string
  entries: MergePlanEntry[]
}

function isConflictPolicy(value: string): value is ConflictPolicy {
  return CONFLICT_POLICIES.some(policy => policy === value)
}

export function parseMergePlanFile(data: unknown, source: string): MergePlanFile {
  if (!isRecord(data)) {
    throw new InvalidPlanError(['merge plan must be a mapping with target and entries'], source)
  }

  const problems: string[] = []
  const root = new RecordReader(data, 'plan', problems)
  const target = root.string('target') ?? ''
  const rawEntries = root.raw('entries') ?? []

  if (!Array.isArray(rawEntries)) {
    throw new InvalidPlanError(['entries must be a list'], source)
  }

  const entries: MergePlanEntry[] = []
  rawEntries.forEach((raw, i) => {
    if (!isRecord(raw)) {
      problems.push(`entry ${i + 1}: must be a mapping`)
      return
    }

    const before = problems.length
    const entry = new RecordReader(raw, `entry ${i + 1}`, problems)
    const entrySource = entry.requiredString('source')
    // target path defaults to the source id
    const targetPath = entry.string('target_path') ?? entrySource
    const policy = entry.string('on_conflict') ?? 'fail'
    const entryTarget = entry.string('target')

    if (!isConflictPolicy(policy)) {
      entry.problem(`on_conflict must be one of ${CONFLICT_POLICIES.join(', ')} (got "${policy}")`)
      return
    }
    if (problems.length > before) return

    entries.push(Object.freeze({
      source: entrySource,
      targetPath,
      onConflict: policy,
      ...(entryTarget ? { target: entryTarget } : {})
    }))
  })

  if (problems.length > 0) {
    throw new InvalidPlanError(problems, source)
  }
  return { target, entries }
}

/**
 * Read a merge plan file (JSON, or YAML by extension)
 */
export function loadMergePlan(filePath: string): MergePlanFile {
  const absolute = path.resolve(filePath)
  if (!fs.existsSync(absolute)) {
    throw new FileNotFoundError(absolute)
  }

  const content = fs.readFileSync(absolute, 'utf-8')
  const ext = path.extname(absolute).toLowerCase()
  let data: unknown
  try {
    data = ext === '.json' ? JSON.parse(content) : parseYaml(content)
  } catch (err) {
    throw new InvalidPlanError([`cannot parse: ${err instanceof Error ? err.message : String(err)}`], absolute)
  }

  return parseMergePlanFile(data, absolute)
}
