/**
 * Tests for plan.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import {
  computePlan,
  normalizeTargetPath,
  renamePath,
  generatePlanId,
  operationId,
  writePlanArtifact,
  buildPlanMarkdown
} from '../../src/domain/plan.js'
import { parseInventory } from '../../src/domain/inventory.js'
import type { Inventory, MergePlanEntry } from '../../src/domain/types.js'
import type { ConflictPolicy } from '../../src/types.js'
import { InvalidPlanError, PlanConflictError, PlanCycleError } from '../../src/lib/errors.js'

const NOW = new Date('2024-03-01T12:30:00.000Z')

function inventoryOf(...ids: string[]): Inventory {
  const repositories: Record<string, unknown> = {}
  for (const id of ids) {
    repositories[id] = { commit_count: 2, last_activity: '2024-01-01T00:00:00Z' }
  }
  return parseInventory({ repositories }, 'test', NOW)
}

function entry(source: string, targetPath: string, onConflict: ConflictPolicy = 'fail', target?: string): MergePlanEntry {
  return { source, targetPath, onConflict, ...(target ? { target } : {}) }
}

describe('computePlan', () => {
  const inventory = inventoryOf('A', 'B', 'C', 'D')

  it('should produce one validated operation per disjoint entry', () => {
    const plan = computePlan({
      inventory,
      entries: [entry('B', 'legacy/b'), entry('C', 'legacy/c'), entry('D', 'tools/d')],
      target: 'A',
      now: NOW
    })

    expect(plan.operations).toHaveLength(3)
    expect(plan.operations.map(op => op.id)).toEqual(['op-001-b', 'op-002-c', 'op-003-d'])
    expect(plan.operations.every(op => op.status === 'validated')).toBe(true)
    expect(plan.operations.every(op => op.dependsOn.length === 0)).toBe(true)
    expect(plan.skipped).toEqual([])
    expect(plan.createdTargets).toEqual([])
    expect(plan.id).toBe('a-2024-03-01T12-30-00-000Z')
    expect(plan.dryRun).toBe(false)
  })

  it('should normalize target paths', () => {
    const plan = computePlan({
      inventory,
      entries: [entry('B', './legacy//b/')],
      target: 'A',
      now: NOW
    })

    expect(plan.operations[0].targetPath).toBe('legacy/b')
    expect(plan.operations[0].requestedPath).toBe('legacy/b')
  })

  it('should report every conflicting source with the fail policy', () => {
    const error = (() => {
      try {
        computePlan({
          inventory,
          entries: [entry('B', 'shared/lib'), entry('C', 'shared/lib')],
          target: 'A',
          now: NOW
        })
      } catch (err) {
        return err
      }
      return undefined
    })()

    expect(error).toBeInstanceOf(PlanConflictError)
    if (error instanceof PlanConflictError) {
      expect(error.conflicts).toEqual([{ target: 'A', targetPath: 'shared/lib', sources: ['B', 'C'] }])
    }
  })

  it('should treat nested paths as conflicts', () => {
    expect(() => computePlan({
      inventory,
      entries: [entry('B', 'shared'), entry('C', 'shared/lib')],
      target: 'A',
      now: NOW
    })).toThrow(PlanConflictError)
  })

  it('should group several entries on one path into a single conflict', () => {
    try {
      computePlan({
        inventory,
        entries: [entry('B', 'x'), entry('C', 'x'), entry('D', 'x')],
        target: 'A',
        now: NOW
      })
      expect.unreachable('computePlan should throw')
    } catch (err) {
      expect(err).toBeInstanceOf(PlanConflictError)
      if (err instanceof PlanConflictError) {
        expect(err.conflicts).toEqual([{ target: 'A', targetPath: 'x', sources: ['B', 'C', 'D'] }])
      }
    }
  })

  it('should allow equal paths in different targets', () => {
    const plan = computePlan({
      inventory,
      entries: [entry('B', 'lib', 'fail', 'A'), entry('C', 'lib', 'fail', 'D')],
      target: '',
      now: NOW
    })

    expect(plan.operations.map(op => `${op.target}:${op.targetPath}`)).toEqual(['A:lib', 'D:lib'])
  })

  it('should rename the later entry with a numeric suffix', () => {
    const plan = computePlan({
      inventory,
      entries: [entry('B', 'shared/lib'), entry('C', 'shared/lib', 'rename'), entry('D', 'shared/lib', 'rename')],
      target: 'A',
      now: NOW
    })

    expect(plan.operations.map(op => op.targetPath)).toEqual(['shared/lib', 'shared/lib-2', 'shared/lib-3'])
    expect(plan.operations[1].requestedPath).toBe('shared/lib')
    expect(plan.operations[1].policy).toBe('rename')
  })

  it('should keep a conflict when rename cannot escape an ancestor path', () => {
    expect(() => computePlan({
      inventory,
      entries: [entry('B', 'shared'), entry('C', 'shared/lib', 'rename')],
      target: 'A',
      now: NOW
    })).toThrow(PlanConflictError)
  })

  it('should skip duplicates and record them', () => {
    const plan = computePlan({
      inventory,
      entries: [entry('B', 'shared/lib'), entry('C', 'shared/lib', 'skip-duplicate')],
      target: 'A',
      now: NOW
    })

    expect(plan.operations.map(op => op.source)).toEqual(['B'])
    expect(plan.skipped).toEqual([
      { entry: entry('C', 'shared/lib', 'skip-duplicate'), target: 'A', keptBy: 'B' }
    ])
  })

  it('should use the later entry policy to resolve a conflict', () => {
    // the first entry's "rename" does not matter; the second entry fails
    expect(() => computePlan({
      inventory,
      entries: [entry('B', 'x', 'rename'), entry('C', 'x', 'fail')],
      target: 'A',
      now: NOW
    })).toThrow(PlanConflictError)
  })

  it('should order a source after the operations that merge into it', () => {
    const plan = computePlan({
      inventory,
      entries: [entry('B', 'b', 'fail', 'A'), entry('C', 'c', 'fail', 'B')],
      target: '',
      now: NOW
    })

    expect(plan.operations.map(op => op.id)).toEqual(['op-002-c', 'op-001-b'])
    expect(plan.operations[1].dependsOn).toEqual(['op-002-c'])
  })

  it('should make operations into a new target wait for the one that creates it', () => {
    const plan = computePlan({
      inventory,
      entries: [entry('B', 'b'), entry('C', 'c')],
      target: 'platform',
      now: NOW
    })

    expect(plan.createdTargets).toEqual(['platform'])
    expect(plan.operations[0].dependsOn).toEqual([])
    expect(plan.operations[1].dependsOn).toEqual(['op-001-b'])
  })

  it('should accept a source produced by an earlier entry', () => {
    const plan = computePlan({
      inventory,
      entries: [entry('B', 'b', 'fail', 'hub'), entry('hub', 'hub', 'fail', 'A')],
      target: '',
      now: NOW
    })

    expect(plan.operations.map(op => op.id)).toEqual(['op-001-b', 'op-002-hub'])
    expect(plan.operations[1].dependsOn).toEqual(['op-001-b'])
  })

  it('should reject a dependency cycle', () => {
    expect(() => computePlan({
      inventory,
      entries: [entry('A', 'a', 'fail', 'B'), entry('B', 'b', 'fail', 'A')],
      target: '',
      now: NOW
    })).toThrow('Merge plan contains a dependency cycle: B → A')
  })

  it('should collect every invalid entry', () => {
    try {
      computePlan({
        inventory,
        entries: [
          entry('ghost', 'g'),
          entry('A', 'a'),
          entry('B', '../escape'),
          entry('C', 'c'),
          entry('C', 'c2')
        ],
        target: 'A',
        now: NOW
      })
      expect.unreachable('computePlan should throw')
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidPlanError)
      if (err instanceof InvalidPlanError) {
        expect(err.problems).toEqual([
          'entry 1 (ghost): source repository "ghost" is not in the inventory',
          'entry 2 (A): source and target are the same repository',
          'entry 3 (B): invalid target path "../escape" (must be relative, non-empty, without "..")',
          'entry 5 (C): source "C" is already merged by entry 4'
        ])
      }
    }
  })

  it('should require a target', () => {
    expect(() => computePlan({
      inventory,
      entries: [entry('B', 'b')],
      target: '',
      now: NOW
    })).toThrow('entry 1 (B): no target repository')
  })

  it('should return an empty plan for no entries', () => {
    const plan = computePlan({ inventory, entries: [], target: 'A', now: NOW, dryRun: true })

    expect(plan.operations).toEqual([])
    expect(plan.dryRun).toBe(true)
  })

  it('should freeze the plan', () => {
    const plan = computePlan({ inventory, entries: [entry('B', 'b')], target: 'A', now: NOW })

    expect(Object.isFrozen(plan)).toBe(true)
    expect(Object.isFrozen(plan.operations)).toBe(true)
    expect(Object.isFrozen(plan.operations[0])).toBe(true)
  })
})

describe('normalizeTargetPath', () => {
  it('should normalize separators and dots', () => {
    expect(normalizeTargetPath('legacy\\billing')).toBe('legacy/billing')
    expect(normalizeTargetPath('a/./b//c/')).toBe('a/b/c')
  })

  it('should reject empty, absolute and escaping paths', () => {
    expect(normalizeTargetPath('')).toBeNull()
    expect(normalizeTargetPath('  ')).toBeNull()
    expect(normalizeTargetPath('/abs')).toBeNull()
    expect(normalizeTargetPath('C:/x')).toBeNull()
    expect(normalizeTargetPath('a/../b')).toBeNull()
    expect(normalizeTargetPath('./.')).toBeNull()
  })
})

describe('renamePath', () => {
  it('should pick the first free suffix', () => {
    expect(renamePath('lib', ['lib'])).toBe('lib-2')
    expect(renamePath('lib', ['lib', 'lib-2'])).toBe('lib-3')
  })

  it('should skip suffixes that overlap nested paths', () => {
    expect(renamePath('lib', ['lib', 'lib-2/x'])).toBe('lib-3')
  })

  it('should give up under a taken ancestor', () => {
    expect(renamePath('shared/lib', ['shared'])).toBeNull()
  })
})

describe('ids', () => {
  it('should build sortable plan ids', () => {
    expect(generatePlanId('Platform Core', NOW)).toBe('platform-core-2024-03-01T12-30-00-000Z')
    expect(generatePlanId('', NOW)).toBe('plan-2024-03-01T12-30-00-000Z')
  })

  it('should build operation ids from entry position and source', () => {
    expect(operationId(1, 'Billing Service')).toBe('op-002-billing-service')
    expect(operationId(11, '@@@')).toBe('op-012-repo')
  })
})

describe('plan artifacts', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'regraft-plan-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should write JSON and Markdown named after the plan id', () => {
    const plan = computePlan({
      inventory: inventoryOf('A', 'B', 'C'),
      entries: [entry('B', 'shared'), entry('C', 'shared', 'rename')],
      target: 'A',
      now: NOW
    })

    const paths = writePlanArtifact(plan, tempDir)

    expect(paths.json).toBe(path.join(tempDir, 'a-2024-03-01T12-30-00-000Z.json'))
    expect(paths.markdown).toBe(path.join(tempDir, 'a-2024-03-01T12-30-00-000Z.md'))
    const written: unknown = JSON.parse(fs.readFileSync(paths.json, 'utf-8'))
    expect(written).toEqual(JSON.parse(JSON.stringify(plan)))
  })

  it('should describe renames and dependencies in Markdown', () => {
    const plan = computePlan({
      inventory: inventoryOf('A', 'B', 'C'),
      entries: [entry('B', 'shared'), entry('C', 'shared', 'rename')],
      target: 'A',
      now: NOW
    })

    const markdown = buildPlanMarkdown(plan)

    expect(markdown.split('\n')).toContain('| Operations | 2 |')
    expect(markdown.split('\n')).toContain('- `op-002-c` **C** → A:`shared-2` (renamed from `shared`)')
  })
})
