/**
 * Tests for inventory.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import {
  loadInventory,
  parseInventory,
  inventoryFromStore,
  serializeInventory,
  classifyRepository,
  classifyInventory,
  summarizeInventory
} from '../../src/domain/inventory.js'
import type { RepositoryRecord } from '../../src/domain/types.js'
import { MemoryRepositoryStore } from '../../src/lib/repo-store.js'
import { FileNotFoundError, InvalidInventoryError } from '../../src/lib/errors.js'
import { linearRepository } from '../fixtures/repositories.js'

const NOW = new Date('2024-06-30T00:00:00.000Z')

describe('parseInventory', () => {
  it('should parse a mapping of repositories sorted by id', () => {
    const inventory = parseInventory({
      generated_at: '2024-06-01T00:00:00Z',
      repositories: {
        billing: { default_branch: 'trunk', branches: ['trunk', 'dev'], commit_count: 42, last_activity: '2024-05-01T10:00:00Z' },
        auth: { commit_count: 7, last_activity: '2024-04-01T00:00:00Z', fork: true }
      }
    }, 'inventory.yaml', NOW)

    expect(inventory.generatedAt).toBe('2024-06-01T00:00:00.000Z')
    expect(inventory.source).toBe('inventory.yaml')
    expect(inventory.records.map(r => r.id)).toEqual(['auth', 'billing'])
    expect(inventory.byId.get('billing')).toEqual({
      id: 'billing',
      defaultBranch: 'trunk',
      branches: ['trunk', 'dev'],
      tags: [],
      commitCount: 42,
      lastActivity: '2024-05-01T10:00:00.000Z',
      description: undefined,
      fork: undefined,
      archived: undefined,
      sizeKb: undefined
    })
    expect(inventory.byId.get('auth')?.branches).toEqual(['main'])
    expect(inventory.byId.get('auth')?.fork).toBe(true)
  })

  it('should accept a bare mapping and skip metadata keys', () => {
    const inventory = parseInventory({
      version: 2,
      total_repos: 1,
      web: { commits: 3, lastActivity: '2024-06-01T00:00:00Z' }
    }, 'test', NOW)

    expect(inventory.records.map(r => r.id)).toEqual(['web'])
    expect(inventory.records[0].commitCount).toBe(3)
    expect(inventory.generatedAt).toBe(NOW.toISOString())
  })

  it('should accept scanner output with a list of repositories', () => {
    const inventory = parseInventory({
      scan_timestamp: '2024-06-15T08:00:00Z',
      repositories: [
        { id: 1001, name: 'svc-orders', default_branch: 'main', pushed_at: '2024-06-10T00:00:00Z', size_kb: 512 },
        { name: 'svc-carts', updated_at: '2024-02-10T00:00:00Z', archived: true }
      ]
    }, 'scan.json', NOW)

    expect(inventory.generatedAt).toBe('2024-06-15T08:00:00.000Z')
    expect(inventory.records.map(r => r.id)).toEqual(['svc-carts', 'svc-orders'])
    expect(inventory.byId.get('svc-orders')?.lastActivity).toBe('2024-06-10T00:00:00.000Z')
    expect(inventory.byId.get('svc-orders')?.sizeKb).toBe(512)
    expect(inventory.byId.get('svc-carts')?.archived).toBe(true)
  })

  it('should collect every problem before failing', () => {
    try {
      parseInventory({
        repositories: {
          bad: { commit_count: -1 },
          odd: { last_activity: 'yesterday', branches: ['dev'] }
        }
      }, 'inventory.json', NOW)
      expect.unreachable('parseInventory should throw')
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInventoryError)
      if (err instanceof InvalidInventoryError) {
        expect(err.problems).toEqual([
          'repository "bad": commit_count must be a non-negative integer',
          'repository "bad": last_activity is required',
          'repository "odd": last_activity must be an ISO timestamp',
          'repository "odd": default branch "main" is not in branches'
        ])
      }
    }
  })

  it('should reject duplicate identifiers in scanner lists', () => {
    expect(() => parseInventory({
      repositories: [
        { name: 'dup', last_activity: '2024-01-01T00:00:00Z' },
        { name: 'dup', last_activity: '2024-01-02T00:00:00Z' }
      ]
    }, 'scan.json', NOW)).toThrow('repository "dup": duplicate identifier')
  })

  it('should reject snapshots that are not mappings', () => {
    expect(() => parseInventory(['a'], 'list.json')).toThrow(InvalidInventoryError)
    expect(() => parseInventory({ repositories: 'nope' }, 'x.json')).toThrow(InvalidInventoryError)
  })
})

describe('loadInventory', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'regraft-inventory-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should read YAML snapshots', () => {
    const file = path.join(tempDir, 'inventory.yaml')
    fs.writeFileSync(file, [
      'repositories:',
      '  api:',
      '    commit_count: 12',
      '    last_activity: 2024-05-20T00:00:00Z',
      ''
    ].join('\n'))

    const inventory = loadInventory(file)

    expect(inventory.source).toBe(file)
    expect(inventory.byId.get('api')?.commitCount).toBe(12)
    expect(inventory.byId.get('api')?.lastActivity).toBe('2024-05-20T00:00:00.000Z')
  })

  it('should read JSON snapshots', () => {
    const file = path.join(tempDir, 'inventory.json')
    fs.writeFileSync(file, JSON.stringify({ repositories: { api: { commit_count: 1, last_activity: '2024-05-20T00:00:00Z' } } }))

    expect(loadInventory(file).records).toHaveLength(1)
  })

  it('should report unparsable files', () => {
    const file = path.join(tempDir, 'inventory.json')
    fs.writeFileSync(file, '{ not json')

    expect(() => loadInventory(file)).toThrow(InvalidInventoryError)
  })

  it('should fail for a missing file', () => {
    expect(() => loadInventory(path.join(tempDir, 'missing.yaml'))).toThrow(FileNotFoundError)
  })
})

describe('inventoryFromStore', () => {
  it('should describe stored repositories', async () => {
    const store = new MemoryRepositoryStore([
      linearRepository('b', { commits: 3, tags: { 'v1': 1 } }),
      linearRepository('a', { readOnly: true, startDay: 5 })
    ])

    const inventory = await inventoryFromStore(store, NOW)

    expect(inventory.source).toBe('store')
    expect(inventory.generatedAt).toBe(NOW.toISOString())
    expect(inventory.records.map(r => r.id)).toEqual(['a', 'b'])
    expect(inventory.byId.get('b')).toMatchObject({
      defaultBranch: 'main',
      branches: ['main'],
      tags: ['v1'],
      commitCount: 3,
      lastActivity: '2024-01-03T00:00:00.000Z',
      archived: false
    })
    expect(inventory.byId.get('a')?.archived).toBe(true)
    expect(inventory.byId.get('a')?.lastActivity).toBe('2024-01-06T00:00:00.000Z')
  })

  it('should round-trip through serializeInventory', async () => {
    const store = new MemoryRepositoryStore([linearRepository('b', { commits: 3 })])
    const inventory = await inventoryFromStore(store, NOW)

    const reparsed = parseInventory(serializeInventory(inventory), 'copy', NOW)

    expect(reparsed.records).toEqual(inventory.records.map(r => ({
      ...r,
      sizeKb: undefined
    })))
    expect(reparsed.generatedAt).toBe(inventory.generatedAt)
  })

  it('should keep scanner metrics when serializing', () => {
    const inventory = parseInventory({
      repositories: [{ name: 'svc', pushed_at: '2024-06-01T00:00:00Z', size_kb: 64, open_issues: 9 }]
    }, 'scan.json', NOW)

    const document = serializeInventory(inventory)

    expect(document.repositories).toEqual({
      svc: {
        default_branch: 'main',
        branches: ['main'],
        tags: [],
        last_activity: '2024-06-01T00:00:00.000Z',
        size_kb: 64,
        open_issues: 9
      }
    })
    expect(parseInventory(document, 'copy', NOW).byId.get('svc')).toMatchObject({ sizeKb: 64, openIssues: 9 })
  })
})

describe('classifyRepository', () => {
  const record = (overrides: Partial<RepositoryRecord>): RepositoryRecord => ({
    id: 'repo',
    defaultBranch: 'main',
    branches: ['main'],
    tags: [],
    commitCount: 5,
    lastActivity: '2024-03-01T00:00:00Z',
    ...overrides
  })

  it('should apply the classification rules in order', () => {
    const options = { now: NOW, core: ['platform'] }

    expect(classifyRepository(record({ id: 'platform', lastActivity: '2020-01-01T00:00:00Z' }), options).classification).toBe('CORE')
    expect(classifyRepository(record({ archived: true, lastActivity: '2024-06-29T00:00:00Z' }), options).classification).toBe('ARCHIVE')
    expect(classifyRepository(record({ lastActivity: '2024-06-20T00:00:00Z' }), options).classification).toBe('ACTIVE')
    expect(classifyRepository(record({ lastActivity: '2023-06-01T00:00:00Z' }), options).classification).toBe('ARCHIVE')
    expect(classifyRepository(record({ fork: true }), options).classification).toBe('DEPRECATE')
    expect(classifyRepository(record({ commitCount: 0, lastActivity: '2023-01-01T00:00:00Z' }), options).classification).toBe('DEPRECATE')
    expect(classifyRepository(record({}), options).classification).toBe('CONSOLIDATE')
  })

  it('should report whole days since activity', () => {
    expect(classifyRepository(record({ lastActivity: '2024-06-20T12:00:00Z' }), { now: NOW }).daysSinceActivity).toBe(9)
  })

  it('should honour custom thresholds', () => {
    const result = classifyRepository(record({ lastActivity: '2024-05-15T00:00:00Z' }), { now: NOW, activeDays: 60 })
    expect(result.classification).toBe('ACTIVE')
  })

  it('should classify scanner snapshots by size and open issues', () => {
    const inventory = parseInventory({
      scan_timestamp: '2024-12-01T00:00:00Z',
      repositories: [
        { name: 'old', pushed_at: '2024-01-01T00:00:00Z', size_kb: 500 },
        { name: 'blank', pushed_at: '2024-01-01T00:00:00Z', size_kb: 0 },
        { name: 'busy', pushed_at: '2024-09-01T00:00:00Z', size_kb: 40, open_issues: 12 },
        { name: 'quiet', pushed_at: '2024-09-01T00:00:00Z', size_kb: 40, open_issues: 5 },
        { name: 'unsized', pushed_at: '2024-01-01T00:00:00Z' }
      ]
    }, 'scan.json', NOW)

    const classified = classifyInventory(inventory, { now: new Date('2024-12-01T00:00:00Z') })

    expect(classified.map(entry => [entry.record.id, entry.classification, entry.daysSinceActivity])).toEqual([
      ['blank', 'DEPRECATE', 335],
      ['busy', 'ACTIVE', 91],
      ['old', 'ARCHIVE', 335],
      ['quiet', 'CONSOLIDATE', 91],
      ['unsized', 'CONSOLIDATE', 335]
    ])
    expect(inventory.byId.get('old')?.commitCount).toBeUndefined()
  })

  it('should prefer the commit count over the size', () => {
    const options = { now: NOW }
    expect(classifyRepository(record({ commitCount: 0, sizeKb: 300, lastActivity: '2023-01-01T00:00:00Z' }), options).classification)
      .toBe('DEPRECATE')
    expect(classifyRepository(record({ commitCount: undefined, sizeKb: 300, lastActivity: '2023-01-01T00:00:00Z' }), options).classification)
      .toBe('ARCHIVE')
  })

  it('should treat many open issues as activity', () => {
    expect(classifyRepository(record({ openIssues: 6 }), { now: NOW }).classification).toBe('ACTIVE')
    expect(classifyRepository(record({ openIssues: 5 }), { now: NOW }).classification).toBe('CONSOLIDATE')
  })

  it('should group ids by classification', () => {
    const inventory = parseInventory({
      repositories: {
        fresh: { commit_count: 2, last_activity: '2024-06-25T00:00:00Z' },
        stale: { commit_count: 2, last_activity: '2024-03-01T00:00:00Z' },
        core: { commit_count: 2, last_activity: '2024-03-01T00:00:00Z' }
      }
    }, 'test', NOW)

    const summary = summarizeInventory(classifyInventory(inventory, { now: NOW, core: ['core'] }))

    expect(summary).toEqual({
      CORE: ['core'],
      ACTIVE: ['fresh'],
      CONSOLIDATE: ['stale'],
      ARCHIVE: [],
      DEPRECATE: []
    })
  })
})
