/**
 * Tests for archive.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import {
  archiveRepository,
  buildRedirectNote,
  getRedirectDocumentPath,
  REDIRECT_NOTE_PATH
} from '../../src/domain/archive.js'
import { MemoryRepositoryStore } from '../../src/lib/repo-store.js'
import {
  ArchivalPermissionError,
  InvalidTransitionError,
  RepositoryNotFoundError
} from '../../src/lib/errors.js'
import { linearRepository, operation } from '../fixtures/repositories.js'

const NOW = new Date('2024-03-01T00:00:00.000Z')
const LATER = new Date('2024-04-01T00:00:00.000Z')

describe('archiveRepository', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'regraft-archive-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should lock the source and leave a redirect note', async () => {
    const store = new MemoryRepositoryStore([linearRepository('B', { commits: 3 })])
    const op = operation(0, 'B', 'A', 'legacy/b', { status: 'applied' })

    const record = await archiveRepository(store, op, { now: NOW })

    expect(record).toEqual({
      repository: 'B',
      archivedAt: '2024-03-01T00:00:00.000Z',
      redirectDocument: 'store://B/ARCHIVED.md',
      target: 'A',
      targetPath: 'legacy/b'
    })

    const archived = await store.read('B')
    expect(archived?.readOnly).toBe(true)
    expect(archived?.notes).toHaveLength(1)
    expect(archived?.notes[0].path).toBe(REDIRECT_NOTE_PATH)
    expect(archived?.notes[0].content.split('\n')[0]).toBe('# B has moved')
    expect(Object.keys(archived?.commits ?? {})).toHaveLength(3)
    expect(archived?.branches).toEqual({ main: 'B-c3' })
  })

  it('should write the redirect document when a directory is given', async () => {
    const store = new MemoryRepositoryStore([linearRepository('B')])
    const op = operation(0, 'B', 'A', 'legacy/b', { status: 'applied' })
    const redirectDir = path.join(tempDir, 'redirects')

    const record = await archiveRepository(store, op, { redirectDir, now: NOW })

    expect(record.redirectDocument).toBe(path.join(redirectDir, 'B.md'))
    const archived = await store.read('B')
    expect(fs.readFileSync(record.redirectDocument, 'utf-8')).toBe(`${archived?.notes[0].content}\n`)
  })

  it('should return the existing record for an archived source', async () => {
    const store = new MemoryRepositoryStore([linearRepository('B')])
    const op = operation(0, 'B', 'A', 'legacy/b', { status: 'applied' })

    await archiveRepository(store, op, { now: NOW })
    const again = await archiveRepository(store, op, { now: LATER })

    expect(again.archivedAt).toBe('2024-03-01T00:00:00.000Z')
    expect((await store.read('B'))?.notes).toHaveLength(1)
  })

  it('should only archive sources of applied operations', async () => {
    const store = new MemoryRepositoryStore([linearRepository('B')])

    await expect(archiveRepository(store, operation(0, 'B', 'A', 'b'), { now: NOW }))
      .rejects.toBeInstanceOf(InvalidTransitionError)
    expect((await store.read('B'))?.readOnly).toBe(false)
  })

  it('should refuse without archive permission', async () => {
    const store = new MemoryRepositoryStore([linearRepository('B', { archivePermission: false })])
    const op = operation(0, 'B', 'A', 'b', { status: 'applied' })

    await expect(archiveRepository(store, op, { now: NOW })).rejects.toThrow(
      'Cannot archive "B": archive permission is not granted'
    )
    await expect(archiveRepository(store, op, { now: NOW })).rejects.toBeInstanceOf(ArchivalPermissionError)
  })

  it('should fail for a missing source', async () => {
    const store = new MemoryRepositoryStore([])

    await expect(archiveRepository(store, operation(0, 'B', 'A', 'b', { status: 'applied' })))
      .rejects.toBeInstanceOf(RepositoryNotFoundError)
  })
})

describe('buildRedirectNote', () => {
  it('should point at the new location and namespaced branches', () => {
    const op = operation(1, 'billing', 'platform', 'services/billing', { status: 'applied' })
    const source = linearRepository('billing', { defaultBranch: 'trunk' })

    const note = buildRedirectNote(op, source, '2024-03-01T00:00:00.000Z')

    expect(note.split('\n')).toEqual([
      '# billing has moved',
      '',
      'This repository was consolidated into **platform** at `services/billing`.',
      '',
      '- **New location:** platform/services/billing',
      '- **Branches:** `services/billing/<branch>` (default: `services/billing/trunk`)',
      '- **Archived:** 2024-03-01T00:00:00.000Z',
      '- **Operation:** op-002-billing',
      '',
      'The full history is preserved in both places. This repository is read-only.'
    ])
  })
})

describe('getRedirectDocumentPath', () => {
  it('should encode repository ids into file names', () => {
    expect(getRedirectDocumentPath('/tmp/r', 'team/api')).toBe(path.join('/tmp/r', 'team%2Fapi.md'))
  })
})
