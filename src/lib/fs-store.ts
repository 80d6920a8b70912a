/**
 * regraft Filesystem Store
 *
 * One JSON document per repository.
 *
 * Structure:
 * <store>/
 * ├── billing.json
 * ├── platform%2Fcore.json     # ids are URI-encoded
 * └── ...
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { glob } from 'tinyglobby'
import type { StoredRepository } from '../domain/types.js'
import { SerializedRepositoryStore, parseStoredRepository, serializeStoredRepository } from './repo-store.js'
import { InvalidInventoryError } from './errors.js'

// =============================================================================
// Path Helpers
// =============================================================================

export function getRepositoryPath(storeDir: string, id: string): string {
  return join(storeDir, `${encodeURIComponent(id)}.json`)
}

function idFromFilename(filename: string): string {
  return decodeURIComponent(filename.replace(/\.json$/, ''))
}

// =============================================================================
// Store
// =============================================================================

export class FsRepositoryStore extends SerializedRepositoryStore {
  constructor(private readonly storeDir: string) {
    super()
  }

  get directory(): string {
    return this.storeDir
  }

  async list(): Promise<string[]> {
    if (!existsSync(this.storeDir)) return []
    const files = await glob('*.json', { cwd: this.storeDir, onlyFiles: true })
    return files.map(idFromFilename).sort()
  }

  protected async load(id: string): Promise<StoredRepository | null> {
    const filePath = getRepositoryPath(this.storeDir, id)
    if (!existsSync(filePath)) return null

    let data: unknown
    try {
      data = JSON.parse(readFileSync(filePath, 'utf-8'))
    } catch (err) {
      throw new InvalidInventoryError(
        [`cannot parse JSON: ${err instanceof Error ? err.message : String(err)}`],
        filePath
      )
    }
    return parseStoredRepository(data, filePath)
  }

  protected async save(repository: StoredRepository): Promise<void> {
    mkdirSync(this.storeDir, { recursive: true })
    const filePath = getRepositoryPath(this.storeDir, repository.id)
    const tmpPath = `${filePath}.${process.pid}.tmp`

    // readers see the old or the new document, never a partial one
    writeFileSync(tmpPath, JSON.stringify(serializeStoredRepository(repository), null, 2) + '\n', 'utf-8')
    renameSync(tmpPath, filePath)
  }
}
