/**
 * regraft Archival Manager
 *
 * Locks a merged source repository: read-only flag plus a redirect note
 * pointing at its new home. Commits and refs are never touched.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { ArchivalRecord, MergeOperation, RedirectNote, StoredRepository } from './types.js'
import type { RepositoryStore } from '../lib/repo-store.js'
import {
  ArchivalPermissionError,
  InvalidTransitionError,
  RepositoryNotFoundError
} from '../lib/errors.js'

/** Path of the redirect note inside an archived repository */
export const REDIRECT_NOTE_PATH = 'ARCHIVED.md'

export interface ArchiveOptions {
  /** Directory for redirect documents; without it only the stored note is written */
  redirectDir?: string
  now?: Date
}

export function buildRedirectNote(
  operation: MergeOperation,
  source: StoredRepository,
  archivedAt: string
): string {
  const lines: string[] = []

  lines.push(`# ${operation.source} has moved`)
  lines.push('')
  lines.push(`This repository was consolidated into **${operation.target}** at \`${operation.targetPath}\`.`)
  lines.push('')
  lines.push(`- **New location:** ${operation.target}/${operation.targetPath}`)
  lines.push(`- **Branches:** \`${operation.targetPath}/<branch>\` (default: \`${operation.targetPath}/${source.defaultBranch}\`)`)
  lines.push(`- **Archived:** ${archivedAt}`)
  lines.push(`- **Operation:** ${operation.id}`)
  lines.push('')
  lines.push('The full history is preserved in both places. This repository is read-only.')

  return lines.join('\n')
}

export function getRedirectDocumentPath(redirectDir: string, repository: string): string {
  return path.join(redirectDir, `${encodeURIComponent(repository)}.md`)
}

/**
 * Archive the source of an applied operation.
 *
 * An already archived source returns its existing record.
 */
export async function archiveRepository(
  store: RepositoryStore,
  operation: MergeOperation,
  options: ArchiveOptions = {}
): Promise<ArchivalRecord> {
  const { redirectDir, now = new Date() } = options

  if (operation.status !== 'applied') {
    throw new InvalidTransitionError(operation.id, operation.status, 'archived')
  }

  const written: { note?: RedirectNote } = {}
  const archived = await store.update(operation.source, current => {
    if (!current) {
      throw new RepositoryNotFoundError(operation.source, operation.id)
    }
    if (current.archivedAt) {
      written.note = current.notes.find(n => n.path === REDIRECT_NOTE_PATH)
      return current
    }
    if (!current.permissions.archive) {
      throw new ArchivalPermissionError(operation.source, 'archive permission is not granted')
    }

    const archivedAt = now.toISOString()
    const note: RedirectNote = {
      path: REDIRECT_NOTE_PATH,
      content: buildRedirectNote(operation, current, archivedAt),
      createdAt: archivedAt
    }
    written.note = note
    return {
      ...current,
      readOnly: true,
      archivedAt,
      notes: [...current.notes, note]
    }
  })

  let redirectDocument = `store://${operation.source}/${REDIRECT_NOTE_PATH}`
  if (redirectDir) {
    redirectDocument = getRedirectDocumentPath(redirectDir, operation.source)
    if (written.note && !fs.existsSync(redirectDocument)) {
      fs.mkdirSync(redirectDir, { recursive: true })
      fs.writeFileSync(redirectDocument, written.note.content + '\n', 'utf-8')
    }
  }

  return Object.freeze({
    repository: operation.source,
    archivedAt: archived.archivedAt ?? now.toISOString(),
    redirectDocument,
    target: operation.target,
    targetPath: operation.targetPath
  })
}
