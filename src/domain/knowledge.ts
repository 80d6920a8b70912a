/**
 * regraft Knowledge Extractor
 *
 * Read-only pass over consolidated repositories that collects long-form
 * documentation and commit messages with substantial bodies.
 *
 * Output layout (when an output directory is given):
 * <output>/
 * ├── index.json
 * ├── platform-docs-architecture.md.md   # from platform:docs/architecture.md
 * └── ...
 */

import { createHash } from 'node:crypto'
import fs from 'node:fs'
import path from 'node:path'
import type { KnowledgeDocument, KnowledgeResult, StoredRepository } from './types.js'
import type { RepositoryStore } from '../lib/repo-store.js'
import { compileGlobPatterns } from '../lib/pattern-matcher.js'
import { consolidatedTree } from './history.js'

export const DEFAULT_KNOWLEDGE_INCLUDE = ['**/*.md', '**/*.mdx', '**/*.rst', '**/*.adoc', 'docs/**/*.txt']
export const DEFAULT_MIN_LENGTH = 200
export const DEFAULT_MIN_COMMIT_BODY = 120

export interface ExtractOptions {
  include?: readonly string[]
  /** Minimum trimmed length for a file to count as a document */
  minLength?: number
  /** Minimum commit message body length; 0 disables commit notes */
  minCommitBody?: number
  outputDir?: string
  /** Called for each per-repository failure */
  warn?: (message: string) => void
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extract knowledge documents from `repositories`. Failures are returned as
 * warnings; this function only rejects when the output cannot be written.
 */
export async function extractKnowledge(
  store: RepositoryStore,
  repositories: readonly string[],
  options: ExtractOptions = {}
): Promise<KnowledgeResult> {
  const {
    include = DEFAULT_KNOWLEDGE_INCLUDE,
    minLength = DEFAULT_MIN_LENGTH,
    minCommitBody = DEFAULT_MIN_COMMIT_BODY,
    outputDir,
    warn
  } = options

  const matches = compileGlobPatterns(include)
  const documents: KnowledgeDocument[] = []
  const seenHashes = new Set<string>()
  const warnings: string[] = []

  const addWarning = (message: string) => {
    warnings.push(message)
    warn?.(message)
  }

  for (const id of repositories) {
    let repository: StoredRepository | null
    try {
      repository = await store.read(id)
    } catch (err) {
      addWarning(`${id}: ${err instanceof Error ? err.message : String(err)}`)
      continue
    }
    if (!repository) {
      addWarning(`${id}: repository not found in store`)
      continue
    }

    const candidates = [
      ...documentsFromTree(repository, matches, minLength),
      ...(minCommitBody > 0 ? notesFromCommits(repository, minCommitBody) : [])
    ]
    for (const doc of candidates) {
      if (seenHashes.has(doc.contentHash)) continue
      seenHashes.add(doc.contentHash)
      documents.push(doc)
    }
  }

  const written = outputDir ? writeKnowledge(documents, outputDir) : []
  return { documents, warnings, written }
}

function documentsFromTree(
  repository: StoredRepository,
  matches: (value: string) => boolean,
  minLength: number
): KnowledgeDocument[] {
  const tree = consolidatedTree(repository)
  return Object.keys(tree)
    .sort()
    .filter(file => matches(file) && tree[file].trim().length >= minLength)
    .map(file => {
      const content = tree[file]
      const headings = extractHeadings(content)
      return Object.freeze({
        id: `${repository.id}:${file}`,
        repository: repository.id,
        kind: 'document',
        origin: file,
        title: headings[0] ?? path.posix.basename(file),
        headings: Object.freeze(headings),
        content,
        contentHash: hashContent(content)
      } satisfies KnowledgeDocument)
    })
}

function notesFromCommits(repository: StoredRepository, minBody: number): KnowledgeDocument[] {
  return Object.values(repository.commits)
    .sort((a, b) => a.timestamp.localeCompare(b.timestamp) || a.id.localeCompare(b.id))
    .flatMap(commit => {
      const { subject, body } = splitMessage(commit.message)
      if (body.length < minBody) return []
      return [Object.freeze({
        id: `${repository.id}@${commit.id}`,
        repository: repository.id,
        kind: 'commit-note',
        origin: commit.id,
        title: subject || commit.id,
        headings: Object.freeze([]),
        content: commit.message.trim(),
        contentHash: hashContent(commit.message.trim())
      } satisfies KnowledgeDocument)]
    })
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Markdown ATX headings and reStructuredText/AsciiDoc titles
 */
export function extractHeadings(content: string): string[] {
  const headings: string[] = []
  const lines = content.split(/\r?\n/)

  lines.forEach((line, i) => {
    const atx = /^(?:#{1,6}|={1,6})\s+(.+?)\s*#*$/.exec(line)
    if (atx) {
      headings.push(atx[1])
      return
    }
    const next = lines[i + 1]
    if (line.trim() && next !== undefined && /^(=+|-+)$/.test(next.trim()) && next.trim().length >= line.trim().length) {
      headings.push(line.trim())
    }
  })

  return headings
}

export function splitMessage(message: string): { subject: string; body: string } {
  const trimmed = message.trim()
  const newline = trimmed.indexOf('\n')
  if (newline < 0) return { subject: trimmed, body: '' }
  return {
    subject: trimmed.slice(0, newline).trim(),
    body: trimmed.slice(newline + 1).trim()
  }
}

function hashContent(content: string): string {
  return createHash('sha256').update(content.trim()).digest('hex')
}

function documentFilename(doc: KnowledgeDocument): string {
  return doc.id.replace(/[^a-zA-Z0-9._-]+/g, '-') + '.md'
}

function writeKnowledge(documents: readonly KnowledgeDocument[], outputDir: string): string[] {
  fs.mkdirSync(outputDir, { recursive: true })
  const written: string[] = []

  for (const doc of documents) {
    const file = path.join(outputDir, documentFilename(doc))
    const header = [
      '---',
      `repository: ${doc.repository}`,
      `kind: ${doc.kind}`,
      `origin: ${doc.origin}`,
      '---',
      ''
    ].join('\n')
    fs.writeFileSync(file, header + doc.content.trimEnd() + '\n', 'utf-8')
    written.push(file)
  }

  const indexPath = path.join(outputDir, 'index.json')
  const index = documents.map(doc => ({
    id: doc.id,
    repository: doc.repository,
    kind: doc.kind,
    origin: doc.origin,
    title: doc.title,
    headings: doc.headings,
    contentHash: doc.contentHash,
    file: documentFilename(doc)
  }))
  fs.writeFileSync(indexPath, JSON.stringify({ documents: index }, null, 2) + '\n', 'utf-8')
  written.push(indexPath)

  return written
}
