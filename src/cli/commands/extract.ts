/**
 * regraft `extract` Command
 *
 * Runs the knowledge extractor on its own.
 *
 * Usage:
 *   regraft extract                      Every repository that carries grafts
 *   regraft extract --repos a,b          Named repositories
 *   regraft extract --output docs/kb     Output directory
 */

import type { CommandContext } from '../context.js'
import { executionSettings, openStore } from '../context.js'
import { splitList } from '../args.js'
import { extractKnowledge } from '../../domain/knowledge.js'
import type { RepositoryStore } from '../../lib/repo-store.js'
import { c, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export async function runExtract(context: CommandContext): Promise<void> {
  const { args, jsonOutput, dryRun } = context
  const store = openStore(context)
  const { knowledge } = executionSettings(context)

  const requested = splitList(args.repos)
  const repositories = requested.length > 0 ? requested : await consolidatedRepositories(store)

  if (repositories.length === 0) {
    if (jsonOutput) {
      ui.output(JSON.stringify({ documents: [], warnings: [], written: [] }))
    } else {
      ui.log(`${symbols.info} No consolidated repositories found. Pass ${c.command('--repos')} to choose some.`)
    }
    return
  }

  ui.verbose(`Extracting from: ${repositories.join(', ')}`, context.verbose)

  const result = await ui.withSpinner(
    `Extracting knowledge from ${repositories.length} repositories...`,
    () => extractKnowledge(store, repositories, {
      include: knowledge.include,
      minLength: knowledge.minLength,
      minCommitBody: knowledge.minCommitBody,
      outputDir: dryRun ? undefined : knowledge.outputDir,
      warn: ui.warn
    }),
    { successText: r => `Extracted ${r.documents.length} document(s)` }
  )

  if (jsonOutput) {
    ui.output(JSON.stringify({
      documents: result.documents.map(doc => ({
        id: doc.id,
        repository: doc.repository,
        kind: doc.kind,
        origin: doc.origin,
        title: doc.title
      })),
      warnings: result.warnings,
      written: result.written
    }, null, 2))
    return
  }

  for (const doc of result.documents) {
    ui.log(`  ${symbols.bullet} ${c.repo(doc.repository)} ${c.path(doc.origin)} ${c.muted(doc.title)}`)
  }
  if (result.written.length > 0) {
    ui.log(`  ${c.muted('Output:')} ${knowledge.outputDir}`)
  }
}

/**
 * Repositories that received at least one graft
 */
async function consolidatedRepositories(store: RepositoryStore): Promise<string[]> {
  const ids: string[] = []
  for (const id of await store.list()) {
    const repository = await store.read(id)
    if (repository && repository.mounts.length > 0) ids.push(id)
  }
  return ids
}
