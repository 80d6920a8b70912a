/**
 * regraft `inventory` Command
 *
 * Shows the discovery snapshot with a classification per repository.
 *
 * Usage:
 *   regraft inventory                 Classify the snapshot (or the store)
 *   regraft inventory --write         Snapshot the store into the inventory file
 *   regraft inventory --json          Machine-readable output
 */

import fs from 'node:fs'
import path from 'node:path'
import { stringify as stringifyYaml } from 'yaml'
import type { CommandContext } from '../context.js'
import { openStore, loadContextInventory } from '../context.js'
import {
  classifyInventory,
  inventoryFromStore,
  serializeInventory,
  summarizeInventory
} from '../../domain/inventory.js'
import type { ClassifiedRecord } from '../../domain/types.js'
import { CLASSIFICATIONS } from '../../types.js'
import { c, colorClassification, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export async function runInventory(context: CommandContext, now: Date = new Date()): Promise<void> {
  const { args, config, paths, jsonOutput, dryRun } = context
  const store = openStore(context)

  if (args.write) {
    const inventory = await inventoryFromStore(store, now)
    const document = serializeInventory(inventory)
    const content = path.extname(paths.inventory).toLowerCase() === '.json'
      ? JSON.stringify(document, null, 2) + '\n'
      : stringifyYaml(document)

    if (!dryRun) {
      fs.mkdirSync(path.dirname(paths.inventory), { recursive: true })
      fs.writeFileSync(paths.inventory, content, 'utf-8')
    }

    if (jsonOutput) {
      ui.output(JSON.stringify({ written: !dryRun, path: paths.inventory, repositories: inventory.records.length }))
    } else {
      const verb = dryRun ? 'Would write' : 'Wrote'
      ui.log(`${symbols.success} ${verb} ${inventory.records.length} repositories to ${c.path(paths.inventory)}`)
    }
    return
  }

  const inventory = await loadContextInventory(context, store, now)
  const classified = classifyInventory(inventory, {
    now,
    core: config.classification?.core,
    activeDays: config.classification?.active_days,
    archiveDays: config.classification?.archive_days
  })
  const summary = summarizeInventory(classified)

  if (jsonOutput) {
    ui.output(JSON.stringify({
      source: inventory.source,
      generatedAt: inventory.generatedAt,
      repositories: classified.map(entry => ({
        id: entry.record.id,
        classification: entry.classification,
        commits: entry.record.commitCount ?? null,
        sizeKb: entry.record.sizeKb ?? null,
        lastActivity: entry.record.lastActivity,
        daysSinceActivity: Number.isFinite(entry.daysSinceActivity) ? entry.daysSinceActivity : null
      })),
      summary
    }, null, 2))
    return
  }

  if (classified.length === 0) {
    ui.log(`${symbols.info} Inventory is empty (${inventory.source})`)
    return
  }

  ui.header(`Inventory (${inventory.source})`)
  ui.output(ui.formatTable(
    [
      { key: 'id', header: 'REPOSITORY' },
      { key: 'classification', header: 'CLASS' },
      { key: 'commits', header: 'COMMITS', align: 'right' },
      { key: 'idle', header: 'IDLE (DAYS)', align: 'right' }
    ],
    classified.map(toRow)
  ))

  ui.log('')
  for (const classification of CLASSIFICATIONS) {
    const ids = summary[classification]
    if (ids.length > 0) {
      ui.log(`  ${colorClassification(classification)}: ${ids.length}`)
    }
  }
}

function toRow(entry: ClassifiedRecord): Record<string, string | number> {
  return {
    id: entry.record.id,
    classification: ui.isTTY ? colorClassification(entry.classification) : entry.classification,
    commits: entry.record.commitCount ?? '-',
    idle: Number.isFinite(entry.daysSinceActivity) ? entry.daysSinceActivity : '-'
  }
}
