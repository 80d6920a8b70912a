/**
 * regraft Config Loader
 *
 * Loads and merges configuration from .regraft/config.yaml files
 * with support for inheritance via "extends" field.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { RegraftConfig } from '../types.js'
import { RecordReader, isRecord } from './record-reader.js'
import type { UnknownRecord } from './record-reader.js'
import {
  CircularExtendsError,
  ConfigNotFoundError,
  ExtendsDepthError,
  InvalidConfigError
} from './errors.js'

export const CONFIG_DIR = '.regraft'
export const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5
const MAX_EXTENDS_DEPTH = 10

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return process.env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return process.env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return process.env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item))
  }

  if (isRecord(value)) {
    const result: UnknownRecord = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item)
    }
    return result
  }

  return value
}

/**
 * Default configuration. Relative paths resolve against the project root
 * (the directory holding .regraft/).
 */
export const DEFAULT_CONFIG: RegraftConfig = {
  version: '1',
  inventory: 'inventory.yaml',
  plan: 'merge-plan.yaml',
  store: '.regraft/store',
  artifacts_dir: 'artifacts/regraft-plans',
  execution: {
    parallelism: 4,
    fail_fast: false,
    timeout_ms: 0
  },
  archive: {
    enabled: true,
    redirect_dir: 'artifacts/redirects'
  },
  knowledge: {
    enabled: true,
    output_dir: 'artifacts/knowledge',
    include: ['**/*.md', '**/*.mdx', '**/*.rst', '**/*.adoc', 'docs/**/*.txt'],
    min_length: 200,
    min_commit_body: 120
  },
  classification: {
    core: [],
    active_days: 30,
    archive_days: 180
  }
}

/**
 * Find the .regraft directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    const configFile = path.join(configDir, CONFIG_FILE)

    if (fs.existsSync(configFile)) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, required: boolean = true): UnknownRecord {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigNotFoundError(configPath)
    }
    return {}
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    throw new InvalidConfigError(
      `Cannot parse YAML: ${err instanceof Error ? err.message : String(err)}`,
      configPath,
      err instanceof Error ? err : undefined
    )
  }

  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new InvalidConfigError('Config must be a mapping', configPath)
  }

  // Expand environment variables in all string values
  const expanded = expandEnvVarsInValue(parsed)
  return isRecord(expanded) ? expanded : {}
}

/**
 * Deep merge two config objects; arrays and scalars from `source` replace
 */
export function deepMerge(target: UnknownRecord, source: UnknownRecord): UnknownRecord {
  const result: UnknownRecord = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      // Deep merge objects
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      // Override with source value
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Load config with inheritance support
 */
function loadConfigWithExtends(
  configPath: string,
  visited: Set<string> = new Set(),
  depth: number = 0
): UnknownRecord {
  if (depth > MAX_EXTENDS_DEPTH) {
    throw new ExtendsDepthError(MAX_EXTENDS_DEPTH)
  }

  const absolutePath = path.resolve(configPath)

  if (visited.has(absolutePath)) {
    throw new CircularExtendsError(absolutePath)
  }

  visited.add(absolutePath)

  const { extends: parent, ...config } = loadConfigFile(absolutePath)

  // Handle extends
  if (typeof parent === 'string' && parent !== '') {
    const extendsPath = path.resolve(path.dirname(absolutePath), parent)
    const parentConfig = loadConfigWithExtends(extendsPath, visited, depth + 1)

    // Merge: parent <- current
    return deepMerge(parentConfig, config)
  }

  // No extends, merge with defaults
  return deepMerge(configToRecord(DEFAULT_CONFIG), config)
}

function configToRecord(config: RegraftConfig): UnknownRecord {
  return { ...structuredClone(config) }
}

/**
 * Validate a merged config document
 */
export function validateConfig(data: UnknownRecord, configPath?: string): RegraftConfig {
  const problems: string[] = []
  const root = new RecordReader(data, 'config', problems)

  const version = root.string('version') ?? '1'
  if (version !== '1') {
    root.problem(`unsupported version "${version}" (expected "1")`)
  }

  const section = (name: string) => new RecordReader(root.record(name) ?? {}, name, problems)
  const execution = section('execution')
  const archive = section('archive')
  const knowledge = section('knowledge')
  const classification = section('classification')

  const integer = (reader: RecordReader, name: string, min: number): number | undefined => {
    const value = reader.number(name)
    if (value !== undefined && (!Number.isInteger(value) || value < min)) {
      reader.problem(`${name} must be an integer >= ${min}`)
      return undefined
    }
    return value
  }

  const config: RegraftConfig = {
    version: '1',
    inventory: root.string('inventory'),
    plan: root.string('plan'),
    store: root.string('store'),
    artifacts_dir: root.string('artifacts_dir'),
    execution: {
      parallelism: integer(execution, 'parallelism', 1),
      fail_fast: execution.boolean('fail_fast'),
      timeout_ms: integer(execution, 'timeout_ms', 0)
    },
    archive: {
      enabled: archive.boolean('enabled'),
      redirect_dir: archive.string('redirect_dir')
    },
    knowledge: {
      enabled: knowledge.boolean('enabled'),
      output_dir: knowledge.string('output_dir'),
      include: knowledge.has('include') ? knowledge.stringList('include') : undefined,
      min_length: integer(knowledge, 'min_length', 0),
      min_commit_body: integer(knowledge, 'min_commit_body', 0)
    },
    classification: {
      core: classification.stringList('core'),
      active_days: integer(classification, 'active_days', 0),
      archive_days: integer(classification, 'archive_days', 0)
    }
  }

  if (problems.length > 0) {
    throw new InvalidConfigError(problems.join('; '), configPath)
  }
  return config
}

/**
 * Load a config file (plus its extends chain and config.local.yaml)
 */
export function loadConfigFromPath(configPath: string): RegraftConfig {
  const absolutePath = path.resolve(configPath)
  let merged = loadConfigWithExtends(absolutePath)

  // Load and merge local config (machine-specific overrides that shouldn't be committed)
  const localConfigPath = path.join(path.dirname(absolutePath), CONFIG_LOCAL_FILE)
  const localConfig = loadConfigFile(localConfigPath, false)

  if (Object.keys(localConfig).length > 0) {
    merged = deepMerge(merged, localConfig)
  }

  return validateConfig(merged, absolutePath)
}

/**
 * Load configuration from the nearest .regraft/config.yaml
 */
export function loadConfig(startDir?: string): RegraftConfig {
  const configDir = findConfigDir(startDir)

  if (!configDir) {
    // No config found, return defaults
    return structuredClone(DEFAULT_CONFIG)
  }

  return loadConfigFromPath(path.join(configDir, CONFIG_FILE))
}

/**
 * Directory relative config paths resolve against: the parent of .regraft/
 */
export function getProjectRoot(configDir: string | null, fallback: string = process.cwd()): string {
  return configDir ? path.dirname(configDir) : path.resolve(fallback)
}

/**
 * Check if a config directory exists
 */
export function configExists(startDir?: string): boolean {
  return findConfigDir(startDir) !== null
}

/**
 * Create a default config file and a sample merge plan
 */
export function createDefaultConfig(projectRoot: string, target: string): { configPath: string; planPath: string } {
  const configDir = path.join(projectRoot, CONFIG_DIR)
  fs.mkdirSync(configDir, { recursive: true })

  const configPath = path.join(configDir, CONFIG_FILE)
  const yamlContent = `# regraft Configuration

version: "1"

# Discovery snapshot (JSON or YAML)
# Supports: \${VAR}, \${VAR:-default}, $VAR
inventory: inventory.yaml

# Merge plan (JSON or YAML)
plan: merge-plan.yaml

# Repository store: one JSON document per repository
store: .regraft/store

# Plan and report artifacts
artifacts_dir: artifacts/regraft-plans

execution:
  parallelism: 4      # concurrent merges
  fail_fast: false    # stop launching operations after the first failure
  timeout_ms: 0       # per operation; 0 disables

archive:
  enabled: true
  redirect_dir: artifacts/redirects

knowledge:
  enabled: true
  output_dir: artifacts/knowledge
  include:
    - "**/*.md"
    - "**/*.rst"
    - "docs/**/*.txt"
  min_length: 200
  min_commit_body: 120

classification:
  core: []            # repositories that are never consolidated
  active_days: 30
  archive_days: 180

# TIP: machine-specific overrides go in .regraft/config.local.yaml (gitignored)
`
  fs.writeFileSync(configPath, yamlContent)

  const planPath = path.join(projectRoot, 'merge-plan.yaml')
  if (!fs.existsSync(planPath)) {
    fs.writeFileSync(planPath, `# regraft Merge Plan
#
# on_conflict: fail | rename | skip-duplicate

target: ${target}

entries:
  # - source: legacy-billing
  #   target_path: legacy/billing
  #   on_conflict: fail
  #
  # Entries may name their own target repository:
  # - source: old-docs
  #   target_path: docs/old
  #   target: docs-hub
  #   on_conflict: rename
`)
  }

  return { configPath, planPath }
}
