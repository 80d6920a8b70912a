/**
 * regraft - Type Definitions
 */

// ============================================================================
// Conflict Policy
// ============================================================================

/**
 * How the planner resolves two entries whose target paths overlap.
 *
 * - fail: report a conflict and abort planning
 * - rename: append a deterministic suffix (-2, -3, ...) to the later path
 * - skip-duplicate: drop the later entry, first one wins
 */
export type ConflictPolicy = 'fail' | 'rename' | 'skip-duplicate'

export const CONFLICT_POLICIES: readonly ConflictPolicy[] = ['fail', 'rename', 'skip-duplicate']

/** Default branch used when a target repository is created by a merge */
export const DEFAULT_BRANCH = 'main'

// ============================================================================
// Classification (discovery snapshot)
// ============================================================================

export type Classification = 'CORE' | 'ACTIVE' | 'CONSOLIDATE' | 'ARCHIVE' | 'DEPRECATE'

export const CLASSIFICATIONS: readonly Classification[] = [
  'CORE',
  'ACTIVE',
  'CONSOLIDATE',
  'ARCHIVE',
  'DEPRECATE'
]

// ============================================================================
// Configuration Types
// ============================================================================

export interface ExecutionConfig {
  /** Maximum number of operations applied at the same time */
  parallelism?: number
  /** Stop launching operations once any operation fails */
  fail_fast?: boolean
  /** Per-operation budget in milliseconds (0 disables the timeout) */
  timeout_ms?: number
}

export interface ArchiveConfig {
  /** Archive sources after a successful merge (default: true) */
  enabled?: boolean
  /** Where redirect documents are written */
  redirect_dir?: string
}

export interface KnowledgeConfig {
  /** Run the knowledge extractor after apply (default: true) */
  enabled?: boolean
  /** Where extracted documents are written */
  output_dir?: string
  /** Glob patterns of document-worthy files */
  include?: string[]
  /** Minimum content length for a file to count as long-form */
  min_length?: number
  /** Minimum commit message body length to extract */
  min_commit_body?: number
}

export interface ClassificationConfig {
  /** Repositories that are always CORE */
  core?: string[]
  /** Repositories with activity newer than this are ACTIVE */
  active_days?: number
  /** Repositories idle longer than this are ARCHIVE candidates */
  archive_days?: number
}

export interface RegraftConfig {
  version: '1'
  /** Inherit from another config file (relative to this one) */
  extends?: string
  /** Inventory snapshot path (JSON or YAML) */
  inventory?: string
  /** Merge plan path (JSON or YAML) */
  plan?: string
  /** Repository store directory */
  store?: string
  /** Where plan and report artifacts are written */
  artifacts_dir?: string
  execution?: ExecutionConfig
  archive?: ArchiveConfig
  knowledge?: KnowledgeConfig
  classification?: ClassificationConfig
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  _: string[]
  // Global flags
  config?: string
  inventory?: string
  plan?: string
  store?: string
  target?: string
  verbose?: boolean
  quiet?: boolean
  'dry-run'?: boolean
  json?: boolean
  // Apply flags
  'fail-fast'?: boolean
  parallel?: number
  timeout?: number
  'skip-archive'?: boolean
  'skip-extract'?: boolean
  // Extract flags
  repos?: string
  output?: string
  // Inventory flags
  write?: boolean
  // Init flags
  force?: boolean
}
