/**
 * regraft - Repository consolidation engine
 *
 * Main library exports for programmatic usage
 */

// Types
export type {
  ConflictPolicy,
  Classification,
  RegraftConfig,
  ExecutionConfig,
  ArchiveConfig,
  KnowledgeConfig,
  ClassificationConfig
} from './types.js'

export { CONFLICT_POLICIES, CLASSIFICATIONS, DEFAULT_BRANCH } from './types.js'

// Domain pipeline
export * from './domain/index.js'

// Config utilities
export {
  loadConfig,
  loadConfigFromPath,
  findConfigDir,
  configExists,
  createDefaultConfig,
  validateConfig,
  DEFAULT_CONFIG
} from './lib/config-loader.js'

// Merge plan files
export { loadMergePlan, parseMergePlanFile } from './lib/plan-loader.js'
export type { MergePlanFile } from './lib/plan-loader.js'

// Repository stores
export {
  MemoryRepositoryStore,
  SerializedRepositoryStore,
  parseStoredRepository,
  serializeStoredRepository
} from './lib/repo-store.js'
export type { RepositoryStore, RepositoryUpdater } from './lib/repo-store.js'
export { FsRepositoryStore, getRepositoryPath } from './lib/fs-store.js'

// Concurrency helpers
export { PathLockManager, KeyedMutex, pathsOverlap } from './lib/locks.js'
export { runBatch } from './lib/batch-runner.js'
export type { BatchOutcome, BatchOperation, BatchResult, RunBatchOptions } from './lib/batch-runner.js'
export { withTimeout } from './lib/timeout.js'
export { compileGlobPatterns } from './lib/pattern-matcher.js'

// Errors
export {
  RegraftError,
  ConfigError,
  ConfigNotFoundError,
  InvalidConfigError,
  CircularExtendsError,
  ExtendsDepthError,
  ValidationError,
  FileNotFoundError,
  InvalidInventoryError,
  InvalidPlanError,
  PlanError,
  PlanConflictError,
  PlanCycleError,
  OperationError,
  RepositoryNotFoundError,
  ReadOnlyRepositoryError,
  HistoryDivergenceError,
  ArchivalPermissionError,
  TimeoutError,
  OperationCancelledError,
  DependencyFailedError,
  InvalidTransitionError,
  isRegraftError,
  isConfigError,
  isValidationError,
  isPlanError,
  isOperationError,
  formatErrorForCli,
  wrapError
} from './lib/errors.js'
export type { PathConflict } from './lib/errors.js'
