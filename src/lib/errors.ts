/**
 * regraft Error Hierarchy
 *
 * Typed error classes shared by the library and the CLI.
 *
 * Hierarchy:
 *   RegraftError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   ├── CircularExtendsError
 *   │   └── ExtendsDepthError
 *   ├── ValidationError (input validation)
 *   │   ├── FileNotFoundError
 *   │   ├── InvalidInventoryError
 *   │   └── InvalidPlanError
 *   ├── PlanError (planning stage, raised before any mutation)
 *   │   ├── PlanConflictError
 *   │   └── PlanCycleError
 *   └── OperationError (execution stage, isolated per operation)
 *       ├── RepositoryNotFoundError
 *       ├── ReadOnlyRepositoryError
 *       ├── HistoryDivergenceError
 *       ├── ArchivalPermissionError
 *       ├── TimeoutError
 *       ├── OperationCancelledError
 *       ├── DependencyFailedError
 *       └── InvalidTransitionError
 */

interface RegraftErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all regraft errors
 */
export class RegraftError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: RegraftErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'RegraftError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for reports and logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends RegraftError {
  constructor(message: string, code: string, options?: RegraftErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when .regraft/config.yaml is not found
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath?: string) {
    super(
      searchedPath
        ? `Config file not found: ${searchedPath}`
        : 'No .regraft/config.yaml found',
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Run "regraft init" to create a configuration',
        context: searchedPath ? { searchedPath } : undefined
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .regraft/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

export class CircularExtendsError extends ConfigError {
  constructor(configPath: string) {
    super(
      `Circular config inheritance detected: ${configPath}`,
      'CIRCULAR_EXTENDS',
      {
        suggestion: 'Check your "extends" fields for circular references',
        context: { configPath }
      }
    )
    this.name = 'CircularExtendsError'
  }
}

export class ExtendsDepthError extends ConfigError {
  constructor(maxDepth: number) {
    super(
      `Config inheritance depth exceeded (max ${maxDepth})`,
      'EXTENDS_DEPTH_EXCEEDED',
      {
        suggestion: 'Reduce nesting of "extends" in your config files',
        context: { maxDepth }
      }
    )
    this.name = 'ExtendsDepthError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends RegraftError {
  constructor(message: string, code: string, options?: RegraftErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

export class FileNotFoundError extends ValidationError {
  constructor(filePath: string) {
    super(
      `File not found: ${filePath}`,
      'FILE_NOT_FOUND',
      {
        suggestion: 'Check if the file path is correct',
        context: { filePath }
      }
    )
    this.name = 'FileNotFoundError'
  }
}

/**
 * Thrown when an inventory snapshot has malformed records
 */
export class InvalidInventoryError extends ValidationError {
  readonly problems: string[]

  constructor(problems: string[], source?: string) {
    super(
      `Invalid inventory${source ? ` (${source})` : ''}:\n${problems.map(p => `  - ${p}`).join('\n')}`,
      'INVALID_INVENTORY',
      {
        suggestion: 'Regenerate the inventory snapshot or fix the listed fields',
        context: { source, problems }
      }
    )
    this.name = 'InvalidInventoryError'
    this.problems = problems
  }
}

/**
 * Thrown when merge plan entries reference unknown repositories or bad paths
 */
export class InvalidPlanError extends ValidationError {
  readonly problems: string[]

  constructor(problems: string[], source?: string) {
    super(
      `Invalid merge plan${source ? ` (${source})` : ''}:\n${problems.map(p => `  - ${p}`).join('\n')}`,
      'INVALID_PLAN',
      {
        suggestion: 'Fix the listed entries in the merge plan',
        context: { source, problems }
      }
    )
    this.name = 'InvalidPlanError'
    this.problems = problems
  }
}

// =============================================================================
// Plan Errors
// =============================================================================

export class PlanError extends RegraftError {
  constructor(message: string, code: string, options?: RegraftErrorOptions) {
    super(message, code, options)
    this.name = 'PlanError'
  }
}

export interface PathConflict {
  /** Target repository both entries point into */
  target: string
  /** Path that could not be resolved */
  targetPath: string
  /** Source repositories of every entry involved, in plan order */
  sources: string[]
}

/**
 * Thrown when target paths collide and the entry policy does not resolve it
 */
export class PlanConflictError extends PlanError {
  readonly conflicts: PathConflict[]

  constructor(conflicts: PathConflict[]) {
    const list = conflicts
      .map(c => `  ${c.target}:${c.targetPath} ← ${c.sources.join(', ')}`)
      .join('\n')
    super(
      `Merge plan has ${conflicts.length} unresolved path conflict${conflicts.length === 1 ? '' : 's'}:\n${list}`,
      'PLAN_CONFLICT',
      {
        suggestion: 'Give the entries distinct target paths or set on_conflict to rename or skip-duplicate',
        context: { conflicts }
      }
    )
    this.name = 'PlanConflictError'
    this.conflicts = conflicts
  }
}

/**
 * Thrown when entries depend on each other in a loop
 */
export class PlanCycleError extends PlanError {
  constructor(repositories: string[]) {
    super(
      `Merge plan contains a dependency cycle: ${repositories.join(' → ')}`,
      'PLAN_CYCLE',
      {
        suggestion: 'A repository cannot be merged into one of its own consolidation targets',
        context: { repositories }
      }
    )
    this.name = 'PlanCycleError'
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

export class OperationError extends RegraftError {
  constructor(message: string, code: string, options?: RegraftErrorOptions) {
    super(message, code, options)
    this.name = 'OperationError'
  }
}

export class RepositoryNotFoundError extends OperationError {
  constructor(repository: string, operationId?: string) {
    super(
      `Repository "${repository}" not found in store`,
      'REPOSITORY_NOT_FOUND',
      {
        suggestion: 'Check the store path and that discovery captured this repository',
        context: { repository, operationId }
      }
    )
    this.name = 'RepositoryNotFoundError'
  }
}

export class ReadOnlyRepositoryError extends OperationError {
  constructor(repository: string, operationId?: string) {
    super(
      `Repository "${repository}" is read-only`,
      'REPOSITORY_READ_ONLY',
      {
        suggestion: 'Archived repositories cannot receive merges; choose another target',
        context: { repository, operationId }
      }
    )
    this.name = 'ReadOnlyRepositoryError'
  }
}

/**
 * Thrown when two histories cannot be combined by path namespacing alone
 */
export class HistoryDivergenceError extends OperationError {
  readonly conflicts: string[]

  constructor(
    details: { operationId: string; source: string; target: string; targetPath: string },
    conflicts: string[]
  ) {
    super(
      `Cannot graft ${details.source} into ${details.target}:${details.targetPath}:\n${conflicts.map(c => `  - ${c}`).join('\n')}`,
      'HISTORY_DIVERGENCE',
      {
        suggestion: 'Resolve the listed conflicts manually, then re-run apply',
        context: { ...details, conflicts }
      }
    )
    this.name = 'HistoryDivergenceError'
    this.conflicts = conflicts
  }
}

/**
 * Thrown when a source repository cannot be locked for archival
 */
export class ArchivalPermissionError extends OperationError {
  constructor(repository: string, reason: string) {
    super(
      `Cannot archive "${repository}": ${reason}`,
      'ARCHIVAL_PERMISSION_DENIED',
      {
        suggestion: 'Grant archive permission on the repository and re-run apply; the merge itself is kept',
        context: { repository, reason }
      }
    )
    this.name = 'ArchivalPermissionError'
  }
}

export class TimeoutError extends OperationError {
  readonly timeoutMs: number

  constructor(operation: string, timeoutMs: number) {
    super(
      `Operation timed out after ${timeoutMs}ms: ${operation}`,
      'OPERATION_TIMEOUT',
      {
        suggestion: 'Raise execution.timeout_ms or pass --timeout',
        context: { operation, timeoutMs }
      }
    )
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export class OperationCancelledError extends OperationError {
  constructor(operationId: string) {
    super(
      `Operation ${operationId} was cancelled`,
      'OPERATION_CANCELLED',
      { context: { operationId } }
    )
    this.name = 'OperationCancelledError'
  }
}

/**
 * Thrown for operations whose prerequisite operation did not apply
 */
export class DependencyFailedError extends OperationError {
  constructor(operationId: string, failedDependencies: string[]) {
    super(
      `Operation ${operationId} depends on failed operation(s): ${failedDependencies.join(', ')}`,
      'DEPENDENCY_FAILED',
      {
        suggestion: 'Fix the failed prerequisite and re-run apply',
        context: { operationId, failedDependencies }
      }
    )
    this.name = 'DependencyFailedError'
  }
}

export class InvalidTransitionError extends OperationError {
  constructor(operationId: string, from: string, to: string) {
    super(
      `Operation ${operationId} cannot move from ${from} to ${to}`,
      'INVALID_TRANSITION',
      { context: { operationId, from, to } }
    )
    this.name = 'InvalidTransitionError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isRegraftError(error: unknown): error is RegraftError {
  return error instanceof RegraftError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isPlanError(error: unknown): error is PlanError {
  return error instanceof PlanError
}

export function isOperationError(error: unknown): error is OperationError {
  return error instanceof OperationError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isRegraftError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a RegraftError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): RegraftError {
  if (isRegraftError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new RegraftError(error.message, defaultCode, { cause: error })
  }
  return new RegraftError(String(error), defaultCode)
}
