/**
 * regraft Domain Layer
 *
 * The consolidation pipeline:
 * - inventory: snapshot loading and classification
 * - plan: merge planning and conflict resolution
 * - merge: history grafting
 * - apply: plan execution
 * - archive: source archival
 * - knowledge: documentation extraction
 */

// Types
export type {
  RepositoryRecord,
  Inventory,
  ClassifiedRecord,
  MergePlanEntry,
  OperationStatus,
  MergeOperation,
  SkippedEntry,
  MergePlan,
  CommitAuthor,
  StoredCommit,
  GraftMount,
  ProvenanceMarker,
  RedirectNote,
  StoredRepository,
  MergeResult,
  ArchivalRecord,
  KnowledgeKind,
  KnowledgeDocument,
  KnowledgeResult,
  ErrorDetail,
  OperationReport,
  ArchivalFailure,
  ExecutionReport
} from './types.js'

export {
  canTransition,
  transition,
  isTerminal,
  emptyRepository,
  failedOperations
} from './types.js'

// Inventory
export {
  loadInventory,
  parseInventory,
  readStructuredFile,
  inventoryFromStore,
  serializeInventory,
  classifyRepository,
  classifyInventory,
  summarizeInventory
} from './inventory.js'

export type {
  ClassifyOptions
} from './inventory.js'

// History
export {
  reachableCommits,
  countReachable,
  headCommit,
  branchTree,
  consolidatedTree
} from './history.js'

// Plan
export {
  computePlan,
  normalizeTargetPath,
  renamePath,
  writePlanArtifact,
  buildPlanMarkdown,
  operationId
} from './plan.js'

export type {
  ComputePlanOptions,
  PlanArtifactPaths
} from './plan.js'

export { DependencyGraph } from './graph.js'
export type { TopologicalOrder } from './graph.js'

// Merge
export {
  mergeHistories,
  computeOperationKey,
  namespacedRef
} from './merge.js'

export type {
  MergeOptions
} from './merge.js'

// Apply
export {
  executePlan,
  writeReportArtifact,
  toErrorDetail
} from './apply.js'

export type {
  ExecutePlanOptions,
  ExecutionEvent
} from './apply.js'

// Archive
export {
  archiveRepository,
  buildRedirectNote,
  REDIRECT_NOTE_PATH
} from './archive.js'

export type {
  ArchiveOptions
} from './archive.js'

// Knowledge
export {
  extractKnowledge,
  extractHeadings,
  DEFAULT_KNOWLEDGE_INCLUDE
} from './knowledge.js'

export type {
  ExtractOptions
} from './knowledge.js'
