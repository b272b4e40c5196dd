export type {
  ApplyFn,
  ApplyOutcome,
  CommonOptions,
  DesiredStateItem,
  FailureCause,
  ItemOutcome,
  ItemPhase,
  Logger,
  Operation,
  ProbeFn,
  ProbeState,
  ReconciliationResult,
  RunReport,
  RunStatus,
} from './types.js'
export type { ActionSpec, Catalog, CatalogItem, ProbeSpec } from './catalog/schema.js'
export type { CatalogSet, LoadedCatalog } from './catalog/io.js'
export type { CatalogInput, CatalogInputOptions, CatalogSource } from './api/catalog-input.js'
export type { OperationResult, ProvisionOptions } from './api/provision.js'
export type { TeardownOptions } from './api/teardown.js'
export type { OperationOptions } from './core/runner.js'
export type { ProcessResult, ProcessRunner, RunOptions } from './core/process.js'
export type { FS } from './core/fs.js'

export { provision, teardown } from './api/index.js'

export { ActionRegistry, applied, failed, outcomeOf, runAction } from './core/actions.js'
export { ProbeRegistry, indeterminate, runProbe, satisfied, unsatisfied } from './core/probes.js'
export { reconcile, deriveStatus } from './core/reconcile.js'
export { RunContext } from './core/context.js'
export { ResourceScope } from './core/scope.js'
export { nodeRunner, runProcess } from './core/process.js'
export { renderReport, exitCodeOf, countOutcomes } from './core/report.js'
export { StatewardError, StatewardErrorCode } from './core/errors.js'
export { silentLogger, stderrLogger } from './core/logger.js'
export { insertBlock, removeBlock, hasBlock } from './core/blocks.js'

export { CatalogSchema, ProbeSpecSchema, ActionSpecSchema } from './catalog/schema.js'
export { bundledCatalogDir, loadCatalogSet, parseCatalog, teardownItems } from './catalog/io.js'
export { compileItems } from './catalog/compile.js'
export { mirrorItems, absenceOf } from './catalog/mirror.js'
