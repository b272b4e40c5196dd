import { tryAppendAudit } from './audit.js'
import type { FS } from './fs.js'
import type { ProcessRunner } from './process.js'
import { reconcile } from './reconcile.js'
import { countOutcomes } from './report.js'
import type { CommonOptions, DesiredStateItem, ItemPhase, Operation, RunReport } from '../types.js'

/**
 * Options beyond CommonOptions that embedders and tests use to swap out the host.
 */
export interface OperationOptions extends CommonOptions {
  runner?: ProcessRunner
  fs?: FS
  retryDelayMs?: number
  onTransition?: (item: string, phase: ItemPhase) => void
}

export interface RunOperationInput {
  operation: Operation
  items: DesiredStateItem[]
  catalogPath?: string
  opts?: OperationOptions
  /**
   * Called after reconciliation but before the audit line is appended.
   */
  finalize?: (report: RunReport) => Promise<RunReport> | RunReport
}

export async function runOperation(input: RunOperationInput): Promise<RunReport> {
  const opts = input.opts ?? {}
  const logger = opts.logger

  let report = await reconcile(input.operation, input.items, {
    logger,
    dryRun: opts.dryRun,
    signal: opts.signal,
    indeterminateRetries: opts.indeterminateRetries,
    retryDelayMs: opts.retryDelayMs,
    graceSeconds: opts.graceSeconds,
    runner: opts.runner,
    fs: opts.fs,
    catalogPath: input.catalogPath,
    onTransition: opts.onTransition,
  })

  if (input.finalize) {
    report = await input.finalize(report)
  }

  report = await tryAppendAudit(report, opts.auditLogPath)

  const counts = countOutcomes(report)
  logger?.info(`${input.operation} ${report.status} (${counts.failed} failed, ${report.durationMs}ms)`)
  return report
}
