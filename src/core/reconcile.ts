import { setTimeout as sleep } from 'node:timers/promises'

import type {
  DesiredStateItem,
  ItemOutcome,
  ItemPhase,
  Logger,
  Operation,
  ProbeState,
  ReconciliationResult,
  RunReport,
  RunStatus,
} from '../types.js'
import { runAction } from './actions.js'
import { RunContext } from './context.js'
import type { FS } from './fs.js'
import { silentLogger } from './logger.js'
import type { ProcessRunner } from './process.js'
import { runProbe } from './probes.js'
import { describeState } from './report.js'
import { ResourceScope } from './scope.js'

function nowIso() {
  return new Date().toISOString()
}

export interface ReconcileOptions {
  logger?: Logger
  /**
   * Probe only. Items that would need an action finish as 'planned'.
   */
  dryRun?: boolean
  /**
   * Checked before each item starts. An item already in flight always completes.
   */
  signal?: AbortSignal
  /**
   * Extra probe attempts for an item whose first probe is indeterminate. Default 2.
   */
  indeterminateRetries?: number
  retryDelayMs?: number
  graceSeconds?: number
  runner?: ProcessRunner
  fs?: FS
  catalogPath?: string
  onTransition?: (item: string, phase: ItemPhase) => void
}

const DEFAULT_INDETERMINATE_RETRIES = 2
const DEFAULT_RETRY_DELAY_MS = 1000

export function deriveStatus(results: readonly ReconciliationResult[]): RunStatus {
  if (results.some(r => r.critical && r.outcome === 'failed')) return 'failed'
  if (results.some(r => r.outcome === 'failed' || r.outcome === 'indeterminate' || r.warnings.length > 0)) {
    return 'success_with_warnings'
  }
  return 'success'
}

/**
 * Walk the items in declaration order: probe, apply when unsatisfied, probe
 * again to verify. Item outcomes are recorded, never thrown. A failed critical
 * item stops the walk.
 */
export async function reconcile(operation: Operation, items: DesiredStateItem[], opts: ReconcileOptions = {}): Promise<RunReport> {
  const startMs = Date.now()
  const startedAt = nowIso()
  const logger = opts.logger ?? silentLogger()
  const retries = Math.max(0, opts.indeterminateRetries ?? DEFAULT_INDETERMINATE_RETRIES)
  const retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
  const dryRun = opts.dryRun ?? false

  const scope = new ResourceScope(logger)
  const ctx = new RunContext({
    runner: opts.runner,
    fs: opts.fs,
    logger,
    scope,
    graceSeconds: opts.graceSeconds,
    dryRun,
  })

  const report: RunReport = {
    operation,
    status: 'success',
    dryRun,
    aborted: false,
    catalogPath: opts.catalogPath,
    total: items.length,
    startedAt,
    finishedAt: startedAt,
    durationMs: 0,
    results: [],
    warnings: [],
  }

  const enter = (item: DesiredStateItem, phase: ItemPhase) => {
    logger.debug?.(`${item.name}: ${phase}`)
    opts.onTransition?.(item.name, phase)
  }

  const probeWithRetries = async (item: DesiredStateItem): Promise<ProbeState> => {
    let state = await runProbe(item.probe, ctx)
    for (let attempt = 1; attempt <= retries && state.state === 'indeterminate'; attempt++) {
      logger.debug?.(`${item.name}: probe indeterminate (${state.reason}); retry ${attempt}/${retries}`)
      if (retryDelayMs > 0) await sleep(retryDelayMs)
      state = await runProbe(item.probe, ctx)
    }
    return state
  }

  try {
    for (const item of items) {
      if (opts.signal?.aborted) {
        report.aborted = true
        logger.warn(`Aborted before ${item.name}; ${items.length - report.results.length} item(s) not run`)
        break
      }

      const itemStart = Date.now()
      const warnings: string[] = []
      const finish = (fields: {
        outcome: ItemOutcome
        initialState: ProbeState
        finalState?: ProbeState
        applied: boolean
        error?: string
      }): ReconciliationResult => {
        const result: ReconciliationResult = Object.freeze({
          name: item.name,
          critical: item.critical,
          ...fields,
          warnings: Object.freeze([...warnings]),
          hint: item.hint,
          durationMs: Date.now() - itemStart,
        })
        report.results.push(result)
        enter(item, fields.outcome === 'failed' ? 'failed' : 'done')
        return result
      }

      ctx.beginItem(item.timeoutSeconds)
      enter(item, 'pending')
      enter(item, 'probing')
      const initialState = await probeWithRetries(item)

      let result: ReconciliationResult
      if (initialState.state === 'satisfied') {
        enter(item, 'satisfied')
        logger.info(`${item.name}: already satisfied`)
        result = finish({ outcome: 'satisfied', initialState, applied: false })
      } else if (initialState.state === 'indeterminate') {
        if (item.critical) {
          result = finish({ outcome: 'failed', initialState, applied: false, error: `Indeterminate: ${initialState.reason}` })
        } else {
          warnings.push(`Skipped: ${initialState.reason}`)
          logger.warn(`${item.name}: cannot determine state, skipping: ${initialState.reason}`)
          result = finish({ outcome: 'indeterminate', initialState, applied: false })
        }
      } else if (dryRun) {
        enter(item, 'needs_apply')
        logger.info(`${item.name}: would apply (${describeState(initialState)})`)
        result = finish({ outcome: 'planned', initialState, applied: false })
      } else {
        enter(item, 'needs_apply')
        enter(item, 'applying')
        logger.info(`${item.name}: applying`)
        const outcome = await runAction(item.apply, ctx)
        ctx.invalidate()

        enter(item, 'verifying')
        const finalState = await runProbe(item.probe, ctx)

        if (outcome.status === 'failed' && outcome.cause === 'spawn') {
          result = finish({ outcome: 'failed', initialState, finalState, applied: true, error: outcome.reason })
        } else if (finalState.state === 'satisfied') {
          if (outcome.status === 'failed') {
            warnings.push(`Action reported failure but state now holds: ${outcome.reason}`)
          }
          logger.info(`${item.name}: applied`)
          result = finish({ outcome: 'applied', initialState, finalState, applied: true })
        } else {
          const error = outcome.status === 'failed'
            ? outcome.reason
            : `After apply: ${describeState(finalState)}`
          result = finish({ outcome: 'failed', initialState, finalState, applied: true, error })
        }
      }

      if (result.outcome === 'failed') {
        logger.error(`${item.name}: failed: ${result.error ?? 'unknown error'}`)
        if (item.critical) {
          logger.error(`${item.name} is critical; halting with ${items.length - report.results.length} item(s) not run`)
          break
        }
      }
    }
  } finally {
    const failures = await scope.dispose()
    report.warnings.push(...failures)
  }

  report.status = deriveStatus(report.results)
  report.finishedAt = nowIso()
  report.durationMs = Date.now() - startMs
  return report
}
