import type { RunContext } from './core/context.js'

export type Operation = 'provision' | 'teardown'

export type ProbeState =
  | { state: 'satisfied'; detail?: string }
  | { state: 'unsatisfied'; detail?: string }
  | { state: 'indeterminate'; reason: string }

export type FailureCause = 'exit' | 'timeout' | 'spawn' | 'exception' | 'unsupported'

export type ApplyOutcome =
  | { status: 'applied'; detail?: string }
  | { status: 'failed'; reason: string; cause: FailureCause }

export type ProbeFn = (ctx: RunContext) => Promise<ProbeState>
export type ApplyFn = (ctx: RunContext) => Promise<ApplyOutcome>

export interface DesiredStateItem {
  name: string
  description?: string
  probe: ProbeFn
  apply: ApplyFn
  /**
   * Failure of a critical item halts the rest of the run.
   */
  critical: boolean
  /**
   * Deadline for the probe and for the action, each on its own.
   */
  timeoutSeconds: number
  /**
   * Remediation text shown when the item fails.
   */
  hint?: string
}

export type ItemPhase =
  | 'pending'
  | 'probing'
  | 'satisfied'
  | 'needs_apply'
  | 'applying'
  | 'verifying'
  | 'done'
  | 'failed'

export type ItemOutcome = 'satisfied' | 'applied' | 'planned' | 'indeterminate' | 'failed'

export interface ReconciliationResult {
  readonly name: string
  readonly critical: boolean
  readonly outcome: ItemOutcome
  readonly initialState: ProbeState
  /**
   * Absent when no post-apply probe ran (satisfied, planned or indeterminate items).
   */
  readonly finalState?: ProbeState
  readonly applied: boolean
  readonly error?: string
  readonly warnings: readonly string[]
  readonly hint?: string
  readonly durationMs: number
}

export type RunStatus = 'success' | 'success_with_warnings' | 'failed'

export interface RunReport {
  operation: Operation
  status: RunStatus
  dryRun: boolean
  aborted: boolean
  catalogPath?: string
  /**
   * Items declared for the run; results may be shorter after a halt or abort.
   */
  total: number
  startedAt: string
  finishedAt: string
  durationMs: number
  results: ReconciliationResult[]
  /**
   * Run-level warnings that belong to no single item (audit log, skipped mirrors).
   */
  warnings: string[]
}

export interface Logger {
  debug?(msg: string): void
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export interface CommonOptions {
  /**
   * We append one JSON line per run (RunReport). `false` turns the log off.
   * Default: `$XDG_STATE_HOME/stateward/runs.log.jsonl`.
   */
  auditLogPath?: string | false
  logger?: Logger
  /**
   * If true, only probe; never invoke actions.
   */
  dryRun?: boolean
  signal?: AbortSignal
  /**
   * How many extra probe attempts an indeterminate item gets before giving up.
   */
  indeterminateRetries?: number
  /**
   * Grace period between SIGTERM and SIGKILL for timed-out commands.
   */
  graceSeconds?: number
  /**
   * Timeout for items that declare none.
   */
  timeoutSeconds?: number
}
