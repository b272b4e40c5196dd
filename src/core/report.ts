import type { ItemOutcome, ProbeState, ReconciliationResult, RunReport, RunStatus } from '../types.js'

export const EXIT_OK = 0
export const EXIT_FAILED = 1
export const EXIT_ABORTED = 130

export function describeState(state: ProbeState): string {
  if (state.state === 'indeterminate') return state.reason
  return state.detail ? `${state.state}: ${state.detail}` : state.state
}

const SYMBOLS: Record<ItemOutcome, string> = {
  satisfied: '✓',
  applied: '+',
  planned: '~',
  indeterminate: '!',
  failed: '✗',
}

const OUTCOME_ORDER: readonly ItemOutcome[] = ['satisfied', 'applied', 'planned', 'indeterminate', 'failed']

const STATUS_LABELS: Record<RunStatus, string> = {
  success: 'SUCCESS',
  success_with_warnings: 'SUCCESS WITH WARNINGS',
  failed: 'FAILED',
}

function outcomeText(r: ReconciliationResult): string {
  switch (r.outcome) {
    case 'satisfied':
      return 'already satisfied'
    case 'applied':
      return 'applied'
    case 'planned':
      return `would apply (${describeState(r.initialState)})`
    case 'indeterminate':
      return `skipped, state unknown: ${describeState(r.initialState)}`
    case 'failed':
      return `failed: ${r.error ?? 'unknown error'}${r.critical ? ' [critical]' : ''}`
    default: {
      const _exhaustive: never = r.outcome
      throw new Error(`Unknown outcome: ${String(_exhaustive)}`)
    }
  }
}

export function countOutcomes(report: RunReport): Record<ItemOutcome, number> {
  const counts: Record<ItemOutcome, number> = { satisfied: 0, applied: 0, planned: 0, indeterminate: 0, failed: 0 }
  for (const r of report.results) counts[r.outcome]++
  return counts
}

export interface RenderOptions {
  verbose?: boolean
}

/**
 * Human-readable summary: one line per processed item, an overall status line,
 * then remediation hints for failed items.
 */
export function renderReport(report: RunReport, opts: RenderOptions = {}): string {
  const lines: string[] = []
  const header = `${report.operation}${report.dryRun ? ' (dry run)' : ''}: ${report.results.length}/${report.total} item(s) processed`
  lines.push(header)

  for (const r of report.results) {
    const suffix = opts.verbose ? ` (${r.durationMs}ms)` : ''
    lines.push(`  ${SYMBOLS[r.outcome]} ${r.name}: ${outcomeText(r)}${suffix}`)
    if (opts.verbose) {
      for (const w of r.warnings) lines.push(`      warning: ${w}`)
      if (r.finalState && r.outcome === 'failed') lines.push(`      final state: ${describeState(r.finalState)}`)
    }
  }

  const notRun = report.total - report.results.length
  if (notRun > 0) {
    lines.push(report.aborted ? `Aborted: ${notRun} item(s) not run` : `Halted: ${notRun} item(s) not run`)
  }
  for (const w of report.warnings) lines.push(`Warning: ${w}`)

  const counts = countOutcomes(report)
  const parts = OUTCOME_ORDER
    .filter(k => counts[k] > 0)
    .map(k => `${counts[k]} ${k}`)
  lines.push(`Status: ${STATUS_LABELS[report.status]}${parts.length ? ` (${parts.join(', ')})` : ''}`)

  const hinted = report.results.filter(r => r.outcome === 'failed' && r.hint)
  if (hinted.length) {
    lines.push('')
    lines.push('Alternative options:')
    for (const r of hinted) lines.push(`  - ${r.name}: ${r.hint}`)
  }

  return lines.join('\n')
}

/**
 * Warnings never fail a run; only a failed critical item does.
 */
export function exitCodeOf(report: RunReport): number {
  if (report.aborted) return EXIT_ABORTED
  return report.status === 'failed' ? EXIT_FAILED : EXIT_OK
}
