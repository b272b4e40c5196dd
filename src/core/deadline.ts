import type { RunContext } from './context.js'

export type DeadlineResult<T> = { done: true; value: T } | { done: false }

/**
 * Wait for work or the deadline, whichever comes first. The work itself is not
 * cancelled.
 */
export async function withDeadline<T>(work: Promise<T>, ms: number): Promise<DeadlineResult<T>> {
  let timer: NodeJS.Timeout | undefined
  const expired = new Promise<DeadlineResult<T>>(resolve => {
    timer = setTimeout(() => resolve({ done: false }), ms)
  })
  try {
    return await Promise.race([work.then(value => ({ done: true as const, value })), expired])
  } finally {
    if (timer) clearTimeout(timer)
  }
}

/**
 * Outer guard for a probe or action: its own timeout plus the kill grace
 * period, so a command's own deadline always fires first.
 */
export function guardMs(timeoutSeconds: number, graceSeconds: number): number {
  return Math.round((timeoutSeconds + graceSeconds + 1) * 1000)
}

/**
 * Run one probe or apply phase. Commands it starts share the phase budget, so
 * work that only waits on commands finishes before the guard. On overrun the
 * phase is closed and the work gets one more grace window to wind down before
 * the caller moves on.
 */
export async function runPhase<T>(ctx: RunContext, fn: () => Promise<T>): Promise<DeadlineResult<T>> {
  ctx.beginPhase()
  const work = fn()
  const res = await withDeadline(work, guardMs(ctx.timeoutSeconds, ctx.graceSeconds))
  if (res.done) return res

  ctx.closePhase()
  const late = await withDeadline(work, guardMs(0, ctx.graceSeconds))
  if (!late.done) ctx.logger.warn(`Work still running ${ctx.timeoutSeconds}s past its deadline; continuing without it`)
  return { done: false }
}
