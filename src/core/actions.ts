import type { ApplyFn, ApplyOutcome, FailureCause } from '../types.js'
import type { RunContext } from './context.js'
import { runPhase } from './deadline.js'
import { errorMessage } from './errors.js'
import { describeProcessResult, type ProcessResult } from './process.js'

export const applied = (detail?: string): ApplyOutcome => ({ status: 'applied', detail })
export const failed = (reason: string, cause: FailureCause = 'exit'): ApplyOutcome => ({ status: 'failed', reason, cause })

/**
 * Map a finished command onto an outcome: exit 0 applied, anything else failed
 * with the matching cause.
 */
export function outcomeOf(command: string, args: string[], res: ProcessResult, timeoutSeconds: number): ApplyOutcome {
  if (!res.spawnError && !res.timedOut && res.exitCode === 0) return applied()
  const cause: FailureCause = res.spawnError ? 'spawn' : res.timedOut ? 'timeout' : 'exit'
  return failed(describeProcessResult(command, args, res, timeoutSeconds), cause)
}

/**
 * Named idempotent mutations. apply() never throws.
 */
export class ActionRegistry {
  private actions = new Map<string, ApplyFn>()

  register(name: string, action: ApplyFn): void {
    if (this.actions.has(name)) throw new Error(`Action already registered: ${name}`)
    this.actions.set(name, action)
  }

  has(name: string): boolean {
    return this.actions.has(name)
  }

  names(): string[] {
    return [...this.actions.keys()]
  }

  async apply(name: string, ctx: RunContext): Promise<ApplyOutcome> {
    const action = this.actions.get(name)
    if (!action) return failed(`No action registered under "${name}"`, 'unsupported')
    return await runAction(action, ctx)
  }
}

export async function runAction(action: ApplyFn, ctx: RunContext): Promise<ApplyOutcome> {
  const res = await runPhase(ctx, () => Promise.resolve()
    .then(() => action(ctx))
    .catch((e: unknown) => failed(`Action threw: ${errorMessage(e)}`, 'exception')))
  if (!res.done) return failed(`Action timed out after ${ctx.timeoutSeconds}s`, 'timeout')
  return res.value
}
