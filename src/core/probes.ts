import type { ProbeFn, ProbeState } from '../types.js'
import type { RunContext } from './context.js'
import { runPhase } from './deadline.js'
import { errorMessage } from './errors.js'

export const satisfied = (detail?: string): ProbeState => ({ state: 'satisfied', detail })
export const unsatisfied = (detail?: string): ProbeState => ({ state: 'unsatisfied', detail })
export const indeterminate = (reason: string): ProbeState => ({ state: 'indeterminate', reason })

/**
 * Named read-only checks. evaluate() never throws: a missing probe, a throwing
 * probe or one that outlives its deadline all come back indeterminate.
 */
export class ProbeRegistry {
  private probes = new Map<string, ProbeFn>()

  register(name: string, probe: ProbeFn): void {
    if (this.probes.has(name)) throw new Error(`Probe already registered: ${name}`)
    this.probes.set(name, probe)
  }

  has(name: string): boolean {
    return this.probes.has(name)
  }

  names(): string[] {
    return [...this.probes.keys()]
  }

  async evaluate(name: string, ctx: RunContext): Promise<ProbeState> {
    const probe = this.probes.get(name)
    if (!probe) return indeterminate(`No probe registered under "${name}"`)
    return await runProbe(probe, ctx)
  }
}

/**
 * Invoke any probe under the same rules as the registry: throws and overruns
 * become indeterminate.
 */
export async function runProbe(probe: ProbeFn, ctx: RunContext): Promise<ProbeState> {
  const res = await runPhase(ctx, () => Promise.resolve()
    .then(() => probe(ctx))
    .catch((e: unknown) => indeterminate(`Probe threw: ${errorMessage(e)}`)))
  if (!res.done) return indeterminate(`Probe timed out after ${ctx.timeoutSeconds}s`)
  return res.value
}
