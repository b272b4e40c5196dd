import { ActionRegistry, failed } from '../core/actions.js'
import { ProbeRegistry } from '../core/probes.js'
import type { DesiredStateItem } from '../types.js'
import { actionFromSpec, type ActionEnv } from './builtin-actions.js'
import { probeFromSpec } from './builtin-probes.js'
import type { CatalogItem } from './schema.js'

export const DEFAULT_TIMEOUT_SECONDS = 60

export interface CompileOptions extends ActionEnv {
  /**
   * Used for items that declare no timeoutSeconds.
   */
  defaultTimeoutSeconds?: number
}

export interface CompiledCatalog {
  items: DesiredStateItem[]
  probes: ProbeRegistry
  actions: ActionRegistry
}

/**
 * Turn declarative items into runnable ones. Each item's probe and action are
 * registered under the item's name; an item without an action is an assertion
 * and fails with its hint when unsatisfied.
 */
export function compileItems(items: readonly CatalogItem[], opts: CompileOptions): CompiledCatalog {
  const probes = new ProbeRegistry()
  const actions = new ActionRegistry()
  const env: ActionEnv = { catalogDir: opts.catalogDir, vars: opts.vars }

  const compiled = items.map((item): DesiredStateItem => {
    probes.register(item.name, probeFromSpec(item.probe))
    if (item.action) actions.register(item.name, actionFromSpec(item.action, env))
    return {
      name: item.name,
      description: item.description,
      critical: item.critical,
      timeoutSeconds: item.timeoutSeconds ?? opts.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
      hint: item.hint,
      probe: (ctx) => probes.evaluate(item.name, ctx),
      apply: async (ctx) => {
        if (!actions.has(item.name)) {
          return failed(`No action defined for ${item.name}`, 'unsupported')
        }
        return await actions.apply(item.name, ctx)
      },
    }
  })

  return { items: compiled, probes, actions }
}
