import { StatewardError, StatewardErrorCode } from '../core/errors.js'
import type { Logger } from '../types.js'
import type { CatalogItem, ProbeSpec } from './schema.js'

export const MIRROR_SUFFIX = '-absent'

/**
 * Probe that holds exactly when the given probe's state is gone.
 */
export function absenceOf(probe: ProbeSpec): ProbeSpec {
  switch (probe.type) {
    case 'package':
      return { ...probe, state: (probe.state ?? 'installed') === 'installed' ? 'absent' : 'installed' }
    case 'all':
      // Everything gone, member by member.
      return { type: 'all', probes: probe.probes.map(absenceOf) }
    case 'not':
      return probe.probe
    default:
      return { type: 'not', probe }
  }
}

/**
 * Provisioning items without a revert or a keepOnTeardown reason.
 */
export function unmirroredItems(items: readonly CatalogItem[]): string[] {
  return items.filter(i => !i.revert && i.keepOnTeardown === undefined).map(i => i.name)
}

/**
 * Teardown counterparts of provisioning items, last-provisioned first.
 */
export function mirrorItems(items: readonly CatalogItem[], logger?: Logger): CatalogItem[] {
  const missing = unmirroredItems(items)
  if (missing.length) {
    throw new StatewardError(
      StatewardErrorCode.CATALOG_INVALID,
      `Items need a revert or a keepOnTeardown reason: ${missing.join(', ')}`,
      { items: missing },
    )
  }

  const out: CatalogItem[] = []
  for (const item of [...items].reverse()) {
    if (!item.revert) {
      logger?.debug?.(`${item.name}: kept on teardown (${item.keepOnTeardown ?? ''})`)
      continue
    }
    out.push({
      name: `${item.name}${MIRROR_SUFFIX}`,
      description: item.description ? `Undo: ${item.description}` : undefined,
      critical: item.critical,
      timeoutSeconds: item.timeoutSeconds,
      hint: item.hint,
      probe: absenceOf(item.probe),
      action: item.revert,
    })
  }
  return out
}
