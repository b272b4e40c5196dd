import { compileItems } from '../catalog/compile.js'
import { teardownItems } from '../catalog/io.js'
import { runOperation } from '../core/runner.js'
import { type CatalogInput, reportedCatalogPath, resolveCatalogSet } from './catalog-input.js'
import type { OperationResult, ProvisionOptions } from './provision.js'

export type TeardownOptions = ProvisionOptions

/**
 * Undo provisioning: explicit teardown items, then every provisioning item's
 * revert in reverse order.
 */
export async function teardown(input: CatalogInput, opts?: TeardownOptions): Promise<OperationResult> {
  const catalogs = await resolveCatalogSet(input, opts)
  const declared = teardownItems(catalogs, opts?.logger)
  const { items } = compileItems(declared, {
    catalogDir: catalogs.dir,
    vars: { ...catalogs.provision.vars, ...catalogs.teardown?.vars },
    defaultTimeoutSeconds: opts?.timeoutSeconds,
  })

  const report = await runOperation({
    operation: 'teardown',
    items,
    catalogPath: reportedCatalogPath(input, catalogs, opts),
    opts,
  })
  return { report, catalogs }
}
