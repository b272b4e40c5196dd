import { compileItems } from '../catalog/compile.js'
import type { CatalogSet } from '../catalog/io.js'
import { type OperationOptions, runOperation } from '../core/runner.js'
import type { RunReport } from '../types.js'
import { type CatalogInput, type CatalogInputOptions, reportedCatalogPath, resolveCatalogSet } from './catalog-input.js'

export interface ProvisionOptions extends OperationOptions, CatalogInputOptions {}

export interface OperationResult {
  report: RunReport
  catalogs: CatalogSet
}

/**
 * Bring the host to the provisioning catalog's desired state. Never throws for
 * item failures; those are on the report. Throws StatewardError for a missing
 * or invalid catalog.
 */
export async function provision(input: CatalogInput, opts?: ProvisionOptions): Promise<OperationResult> {
  const catalogs = await resolveCatalogSet(input, opts)
  const { items } = compileItems(catalogs.provision.catalog.items, {
    catalogDir: catalogs.provision.catalogDir,
    vars: catalogs.provision.vars,
    defaultTimeoutSeconds: opts?.timeoutSeconds,
  })

  const report = await runOperation({
    operation: 'provision',
    items,
    catalogPath: reportedCatalogPath(input, catalogs, opts),
    opts,
  })
  return { report, catalogs }
}
