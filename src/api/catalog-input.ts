import path from 'path'

import { assertMirrorable, type CatalogSet, loadCatalogSet, parseCatalog } from '../catalog/io.js'

/**
 * In-memory catalogs, as parsed JSON.
 */
export interface CatalogSource {
  provision: unknown
  teardown?: unknown
}

/**
 * A catalog directory on disk, or catalogs held in memory.
 */
export type CatalogInput = string | CatalogSource

export interface CatalogInputOptions {
  /**
   * Base dir for `source` files and `${catalogDir}` of in-memory catalogs.
   * Default: process.cwd()
   */
  baseDir?: string
  /**
   * Optional catalogPath for observability/audit only; recorded on the report.
   */
  catalogPath?: string
}

export function resolveBaseDir(opts?: CatalogInputOptions): string {
  return path.resolve(opts?.baseDir ?? process.cwd())
}

export async function resolveCatalogSet(input: CatalogInput, opts?: CatalogInputOptions): Promise<CatalogSet> {
  if (typeof input === 'string') return await loadCatalogSet(input)

  const dir = resolveBaseDir(opts)
  const provision = parseCatalog(input.provision, { catalogDir: dir, path: opts?.catalogPath })
  assertMirrorable(provision)
  const teardown = input.teardown === undefined
    ? undefined
    : parseCatalog(input.teardown, { catalogDir: dir, path: opts?.catalogPath })
  return { dir, provision, teardown }
}

export function reportedCatalogPath(input: CatalogInput, set: CatalogSet, opts?: CatalogInputOptions): string | undefined {
  return typeof input === 'string' ? set.dir : opts?.catalogPath
}
