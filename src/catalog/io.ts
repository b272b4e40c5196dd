import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { fileURLToPath } from 'url'
import type { ZodError } from 'zod'

import { StatewardError, StatewardErrorCode } from '../core/errors.js'
import type { Logger } from '../types.js'
import { mirrorItems, unmirroredItems } from './mirror.js'
import { type Catalog, type CatalogItem, CatalogSchema } from './schema.js'
import { expandDeep, resolveVars } from './vars.js'

export const PROVISION_FILE = 'provision.json'
export const TEARDOWN_FILE = 'teardown.json'

export interface LoadedCatalog {
  catalog: Catalog
  /**
   * Fully resolved variables, built-ins included.
   */
  vars: Record<string, string>
  catalogDir: string
  path?: string
}

export interface CatalogSet {
  dir: string
  provision: LoadedCatalog
  teardown?: LoadedCatalog
}

/**
 * Catalogs shipped with the package, next to src/ and dist/.
 */
export function bundledCatalogDir(): string {
  return fileURLToPath(new URL('../../catalogs/', import.meta.url))
}

export function builtinVars(catalogDir: string): Record<string, string> {
  return {
    catalogDir: path.resolve(catalogDir),
    home: os.homedir(),
  }
}

function formatIssues(err: ZodError): string {
  return err.issues.map(i => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`).join('; ')
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === 'object' && !Array.isArray(v)
}

/**
 * Validate raw catalog JSON. `${var}` references are expanded before
 * validation, everywhere except in `vars` itself.
 */
export function parseCatalog(raw: unknown, opts: { catalogDir: string; path?: string }): LoadedCatalog {
  const where = opts.path ?? 'catalog'
  if (!isRecord(raw)) {
    throw new StatewardError(StatewardErrorCode.CATALOG_INVALID, `${where}: expected a JSON object`, { path: opts.path })
  }

  const declared = isRecord(raw.vars) ? raw.vars : {}
  const vars = resolveVars(declared, builtinVars(opts.catalogDir))

  const rest = Object.fromEntries(Object.entries(raw).filter(([k]) => k !== 'vars'))
  const expanded = expandDeep(rest, vars, where)
  const parsed = CatalogSchema.safeParse(isRecord(expanded) ? { ...expanded, vars: declared } : expanded)
  if (!parsed.success) {
    throw new StatewardError(StatewardErrorCode.CATALOG_INVALID, `${where}: ${formatIssues(parsed.error)}`, { path: opts.path })
  }
  return { catalog: parsed.data, vars, catalogDir: path.resolve(opts.catalogDir), path: opts.path }
}

export async function loadCatalogFile(file: string): Promise<LoadedCatalog> {
  const abs = path.resolve(file)
  if (!await fs.pathExists(abs)) {
    throw new StatewardError(StatewardErrorCode.CATALOG_NOT_FOUND, `Catalog not found: ${abs}`, { path: abs })
  }
  let raw: unknown
  try {
    raw = await fs.readJson(abs)
  } catch (e) {
    throw new StatewardError(StatewardErrorCode.CATALOG_INVALID, `${abs}: not valid JSON`, { path: abs, cause: String(e) })
  }
  return parseCatalog(raw, { catalogDir: path.dirname(abs), path: abs })
}

/**
 * Every provisioning item must say how it is undone, or why it is not.
 */
export function assertMirrorable(loaded: LoadedCatalog): void {
  const missing = unmirroredItems(loaded.catalog.items)
  if (missing.length) {
    throw new StatewardError(
      StatewardErrorCode.CATALOG_INVALID,
      `${loaded.path ?? 'catalog'}: items need a revert or a keepOnTeardown reason: ${missing.join(', ')}`,
      { items: missing },
    )
  }
}

export async function loadCatalogSet(dir: string): Promise<CatalogSet> {
  const abs = path.resolve(dir)
  const provision = await loadCatalogFile(path.join(abs, PROVISION_FILE))
  assertMirrorable(provision)
  const teardownPath = path.join(abs, TEARDOWN_FILE)
  const teardown = await fs.pathExists(teardownPath) ? await loadCatalogFile(teardownPath) : undefined
  return { dir: abs, provision, teardown }
}

/**
 * Explicit teardown items first, then the mirror of provisioning in reverse order.
 */
export function teardownItems(set: { provision: LoadedCatalog; teardown?: LoadedCatalog }, logger?: Logger): CatalogItem[] {
  const items = [...(set.teardown?.catalog.items ?? []), ...mirrorItems(set.provision.catalog.items, logger)]
  const seen = new Set<string>()
  for (const item of items) {
    if (seen.has(item.name)) {
      throw new StatewardError(StatewardErrorCode.CATALOG_INVALID, `Duplicate teardown item name: ${item.name}`, { item: item.name })
    }
    seen.add(item.name)
  }
  return items
}
