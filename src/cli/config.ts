import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { z } from 'zod'

import { StatewardError, StatewardErrorCode } from '../core/errors.js'

export const ConfigSchema = z.object({
  catalogDir: z.string().min(1).optional(),
  auditLogPath: z.string().min(1).optional(),
  timeoutSeconds: z.number().positive().optional(),
  graceSeconds: z.number().nonnegative().optional(),
  indeterminateRetries: z.number().int().nonnegative().optional(),
})

export type StatewardConfig = z.infer<typeof ConfigSchema>

export interface ConfigEnv {
  env?: NodeJS.ProcessEnv
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
}

export function getGlobalConfigPath(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  const base = env.XDG_CONFIG_HOME || path.join(opts.homeDir ?? os.homedir(), '.config')
  return path.join(base, 'stateward', 'config.json')
}

export async function readGlobalConfig(opts: ConfigEnv = {}): Promise<StatewardConfig> {
  const p = getGlobalConfigPath(opts)
  if (!await fs.pathExists(p)) return {}
  let json: unknown
  try {
    json = await fs.readJson(p)
  } catch (e) {
    throw new StatewardError(StatewardErrorCode.CONFIG_INVALID, `${p}: not valid JSON`, { path: p, cause: String(e) })
  }
  const parsed = ConfigSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
    throw new StatewardError(StatewardErrorCode.CONFIG_INVALID, `${p}: ${issues}`, { path: p })
  }
  return parsed.data
}

export async function writeGlobalConfig(config: StatewardConfig, opts: ConfigEnv = {}): Promise<void> {
  const p = getGlobalConfigPath(opts)
  await fs.ensureDir(path.dirname(p))
  await fs.writeJson(p, config, { spaces: 2 })
}

export async function setDefaultCatalogDir(catalogDir: string, opts: ConfigEnv = {}): Promise<string> {
  const abs = path.resolve(catalogDir)
  const cfg = await readGlobalConfig(opts)
  await writeGlobalConfig({ ...cfg, catalogDir: abs }, opts)
  return abs
}

export async function getDefaultCatalogDir(opts: ConfigEnv = {}): Promise<string | undefined> {
  const cfg = await readGlobalConfig(opts)
  return cfg.catalogDir
}

/**
 * Forget the default catalog. Other settings stay; the file goes once it is empty.
 */
export async function clearDefaultCatalogDir(opts: ConfigEnv = {}): Promise<void> {
  const p = getGlobalConfigPath(opts)
  if (!await fs.pathExists(p)) return
  const rest: StatewardConfig = { ...await readGlobalConfig(opts) }
  delete rest.catalogDir
  if (Object.keys(rest).length === 0) {
    await fs.remove(p)
    return
  }
  await writeGlobalConfig(rest, opts)
}
