import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

vi.mock('../src/api/provision.js', () => ({ provision: vi.fn() }))
vi.mock('../src/api/teardown.js', () => ({ teardown: vi.fn() }))

import type { OperationResult } from '../src/api/provision.js'
import { provision } from '../src/api/provision.js'
import { teardown } from '../src/api/teardown.js'
import { bundledCatalogDir } from '../src/catalog/io.js'
import { main } from '../src/cli.js'
import { clearDefaultCatalogDir, getGlobalConfigPath, readGlobalConfig, writeGlobalConfig } from '../src/cli/config.js'
import type { RunReport } from '../src/types.js'

function result(status: RunReport['status'] = 'success'): OperationResult {
  const report: RunReport = {
    operation: 'provision',
    status,
    dryRun: false,
    aborted: false,
    total: 0,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:00.000Z',
    durationMs: 0,
    results: [],
    warnings: [],
  }
  return {
    report,
    catalogs: { dir: '/cat', provision: { catalog: { version: 1, vars: {}, items: [] }, vars: {}, catalogDir: '/cat' } },
  }
}

describe('cli', () => {
  let tmp: string
  let origXdg: string | undefined
  let origCwd: string
  let stdout: MockInstance
  let stderr: MockInstance
  const canon = (p: string) => (p.startsWith('/private/') ? p.slice('/private'.length) : p)

  function firstCatalog(fn: typeof provision | typeof teardown): string | undefined {
    const input = vi.mocked(fn).mock.calls[0]?.[0]
    return typeof input === 'string' ? canon(input) : undefined
  }

  const printed = (spy: MockInstance) => spy.mock.calls.map(c => String(c[0])).join('')

  beforeEach(async () => {
    vi.resetAllMocks()
    origXdg = process.env.XDG_CONFIG_HOME
    origCwd = process.cwd()

    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'stateward-test-'))
    process.env.XDG_CONFIG_HOME = tmp
    process.chdir(tmp)
    await fs.remove(getGlobalConfigPath({ env: process.env, homeDir: tmp }))

    stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    vi.mocked(provision).mockResolvedValue(result())
    vi.mocked(teardown).mockResolvedValue(result())
  })

  afterEach(async () => {
    stdout.mockRestore()
    stderr.mockRestore()
    process.chdir(origCwd)
    if (origXdg === undefined) delete process.env.XDG_CONFIG_HOME
    else process.env.XDG_CONFIG_HOME = origXdg
    await fs.remove(tmp)
  })

  it('catalog set writes an absolute path into XDG config and show prints it', async () => {
    expect(await main(['catalog', 'set', 'cat'])).toBe(0)

    const cfg = await fs.readJson(getGlobalConfigPath({ env: process.env, homeDir: tmp }))
    expect(canon(cfg.catalogDir)).toBe(canon(path.join(tmp, 'cat')))

    stdout.mockClear()
    expect(await main(['catalog', 'show'])).toBe(0)
    expect(canon(printed(stdout).trim())).toBe(canon(path.join(tmp, 'cat')))
  })

  it('catalog clear forgets the default so show exits 2', async () => {
    await main(['catalog', 'set', 'cat'])
    expect(await main(['catalog', 'clear'])).toBe(0)
    expect(await main(['catalog', 'show'])).toBe(2)
    expect(printed(stderr)).toContain('No default catalog set')
  })

  it('uses --catalog over the default', async () => {
    await main(['catalog', 'set', 'default'])
    expect(await main(['provision', '--catalog', 'override'])).toBe(0)
    expect(provision).toHaveBeenCalledTimes(1)
    expect(firstCatalog(provision)).toBe(canon(path.join(tmp, 'override')))
  })

  it('uses the default when --catalog is not given', async () => {
    await main(['catalog', 'set', 'default'])
    expect(await main(['teardown'])).toBe(0)
    expect(firstCatalog(teardown)).toBe(canon(path.join(tmp, 'default')))
  })

  it('falls back to the bundled catalogs', async () => {
    expect(await main(['provision'])).toBe(0)
    expect(firstCatalog(provision)).toBe(canon(bundledCatalogDir()))
  })

  it('passes run flags and config through', async () => {
    await writeGlobalConfig({ timeoutSeconds: 90, graceSeconds: 2, auditLogPath: '/var/log/runs.jsonl' })
    expect(await main(['teardown', '--dry-run', '--retries', '0', '--audit-log', 'audit.jsonl'])).toBe(0)

    const opts = vi.mocked(teardown).mock.calls[0]?.[1]
    expect(opts).toMatchObject({ dryRun: true, indeterminateRetries: 0, timeoutSeconds: 90, graceSeconds: 2 })
    expect(canon(String(opts?.auditLogPath))).toBe(canon(path.join(tmp, 'audit.jsonl')))
  })

  it('rejects bad flags without running anything', async () => {
    expect(await main(['provision', '--retries', 'many'])).toBe(1)
    expect(await main(['provision', '--catalog'])).toBe(1)
    expect(await main(['provision', 'extra'])).toBe(1)
    expect(await main(['destroy'])).toBe(1)
    expect(provision).not.toHaveBeenCalled()
    expect(printed(stderr)).toContain('Invalid --retries: many (expected a non-negative integer)')
    expect(printed(stderr)).toContain('--catalog requires a value')
  })

  it('exits 1 when the run fails and prints JSON on request', async () => {
    vi.mocked(provision).mockResolvedValue(result('failed'))
    expect(await main(['provision', '--json'])).toBe(1)
    expect(JSON.parse(printed(stdout)).status).toBe('failed')
  })

  it('prints the rendered report by default', async () => {
    expect(await main(['provision'])).toBe(0)
    expect(printed(stdout)).toBe('provision: 0/0 item(s) processed\nStatus: SUCCESS\n')
  })
})

describe('global config', () => {
  let tmp: string

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'stateward-test-'))
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  it('keeps other settings when the catalog is cleared', async () => {
    const env = { XDG_CONFIG_HOME: tmp }
    await writeGlobalConfig({ catalogDir: '/cat', timeoutSeconds: 30 }, { env })
    await clearDefaultCatalogDir({ env })
    expect(await readGlobalConfig({ env })).toEqual({ timeoutSeconds: 30 })
  })

  it('rejects an invalid config file', async () => {
    const env = { XDG_CONFIG_HOME: tmp }
    const p = getGlobalConfigPath({ env })
    await fs.outputJson(p, { timeoutSeconds: -1 })
    await expect(readGlobalConfig({ env })).rejects.toThrow(`${p}: timeoutSeconds: `)
    await fs.outputFile(p, '{')
    await expect(readGlobalConfig({ env })).rejects.toThrow(`${p}: not valid JSON`)
  })
})
