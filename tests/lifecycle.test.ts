import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import { provision } from '../src/api/provision.js'
import { teardown } from '../src/api/teardown.js'
import type { CatalogSource } from '../src/api/catalog-input.js'
import { blockBegin } from '../src/core/blocks.js'
import { fakeAlpine } from './helpers/fake-host.js'

const source: CatalogSource = {
  provision: {
    version: 1,
    items: [
      {
        name: 'root-user',
        critical: true,
        probe: { type: 'exec', command: 'id', args: ['-u'], stdoutEquals: '0' },
        keepOnTeardown: 'assertion only',
      },
      {
        name: 'nix-package',
        probe: { type: 'package', packages: ['nix'] },
        action: { type: 'package-install', packages: ['nix'] },
        revert: { type: 'package-remove', packages: ['nix'] },
      },
      {
        name: 'justfile',
        probe: { type: 'path', path: '${catalogDir}/share/justfile', kind: 'file' },
        action: { type: 'write-file', path: '${catalogDir}/share/justfile', content: 'default:\n\t@just --list\n' },
        revert: { type: 'remove-path', paths: ['${catalogDir}/share'] },
      },
      {
        name: 'profile-hook',
        probe: { type: 'marker', file: '${catalogDir}/profile', marker: 'just' },
        action: { type: 'insert-block', file: '${catalogDir}/profile', marker: 'just', content: 'alias j=just' },
        revert: { type: 'remove-block', file: '${catalogDir}/profile', marker: 'just' },
      },
    ],
  },
  teardown: {
    version: 1,
    items: [
      {
        name: 'cache-cleaned',
        probe: { type: 'dir-empty', paths: ['${catalogDir}/cache'] },
        action: { type: 'clean-dir', paths: ['${catalogDir}/cache'] },
      },
    ],
  },
}

describe('provision then teardown', () => {
  let dir: string
  let auditLogPath: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stateward-test-'))
    auditLogPath = path.join(dir, 'state', 'runs.log.jsonl')
    await fs.writeFile(path.join(dir, 'profile'), 'export A=1\n')
    await fs.outputFile(path.join(dir, 'cache', 'pkg.apk'), 'x')
  })

  afterEach(async () => {
    await fs.remove(dir)
  })

  it('brings the host up, keeps it there and takes it back down', async () => {
    const { runner, state } = fakeAlpine()
    const opts = { baseDir: dir, runner, auditLogPath, retryDelayMs: 0 }

    const up = await provision(source, opts)
    expect(up.report.status).toBe('success')
    expect(up.report.results.map(r => [r.name, r.outcome])).toEqual([
      ['root-user', 'satisfied'],
      ['nix-package', 'applied'],
      ['justfile', 'applied'],
      ['profile-hook', 'applied'],
    ])
    expect(state.packages.has('nix')).toBe(true)
    expect(await fs.readFile(path.join(dir, 'share', 'justfile'), 'utf8')).toBe('default:\n\t@just --list\n')
    expect((await fs.readFile(path.join(dir, 'profile'), 'utf8')).split('\n')).toContain(blockBegin('just'))

    const again = await provision(source, opts)
    expect(again.report.results.every(r => r.outcome === 'satisfied')).toBe(true)

    const down = await teardown(source, opts)
    expect(down.report.status).toBe('success')
    expect(down.report.results.map(r => [r.name, r.outcome])).toEqual([
      ['cache-cleaned', 'applied'],
      ['profile-hook-absent', 'applied'],
      ['justfile-absent', 'applied'],
      ['nix-package-absent', 'applied'],
    ])
    expect(state.packages.has('nix')).toBe(false)
    expect(await fs.pathExists(path.join(dir, 'share'))).toBe(false)
    expect(await fs.readFile(path.join(dir, 'profile'), 'utf8')).toBe('export A=1\n')
    expect(await fs.readdir(path.join(dir, 'cache'))).toEqual([])

    const downAgain = await teardown(source, opts)
    expect(downAgain.report.results.every(r => r.outcome === 'satisfied')).toBe(true)

    const audit = (await fs.readFile(auditLogPath, 'utf8')).trimEnd().split('\n')
    expect(audit.map(l => JSON.parse(l).operation)).toEqual(['provision', 'provision', 'teardown', 'teardown'])
  })

  it('only plans in a dry run', async () => {
    const { runner, state } = fakeAlpine()
    const { report } = await provision(source, { baseDir: dir, runner, auditLogPath: false, dryRun: true, retryDelayMs: 0 })

    expect(report.results.map(r => r.outcome)).toEqual(['satisfied', 'planned', 'planned', 'planned'])
    expect(state.packages.size).toBe(0)
    expect(await fs.pathExists(path.join(dir, 'share'))).toBe(false)
    expect(runner.commandLines().some(l => l.startsWith('apk add'))).toBe(false)
  })

  it('halts when a critical assertion fails', async () => {
    const { runner, state } = fakeAlpine()
    runner.on('id', () => ({ stdout: '1000\n' }))
    const { report } = await provision(source, { baseDir: dir, runner, auditLogPath: false, retryDelayMs: 0 })

    expect(report.status).toBe('failed')
    expect(report.results).toHaveLength(1)
    expect(report.results[0]).toMatchObject({ name: 'root-user', outcome: 'failed' })
    expect(state.packages.size).toBe(0)
  })
})
