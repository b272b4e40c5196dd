import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import { defaultAuditLogPath, tryAppendAudit } from '../src/core/audit.js'
import type { RunReport } from '../src/types.js'

function emptyReport(): RunReport {
  return {
    operation: 'provision',
    status: 'success',
    dryRun: false,
    aborted: false,
    total: 0,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:00.000Z',
    durationMs: 0,
    results: [],
    warnings: [],
  }
}

describe('audit log', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stateward-test-'))
  })

  afterEach(async () => {
    await fs.remove(dir)
  })

  it('follows XDG_STATE_HOME', () => {
    expect(defaultAuditLogPath({ XDG_STATE_HOME: '/state' }, '/home/u')).toBe('/state/stateward/runs.log.jsonl')
    expect(defaultAuditLogPath({}, '/home/u')).toBe('/home/u/.local/state/stateward/runs.log.jsonl')
  })

  it('appends one JSON line per run', async () => {
    const logPath = path.join(dir, 'nested', 'runs.log.jsonl')
    await tryAppendAudit(emptyReport(), logPath)
    await tryAppendAudit({ ...emptyReport(), operation: 'teardown' }, logPath)

    const lines = (await fs.readFile(logPath, 'utf8')).trimEnd().split('\n')
    expect(lines.map(l => JSON.parse(l).operation)).toEqual(['provision', 'teardown'])
  })

  it('writes nothing when turned off', async () => {
    const report = await tryAppendAudit(emptyReport(), false)
    expect(report.warnings).toEqual([])
    expect(await fs.readdir(dir)).toEqual([])
  })

  it('turns a failed write into a warning', async () => {
    const blocker = path.join(dir, 'file')
    await fs.writeFile(blocker, 'x')
    const logPath = path.join(blocker, 'runs.log.jsonl')

    const report = await tryAppendAudit(emptyReport(), logPath)

    expect(report.status).toBe('success')
    expect(report.warnings).toHaveLength(1)
    expect(report.warnings[0].startsWith(`Failed to write audit log ${logPath}: `)).toBe(true)
  })
})
