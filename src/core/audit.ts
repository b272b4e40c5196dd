import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import type { RunReport } from '../types.js'
import { errorMessage } from './errors.js'

export function defaultAuditLogPath(env: NodeJS.ProcessEnv = process.env, homeDir = os.homedir()): string {
  const base = env.XDG_STATE_HOME || path.join(homeDir, '.local', 'state')
  return path.join(base, 'stateward', 'runs.log.jsonl')
}

export async function appendAudit(logPath: string, report: RunReport) {
  await fs.ensureDir(path.dirname(logPath))
  const line = JSON.stringify(report) + '\n'
  await fs.appendFile(logPath, line, 'utf8')
}

/**
 * Append one line for the run. A failed write becomes a report warning; the
 * run's status is left alone.
 */
export async function tryAppendAudit(report: RunReport, auditLogPath: string | false | undefined): Promise<RunReport> {
  if (auditLogPath === false) return report
  const logPath = auditLogPath ?? defaultAuditLogPath()
  try {
    await appendAudit(logPath, report)
  } catch (e) {
    report.warnings.push(`Failed to write audit log ${logPath}: ${errorMessage(e)}`)
  }
  return report
}
