import { execa } from 'execa'
import { setTimeout as sleep } from 'node:timers/promises'

import { errorMessage } from './errors.js'

export const TIMEOUT_EXIT_CODE = 124
export const SPAWN_FAILURE_EXIT_CODE = 127
export const SIGNALED_EXIT_CODE = 128
export const DEFAULT_GRACE_SECONDS = 5

export interface ProcessResult {
  exitCode: number
  stdout: string
  stderr: string
  /**
   * True when the deadline fired. exitCode is then 124.
   */
  timedOut: boolean
  /**
   * Set when the command could not be launched at all (missing binary, bad cwd).
   */
  spawnError?: string
  signal?: string
  pid?: number
  durationMs: number
}

export interface RunOptions {
  timeoutSeconds: number
  /**
   * Seconds between SIGTERM and SIGKILL once the deadline fired.
   */
  graceSeconds?: number
  cwd?: string
  env?: Record<string, string>
  input?: string
}

export interface ProcessRunner {
  run(command: string, args: string[], opts: RunOptions): Promise<ProcessResult>
}

function spawn(command: string, args: string[], opts: RunOptions, graceMs: number) {
  return execa(command, args, {
    cwd: opts.cwd,
    env: opts.env,
    input: opts.input,
    timeout: Math.max(1, Math.round(opts.timeoutSeconds * 1000)),
    // Own process group: a Ctrl-C at the terminal reaches the CLI, not the command.
    detached: true,
    reject: false,
  })
}

type Subprocess = ReturnType<typeof spawn>

// execa skips its exit cleanup for detached children, so track them here.
const live = new Set<Subprocess>()
let exitHookInstalled = false

function track(child: Subprocess) {
  if (!exitHookInstalled) {
    exitHookInstalled = true
    process.once('exit', () => {
      for (const c of live) c.kill('SIGKILL')
    })
  }
  live.add(child)
}

async function settlesWithin(p: Promise<void>, ms: number): Promise<boolean> {
  const guard = new AbortController()
  try {
    return await Promise.race([
      p.then(() => true),
      sleep(ms, false, { signal: guard.signal }).catch(() => false),
    ])
  } finally {
    guard.abort()
  }
}

/**
 * Runs a command to completion or deadline. Never rejects: exit status,
 * timeouts and launch failures are all reported in the result.
 */
export async function runProcess(command: string, args: string[], opts: RunOptions): Promise<ProcessResult> {
  const startedMs = Date.now()
  const graceMs = Math.max(0, (opts.graceSeconds ?? DEFAULT_GRACE_SECONDS) * 1000)

  let subprocess: Subprocess
  try {
    subprocess = spawn(command, args, opts, graceMs)
  } catch (e) {
    return spawnFailure(e, startedMs)
  }
  const child = subprocess
  track(child)

  // Registered before awaiting so an early exit is not missed.
  const exited = new Promise<void>(resolve => {
    if (child.exitCode !== null || child.signalCode !== null) {
      resolve()
      return
    }
    child.once('exit', () => resolve())
    child.once('error', () => resolve())
  }).finally(() => live.delete(child))

  let result: Awaited<Subprocess>
  try {
    result = await child
  } catch (e) {
    return spawnFailure(e, startedMs, child.pid)
  }

  if (result.timedOut) {
    // execa sent SIGTERM. Escalate once the grace period is over and reap the child.
    if (!await settlesWithin(exited, graceMs)) {
      child.kill('SIGKILL')
      await exited
    }
    return {
      exitCode: TIMEOUT_EXIT_CODE,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      timedOut: true,
      signal: result.signal ?? undefined,
      pid: child.pid,
      durationMs: Date.now() - startedMs,
    }
  }

  if (typeof result.exitCode === 'number') {
    return {
      exitCode: result.exitCode,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      timedOut: false,
      pid: child.pid,
      durationMs: Date.now() - startedMs,
    }
  }

  if (result.signal) {
    return {
      exitCode: SIGNALED_EXIT_CODE,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      timedOut: false,
      signal: result.signal,
      pid: child.pid,
      durationMs: Date.now() - startedMs,
    }
  }

  const message = 'originalMessage' in result && typeof result.originalMessage === 'string'
    ? result.originalMessage
    : `failed to launch ${command}`
  return {
    exitCode: SPAWN_FAILURE_EXIT_CODE,
    stdout: '',
    stderr: result.stderr ?? '',
    timedOut: false,
    spawnError: message,
    pid: child.pid,
    durationMs: Date.now() - startedMs,
  }
}

function spawnFailure(e: unknown, startedMs: number, pid?: number): ProcessResult {
  return {
    exitCode: SPAWN_FAILURE_EXIT_CODE,
    stdout: '',
    stderr: '',
    timedOut: false,
    spawnError: errorMessage(e),
    pid,
    durationMs: Date.now() - startedMs,
  }
}

export const nodeRunner: ProcessRunner = {
  run: runProcess,
}

/**
 * One-line description of a finished command, for logs and failure reasons.
 */
export function describeProcessResult(command: string, args: string[], res: ProcessResult, timeoutSeconds: number): string {
  const cmd = [command, ...args].join(' ')
  if (res.spawnError) return `could not launch \`${cmd}\`: ${res.spawnError}`
  if (res.timedOut) return `\`${cmd}\` timed out after ${timeoutSeconds}s`
  const tail = lastLine(res.stderr) || lastLine(res.stdout)
  return `\`${cmd}\` exited with ${res.exitCode}${tail ? `: ${tail}` : ''}`
}

function lastLine(text: string): string {
  const lines = text.split('\n').map(l => l.trim()).filter(Boolean)
  return lines.length ? lines[lines.length - 1] : ''
}
