import type { Logger } from '../types.js'
import { type FS, nodeFS } from './fs.js'
import { silentLogger } from './logger.js'
import { DEFAULT_GRACE_SECONDS, type ProcessResult, type ProcessRunner, TIMEOUT_EXIT_CODE, nodeRunner } from './process.js'
import { ResourceScope } from './scope.js'

export type Presence = 'present' | 'absent' | 'unknown'
export type Connectivity = 'online' | 'offline' | 'unknown'

export interface RunContextOptions {
  runner?: ProcessRunner
  fs?: FS
  logger?: Logger
  scope?: ResourceScope
  graceSeconds?: number
  dryRun?: boolean
}

const DEFAULT_TIMEOUT_SECONDS = 60
const CONNECTIVITY_HOSTS = ['8.8.8.8', '1.1.1.1']

/**
 * Everything probes and actions may touch during one run. Lookups that are
 * expensive and asked repeatedly (command existence, connectivity) are cached
 * here; the reconciler calls invalidate() after every action, and a new run
 * always starts with a new context.
 */
export class RunContext {
  readonly runner: ProcessRunner
  readonly fs: FS
  readonly logger: Logger
  readonly scope: ResourceScope
  readonly graceSeconds: number
  readonly dryRun: boolean

  private itemTimeoutSeconds = DEFAULT_TIMEOUT_SECONDS
  private phaseDeadlineMs = Number.POSITIVE_INFINITY
  private commands = new Map<string, boolean>()
  private internet: boolean | undefined

  constructor(opts: RunContextOptions = {}) {
    this.runner = opts.runner ?? nodeRunner
    this.fs = opts.fs ?? nodeFS
    this.logger = opts.logger ?? silentLogger()
    this.scope = opts.scope ?? new ResourceScope(this.logger)
    this.graceSeconds = opts.graceSeconds ?? DEFAULT_GRACE_SECONDS
    this.dryRun = opts.dryRun ?? false
  }

  /**
   * Deadline applied to exec() calls of the item currently being reconciled.
   */
  get timeoutSeconds(): number {
    return this.itemTimeoutSeconds
  }

  beginItem(timeoutSeconds: number): void {
    this.itemTimeoutSeconds = timeoutSeconds
    this.phaseDeadlineMs = Number.POSITIVE_INFINITY
  }

  /**
   * Start the budget for one probe or apply. Every exec() until the next
   * phase shares it: each command gets at most what is left.
   */
  beginPhase(): void {
    this.phaseDeadlineMs = Date.now() + this.itemTimeoutSeconds * 1000
  }

  /**
   * The phase overran its guard; refuse to start anything else in it.
   */
  closePhase(): void {
    this.phaseDeadlineMs = Number.NEGATIVE_INFINITY
  }

  async exec(command: string, args: string[] = [], opts: { timeoutSeconds?: number; input?: string; cwd?: string } = {}): Promise<ProcessResult> {
    const cmd = [command, ...args].join(' ')
    const remainingSeconds = (this.phaseDeadlineMs - Date.now()) / 1000
    if (remainingSeconds <= 0) {
      this.logger.warn(`Not starting ${cmd}: out of time`)
      return { exitCode: TIMEOUT_EXIT_CODE, stdout: '', stderr: '', timedOut: true, durationMs: 0 }
    }
    const timeoutSeconds = Math.min(opts.timeoutSeconds ?? this.itemTimeoutSeconds, remainingSeconds)
    this.logger.debug?.(`exec: ${cmd} (timeout ${timeoutSeconds}s)`)
    const res = await this.runner.run(command, args, {
      timeoutSeconds,
      graceSeconds: this.graceSeconds,
      input: opts.input,
      cwd: opts.cwd,
    })
    if (res.timedOut) {
      this.logger.warn(`${command} timed out after ${timeoutSeconds}s`)
    }
    return res
  }

  async commandExists(name: string): Promise<Presence> {
    const cached = this.commands.get(name)
    if (cached !== undefined) return cached ? 'present' : 'absent'

    const res = await this.exec('sh', ['-c', 'command -v "$1"', 'sh', name], { timeoutSeconds: 5 })
    if (res.spawnError || res.timedOut) return 'unknown'
    const present = res.exitCode === 0
    this.commands.set(name, present)
    return present ? 'present' : 'absent'
  }

  /**
   * 'unknown' when ping itself cannot run; that answer is not cached.
   */
  async connectivity(): Promise<Connectivity> {
    if (this.internet !== undefined) return this.internet ? 'online' : 'offline'
    for (const host of CONNECTIVITY_HOSTS) {
      const res = await this.exec('ping', ['-c', '1', '-W', '2', host], { timeoutSeconds: 5 })
      if (res.spawnError) return 'unknown'
      if (res.exitCode === 0) {
        this.internet = true
        return 'online'
      }
    }
    this.internet = false
    return 'offline'
  }

  /**
   * Drop cached lookups. Called after every action, since an action may have
   * installed or removed the very commands that were cached.
   */
  invalidate(): void {
    this.commands.clear()
    this.internet = undefined
  }
}
