#!/usr/bin/env node
import path from 'path'
import { fileURLToPath } from 'url'

import { provision } from './api/provision.js'
import type { ProvisionOptions } from './api/provision.js'
import { teardown } from './api/teardown.js'
import { bundledCatalogDir } from './catalog/io.js'
import { clearDefaultCatalogDir, getDefaultCatalogDir, readGlobalConfig, setDefaultCatalogDir } from './cli/config.js'
import { StatewardError } from './core/errors.js'
import { stderrLogger } from './core/logger.js'
import { exitCodeOf, renderReport } from './core/report.js'
import type { Operation } from './types.js'

type Argv = string[]

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = 1) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = 1): never {
  throw new CliExit(msg, code)
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) die(`${a} requires a value`)
    args.splice(i, 2)
    return v
  }
  return undefined
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

interface RunFlags {
  catalogDir?: string
  dryRun: boolean
  verbose: boolean
  json: boolean
  auditLogPath?: string
  retries?: number
}

function parseRunFlags(args: Argv): RunFlags {
  const catalog = popFlagValue(args, ['-c', '--catalog'])
  const auditLogPath = popFlagValue(args, ['--audit-log'])
  const retriesRaw = popFlagValue(args, ['--retries'])
  let retries: number | undefined
  if (retriesRaw !== undefined) {
    retries = Number(retriesRaw)
    if (!Number.isInteger(retries) || retries < 0) die(`Invalid --retries: ${retriesRaw} (expected a non-negative integer)`)
  }
  return {
    catalogDir: catalog ? path.resolve(catalog) : undefined,
    dryRun: hasFlag(args, ['--dry-run']),
    verbose: hasFlag(args, ['-v', '--verbose']),
    json: hasFlag(args, ['--json']),
    auditLogPath: auditLogPath ? path.resolve(auditLogPath) : undefined,
    retries,
  }
}

function printHelp(): void {
  const msg = `
stateward

Usage:
  stateward catalog set <dir>
  stateward catalog show
  stateward catalog clear

  stateward provision [-c <catalog-dir>] [--dry-run] [--verbose] [--json] [--audit-log <path>] [--retries <n>]
  stateward teardown  [-c <catalog-dir>] [--dry-run] [--verbose] [--json] [--audit-log <path>] [--retries <n>]

Without -c, the default catalog from \`stateward catalog set\` is used, then the bundled one.
`
  process.stdout.write(msg.trimStart())
  process.stdout.write('\n')
}

async function runCommand(operation: Operation, args: Argv): Promise<number> {
  const flags = parseRunFlags(args)
  if (args.length) die(`Unknown arguments: ${args.join(' ')}`)

  const config = await readGlobalConfig()
  const catalogDir = flags.catalogDir ?? config.catalogDir ?? bundledCatalogDir()
  const logger = stderrLogger({ verbose: flags.verbose })

  const controller = new AbortController()
  const onSignal = (sig: NodeJS.Signals) => {
    logger.warn(`Received ${sig}; stopping after the current item`)
    controller.abort()
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  const opts: ProvisionOptions = {
    logger,
    dryRun: flags.dryRun,
    signal: controller.signal,
    auditLogPath: flags.auditLogPath ?? config.auditLogPath,
    indeterminateRetries: flags.retries ?? config.indeterminateRetries,
    graceSeconds: config.graceSeconds,
    timeoutSeconds: config.timeoutSeconds,
  }

  try {
    const { report } = operation === 'provision'
      ? await provision(catalogDir, opts)
      : await teardown(catalogDir, opts)
    const out = flags.json ? JSON.stringify(report, null, 2) : renderReport(report, { verbose: flags.verbose })
    process.stdout.write(out + '\n')
    return exitCodeOf(report)
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const args = [...argv]
    if (args.length === 0 || hasFlag(args, ['-h', '--help'])) {
      printHelp()
      return 0
    }

    const cmd = args.shift()
    if (!cmd) {
      printHelp()
      return 1
    }

    if (cmd === 'catalog') {
      const sub = args.shift()
      if (sub === 'set') {
        const p = args.shift()
        if (!p) die('catalog set requires a directory')
        const abs = await setDefaultCatalogDir(p)
        process.stdout.write(abs + '\n')
        return 0
      }
      if (sub === 'show') {
        const p = await getDefaultCatalogDir()
        if (!p) die('No default catalog set. Run `stateward catalog set <dir>`.', 2)
        process.stdout.write(p + '\n')
        return 0
      }
      if (sub === 'clear') {
        await clearDefaultCatalogDir()
        return 0
      }
      die('Unknown catalog subcommand. Expected: set|show|clear')
    }

    if (cmd === 'provision' || cmd === 'teardown') {
      return await runCommand(cmd, args)
    }

    die(`Unknown command: ${cmd}`)
  } catch (e) {
    if (e instanceof CliExit || e instanceof StatewardError) {
      const msg = e.message || 'Command failed'
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      return e instanceof CliExit ? e.exitCode : 1
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
