import path from 'path'

import { hasBlock } from '../core/blocks.js'
import type { RunContext } from '../core/context.js'
import { describeProcessResult } from '../core/process.js'
import { indeterminate, satisfied, unsatisfied } from '../core/probes.js'
import type { ProbeFn, ProbeState } from '../types.js'
import type { ProbeSpec } from './schema.js'

function firstLine(text: string): string {
  return text.split('\n').map(l => l.trim()).find(Boolean) ?? ''
}

async function lstatOrUndefined(ctx: RunContext, p: string) {
  try {
    return await ctx.fs.lstat(p)
  } catch {
    return undefined
  }
}

async function commandProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'command' }>): Promise<ProbeState> {
  const presence = await ctx.commandExists(spec.command)
  if (presence === 'unknown') return indeterminate(`could not look up ${spec.command}`)
  if (presence === 'absent') return unsatisfied(`${spec.command} not found`)
  if (!spec.versionArgs) return satisfied(`${spec.command} found`)

  const res = await ctx.exec(spec.command, spec.versionArgs)
  if (res.spawnError || res.timedOut || res.exitCode !== 0) {
    // A binary that exists but does not run is not a working install.
    return unsatisfied(describeProcessResult(spec.command, spec.versionArgs, res, ctx.timeoutSeconds))
  }
  const output = `${res.stdout}\n${res.stderr}`
  if (spec.expect !== undefined && !output.includes(spec.expect)) {
    return unsatisfied(`${spec.command} output lacks "${spec.expect}"`)
  }
  return satisfied(firstLine(res.stdout) || firstLine(res.stderr) || `${spec.command} runs`)
}

async function packageProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'package' }>): Promise<ProbeState> {
  const wantInstalled = (spec.state ?? 'installed') === 'installed'
  const wrong: string[] = []
  for (const pkg of spec.packages) {
    const res = await ctx.exec('apk', ['info', '-e', pkg], { timeoutSeconds: Math.min(ctx.timeoutSeconds, 30) })
    if (res.spawnError) return indeterminate(`apk unavailable: ${res.spawnError}`)
    if (res.timedOut) return indeterminate(`apk info timed out for ${pkg}`)
    const installed = res.exitCode === 0
    if (installed !== wantInstalled) wrong.push(pkg)
  }
  if (!wrong.length) {
    return satisfied(wantInstalled ? 'all installed' : 'none installed')
  }
  return unsatisfied(`${wantInstalled ? 'missing' : 'still installed'}: ${wrong.join(', ')}`)
}

async function pathProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'path' }>): Promise<ProbeState> {
  const st = await lstatOrUndefined(ctx, spec.path)
  if (!st) return unsatisfied(`${spec.path} missing`)

  const kind = spec.linkTo !== undefined ? 'symlink' : spec.kind
  if (kind === 'symlink') {
    if (!st.isSymbolicLink()) return unsatisfied(`${spec.path} is not a symlink`)
    if (spec.linkTo !== undefined) {
      const link = await ctx.fs.readlink(spec.path)
      const resolved = path.resolve(path.dirname(spec.path), link)
      if (resolved !== path.resolve(spec.linkTo)) return unsatisfied(`${spec.path} points at ${link}`)
    }
  } else if (kind === 'file' && !st.isFile()) {
    return unsatisfied(`${spec.path} is not a regular file`)
  } else if (kind === 'dir' && !st.isDirectory()) {
    return unsatisfied(`${spec.path} is not a directory`)
  }
  return satisfied(`${spec.path} present`)
}

async function dirEmptyProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'dir-empty' }>): Promise<ProbeState> {
  const busy: string[] = []
  for (const dir of spec.paths) {
    const st = await lstatOrUndefined(ctx, dir)
    if (!st) continue
    if (!st.isDirectory()) return indeterminate(`${dir} is not a directory`)
    const entries = await ctx.fs.readdir(dir)
    if (entries.length) busy.push(`${dir} (${entries.length})`)
  }
  return busy.length ? unsatisfied(`not empty: ${busy.join(', ')}`) : satisfied('empty')
}

async function markerProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'marker' }>): Promise<ProbeState> {
  if (!await ctx.fs.pathExists(spec.file)) return unsatisfied(`${spec.file} missing`)
  const text = await ctx.fs.readText(spec.file)
  return hasBlock(text, spec.marker, { commentPrefix: spec.commentPrefix })
    ? satisfied(`${spec.marker} block present`)
    : unsatisfied(`${spec.marker} block missing from ${spec.file}`)
}

async function serviceProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'service' }>): Promise<ProbeState> {
  const res = await ctx.exec('rc-service', [spec.service, 'status'], { timeoutSeconds: Math.min(ctx.timeoutSeconds, 30) })
  if (res.spawnError) return indeterminate(`rc-service unavailable: ${res.spawnError}`)
  if (res.timedOut) return indeterminate(`rc-service ${spec.service} status timed out`)
  return res.exitCode === 0 ? satisfied(`${spec.service} running`) : unsatisfied(`${spec.service} not running`)
}

async function userProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'user' }>): Promise<ProbeState> {
  const res = await ctx.exec('id', ['-u', spec.user], { timeoutSeconds: 10 })
  if (res.spawnError) return indeterminate(`id unavailable: ${res.spawnError}`)
  if (res.timedOut) return indeterminate(`id -u ${spec.user} timed out`)
  return res.exitCode === 0 ? satisfied(`uid ${res.stdout.trim()}`) : unsatisfied(`no user ${spec.user}`)
}

async function execProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'exec' }>): Promise<ProbeState> {
  const args = spec.args ?? []
  const res = await ctx.exec(spec.command, args)
  if (res.spawnError) return indeterminate(describeProcessResult(spec.command, args, res, ctx.timeoutSeconds))
  if (res.timedOut) return unsatisfied(describeProcessResult(spec.command, args, res, ctx.timeoutSeconds))
  const want = spec.exitCode ?? 0
  if (res.exitCode !== want) return unsatisfied(describeProcessResult(spec.command, args, res, ctx.timeoutSeconds))
  if (spec.stdoutEquals !== undefined && res.stdout.trim() !== spec.stdoutEquals) {
    return unsatisfied(`stdout is "${res.stdout.trim()}", expected "${spec.stdoutEquals}"`)
  }
  if (spec.stdoutIncludes !== undefined && !res.stdout.includes(spec.stdoutIncludes)) {
    return unsatisfied(`stdout lacks "${spec.stdoutIncludes}"`)
  }
  return satisfied(firstLine(res.stdout) || undefined)
}

/**
 * Lines of `nix profile list` that mention the name, case-insensitively.
 */
export function matchProfileEntries(listing: string, name: string): string[] {
  const needle = name.toLowerCase()
  return listing.split('\n').filter(l => l.toLowerCase().includes(needle))
}

async function nixProfileProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'nix-profile' }>): Promise<ProbeState> {
  const res = await ctx.exec('nix', ['profile', 'list'])
  if (res.spawnError) return indeterminate(`nix unavailable: ${res.spawnError}`)
  if (res.timedOut || res.exitCode !== 0) return indeterminate(describeProcessResult('nix', ['profile', 'list'], res, ctx.timeoutSeconds))
  return matchProfileEntries(res.stdout, spec.name).length
    ? satisfied(`${spec.name} in profile`)
    : unsatisfied(`${spec.name} not in profile`)
}

/**
 * Available megabytes from `df -P -m` output (fourth column of the data line).
 */
export function parseDfAvailableMb(stdout: string): number | undefined {
  const lines = stdout.split('\n').filter(l => l.trim().length)
  if (lines.length < 2) return undefined
  const cols = lines[lines.length - 1].trim().split(/\s+/)
  const avail = Number(cols[3])
  return Number.isFinite(avail) ? avail : undefined
}

async function diskSpaceProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'disk-space' }>): Promise<ProbeState> {
  const target = spec.path ?? '/'
  const res = await ctx.exec('df', ['-P', '-m', target], { timeoutSeconds: Math.min(ctx.timeoutSeconds, 30) })
  if (res.spawnError || res.timedOut || res.exitCode !== 0) {
    return indeterminate(`cannot check disk space: ${describeProcessResult('df', ['-P', '-m', target], res, ctx.timeoutSeconds)}`)
  }
  const avail = parseDfAvailableMb(res.stdout)
  if (avail === undefined) return indeterminate(`cannot check disk space: unreadable df output`)
  return avail >= spec.minMb
    ? satisfied(`${avail}MB available on ${target}`)
    : unsatisfied(`${avail}MB available on ${target}, ${spec.minMb}MB required`)
}

async function internetProbe(ctx: RunContext): Promise<ProbeState> {
  switch (await ctx.connectivity()) {
    case 'online':
      return satisfied('online')
    case 'offline':
      return unsatisfied('no connectivity')
    case 'unknown':
      return indeterminate('cannot check connectivity: ping unavailable')
  }
}

async function allProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'all' }>): Promise<ProbeState> {
  let unknown: ProbeState | undefined
  for (const member of spec.probes) {
    const state = await probeFromSpec(member)(ctx)
    if (state.state === 'unsatisfied') return state
    if (state.state === 'indeterminate') unknown ??= state
  }
  return unknown ?? satisfied()
}

async function notProbe(ctx: RunContext, spec: Extract<ProbeSpec, { type: 'not' }>): Promise<ProbeState> {
  const inner = await probeFromSpec(spec.probe)(ctx)
  switch (inner.state) {
    case 'satisfied':
      return unsatisfied(inner.detail ? `still present: ${inner.detail}` : 'still present')
    case 'unsatisfied':
      return satisfied(inner.detail ? `absent: ${inner.detail}` : 'absent')
    case 'indeterminate':
      return inner
  }
}

export function probeFromSpec(spec: ProbeSpec): ProbeFn {
  return async (ctx) => {
    switch (spec.type) {
      case 'command': return await commandProbe(ctx, spec)
      case 'package': return await packageProbe(ctx, spec)
      case 'path': return await pathProbe(ctx, spec)
      case 'dir-empty': return await dirEmptyProbe(ctx, spec)
      case 'marker': return await markerProbe(ctx, spec)
      case 'service': return await serviceProbe(ctx, spec)
      case 'user': return await userProbe(ctx, spec)
      case 'exec': return await execProbe(ctx, spec)
      case 'nix-profile': return await nixProfileProbe(ctx, spec)
      case 'disk-space': return await diskSpaceProbe(ctx, spec)
      case 'internet': return await internetProbe(ctx)
      case 'all': return await allProbe(ctx, spec)
      case 'not': return await notProbe(ctx, spec)
    }
  }
}
