import fs from 'fs-extra'
import path from 'path'

import { applied, failed, outcomeOf } from '../core/actions.js'
import type { RunContext } from '../core/context.js'
import { ensureBlockInFile, ensureSymlink, removeBlockFromFile, removePath, writeFileAtomic } from '../core/fs-ops.js'
import type { ApplyFn, ApplyOutcome } from '../types.js'
import { matchProfileEntries } from './builtin-probes.js'
import type { ActionSpec } from './schema.js'
import { renderTemplate, type Vars } from './vars.js'

export interface ActionEnv {
  /**
   * Directory `source` paths are resolved against.
   */
  catalogDir: string
  /**
   * Values for `{{name}}` placeholders in source files.
   */
  vars: Vars
}

async function run(ctx: RunContext, command: string, args: string[], input?: string): Promise<ApplyOutcome> {
  const res = await ctx.exec(command, args, { input })
  return outcomeOf(command, args, res, ctx.timeoutSeconds)
}

async function bodyOf(env: ActionEnv, spec: { content?: string; source?: string }): Promise<string> {
  if (spec.content !== undefined) return spec.content
  if (spec.source !== undefined) {
    const text = await fs.readFile(path.resolve(env.catalogDir, spec.source), 'utf8')
    return renderTemplate(text, env.vars)
  }
  return ''
}

function changedDetail(changed: boolean, what: string): string {
  return changed ? what : `${what} (unchanged)`
}

async function packageInstall(ctx: RunContext, spec: Extract<ActionSpec, { type: 'package-install' }>): Promise<ApplyOutcome> {
  if (spec.update) {
    const updated = await run(ctx, 'apk', ['update'])
    if (updated.status === 'failed') return updated
  }
  const out = await run(ctx, 'apk', ['add', '--no-cache', ...spec.packages])
  return out.status === 'applied' ? applied(`installed ${spec.packages.join(', ')}`) : out
}

async function packageRemove(ctx: RunContext, spec: Extract<ActionSpec, { type: 'package-remove' }>): Promise<ApplyOutcome> {
  const present: string[] = []
  for (const pkg of spec.packages) {
    const res = await ctx.exec('apk', ['info', '-e', pkg], { timeoutSeconds: Math.min(ctx.timeoutSeconds, 30) })
    if (res.spawnError) return failed(`apk unavailable: ${res.spawnError}`, 'spawn')
    if (res.exitCode === 0) present.push(pkg)
  }
  if (!present.length) return applied('nothing to remove')
  const out = await run(ctx, 'apk', ['del', '--purge', ...present])
  return out.status === 'applied' ? applied(`removed ${present.join(', ')}`) : out
}

async function cleanDir(paths: string[]): Promise<ApplyOutcome> {
  let changed = false
  for (const dir of paths) {
    if (!await fs.pathExists(dir)) continue
    const before = await fs.readdir(dir)
    if (!before.length) continue
    await fs.emptyDir(dir)
    changed = true
  }
  return applied(changedDetail(changed, `cleaned ${paths.join(', ')}`))
}

async function serviceEnable(ctx: RunContext, spec: Extract<ActionSpec, { type: 'service-enable' }>): Promise<ApplyOutcome> {
  const added = await run(ctx, 'rc-update', ['add', spec.service, ...(spec.runlevel ? [spec.runlevel] : [])])
  if (added.status === 'failed' && added.cause === 'spawn') return added
  return await run(ctx, 'rc-service', [spec.service, 'start'])
}

async function serviceDisable(ctx: RunContext, spec: Extract<ActionSpec, { type: 'service-disable' }>): Promise<ApplyOutcome> {
  const stopped = await run(ctx, 'rc-service', [spec.service, 'stop'])
  if (stopped.status === 'failed' && stopped.cause === 'spawn') return stopped
  // Not being in the runlevel already is fine; the follow-up probe decides.
  await run(ctx, 'rc-update', ['del', spec.service, ...(spec.runlevel ? [spec.runlevel] : [])])
  return stopped
}

/**
 * Entries to pass to `nix profile remove`: the leading index on older listings,
 * the `Name:` field on newer ones.
 */
export function profileRemovalArgs(listing: string, name: string): string[] {
  const args: string[] = []
  const blocks = listing.split(/\n\s*\n/)
  for (const block of blocks) {
    const named = /^Name:\s+(\S+)/m.exec(block)
    if (named) {
      if (named[1].toLowerCase().includes(name.toLowerCase())) args.push(named[1])
      continue
    }
    for (const line of matchProfileEntries(block, name)) {
      const index = /^\s*(\d+)\s/.exec(line)
      if (index) args.push(index[1])
    }
  }
  return args
}

async function nixProfileRemove(ctx: RunContext, spec: Extract<ActionSpec, { type: 'nix-profile-remove' }>): Promise<ApplyOutcome> {
  const res = await ctx.exec('nix', ['profile', 'list'])
  if (res.spawnError) return failed(`nix unavailable: ${res.spawnError}`, 'spawn')
  const entries = profileRemovalArgs(res.stdout, spec.name)
  if (!entries.length) return applied(`${spec.name} not in profile`)
  return await run(ctx, 'nix', ['profile', 'remove', ...entries])
}

async function userRemove(ctx: RunContext, spec: Extract<ActionSpec, { type: 'user-remove' }>): Promise<ApplyOutcome> {
  const id = await ctx.exec('id', ['-u', spec.user], { timeoutSeconds: 10 })
  if (id.spawnError) return failed(`id unavailable: ${id.spawnError}`, 'spawn')
  if (id.exitCode !== 0) return applied(`no user ${spec.user}`)
  return await run(ctx, 'deluser', ['--remove-home', spec.user])
}

export function actionFromSpec(spec: ActionSpec, env: ActionEnv): ApplyFn {
  return async (ctx) => {
    switch (spec.type) {
      case 'package-install':
        return await packageInstall(ctx, spec)
      case 'package-remove':
        return await packageRemove(ctx, spec)
      case 'exec':
        return await run(ctx, spec.command, spec.args ?? [], spec.input)
      case 'write-file': {
        const body = await bodyOf(env, spec)
        const mode = spec.mode !== undefined ? parseInt(spec.mode, 8) : undefined
        const { changed } = await writeFileAtomic(spec.path, body, mode)
        return applied(changedDetail(changed, `wrote ${spec.path}`))
      }
      case 'remove-path': {
        let changed = false
        for (const p of spec.paths) {
          if ((await removePath(p)).changed) changed = true
        }
        return applied(changedDetail(changed, `removed ${spec.paths.join(', ')}`))
      }
      case 'clean-dir':
        return await cleanDir(spec.paths)
      case 'insert-block': {
        const body = await bodyOf(env, spec)
        const { changed } = await ensureBlockInFile(spec.file, spec.marker, body, { commentPrefix: spec.commentPrefix })
        return applied(changedDetail(changed, `inserted ${spec.marker} into ${spec.file}`))
      }
      case 'remove-block': {
        const { changed } = await removeBlockFromFile(spec.file, spec.marker, { commentPrefix: spec.commentPrefix })
        return applied(changedDetail(changed, `removed ${spec.marker} from ${spec.file}`))
      }
      case 'symlink': {
        const { changed } = await ensureSymlink(spec.source, spec.target)
        return applied(changedDetail(changed, `linked ${spec.target}`))
      }
      case 'service-enable':
        return await serviceEnable(ctx, spec)
      case 'service-disable':
        return await serviceDisable(ctx, spec)
      case 'nix-profile-install':
        return await run(ctx, 'nix', ['profile', 'install', spec.ref])
      case 'nix-profile-remove':
        return await nixProfileRemove(ctx, spec)
      case 'user-remove':
        return await userRemove(ctx, spec)
      case 'sequence': {
        const details: string[] = []
        for (const step of spec.actions) {
          const out = await actionFromSpec(step, env)(ctx)
          if (out.status === 'failed') return out
          if (out.detail) details.push(out.detail)
        }
        return applied(details.join('; ') || undefined)
      }
    }
  }
}
