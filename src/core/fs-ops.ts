import fs from 'fs-extra'
import path from 'path'

import { type BlockOptions, insertBlock, removeBlock } from './blocks.js'

export interface WriteOutcome {
  changed: boolean
}

function rand() {
  return Math.random().toString(16).slice(2)
}

export function tmpPathFor(p: string) {
  return `${p}.tmp.${rand()}`
}

export async function ensureParentDir(p: string) {
  await fs.ensureDir(path.dirname(p))
}

async function readIfExists(p: string): Promise<string | undefined> {
  if (!await fs.pathExists(p)) return undefined
  return await fs.readFile(p, 'utf8')
}

/**
 * Write via temp file + rename. Skips the write when content and mode already match.
 * Without a mode, a replaced file keeps the mode it had.
 */
export async function writeFileAtomic(p: string, content: string, mode?: number): Promise<WriteOutcome> {
  const current = await readIfExists(p)
  if (current === content) {
    if (mode === undefined) return { changed: false }
    const st = await fs.stat(p)
    if ((st.mode & 0o777) === mode) return { changed: false }
    await fs.chmod(p, mode)
    return { changed: true }
  }

  const keepMode = mode ?? (current === undefined ? undefined : (await fs.stat(p)).mode & 0o777)
  await ensureParentDir(p)
  const tmp = tmpPathFor(p)
  try {
    await fs.writeFile(tmp, content, 'utf8')
    if (keepMode !== undefined) await fs.chmod(tmp, keepMode)
    await fs.rename(tmp, p)
  } catch (e) {
    await fs.remove(tmp)
    throw e
  }
  return { changed: true }
}

export async function ensureBlockInFile(p: string, marker: string, body: string, opts: BlockOptions = {}): Promise<WriteOutcome> {
  const current = await readIfExists(p) ?? ''
  const next = insertBlock(current, marker, body, opts)
  if (!next.changed) return { changed: false }
  await writeFileAtomic(p, next.text)
  return { changed: true }
}

export async function removeBlockFromFile(p: string, marker: string, opts: BlockOptions = {}): Promise<WriteOutcome> {
  const current = await readIfExists(p)
  if (current === undefined) return { changed: false }
  const next = removeBlock(current, marker, opts)
  if (!next.changed) return { changed: false }
  await writeFileAtomic(p, next.text)
  return { changed: true }
}

export async function removePath(p: string): Promise<WriteOutcome> {
  if (!await fs.pathExists(p)) {
    // pathExists follows links; a dangling symlink still has to go.
    try {
      await fs.lstat(p)
    } catch {
      return { changed: false }
    }
  }
  await fs.remove(p)
  return { changed: true }
}

/**
 * Point target at source, replacing an existing symlink. Refuses to replace
 * anything that is not a symlink.
 */
export async function ensureSymlink(sourceAbs: string, targetAbs: string): Promise<WriteOutcome> {
  let existing: fs.Stats | undefined
  try {
    existing = await fs.lstat(targetAbs)
  } catch {
    existing = undefined
  }

  if (existing) {
    if (!existing.isSymbolicLink()) {
      throw new Error(`Refusing to replace non-symlink: ${targetAbs}`)
    }
    const link = await fs.readlink(targetAbs)
    if (path.resolve(path.dirname(targetAbs), link) === path.resolve(sourceAbs)) {
      return { changed: false }
    }
  }

  await ensureParentDir(targetAbs)
  const tmp = tmpPathFor(targetAbs)
  await fs.symlink(sourceAbs, tmp)
  await fs.rename(tmp, targetAbs)
  return { changed: true }
}
