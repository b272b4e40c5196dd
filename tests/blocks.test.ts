import { describe, expect, it } from 'vitest'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import { blockBegin, blockEnd, hasBlock, insertBlock, removeBlock } from '../src/core/blocks.js'
import { ensureBlockInFile, ensureSymlink, removeBlockFromFile, writeFileAtomic } from '../src/core/fs-ops.js'

describe('sentinel blocks', () => {
  it('appends a block after a blank separator', () => {
    const { text, changed } = insertBlock('a\n', 'nix', 'echo hi')
    expect(changed).toBe(true)
    expect(text).toBe('a\n\n# >>> stateward:nix >>>\necho hi\n# <<< stateward:nix <<<\n')
  })

  it('inserting twice leaves exactly one block', () => {
    const once = insertBlock('a\n', 'nix', 'echo hi').text
    const twice = insertBlock(once, 'nix', 'echo hi')
    expect(twice.changed).toBe(false)
    expect(twice.text).toBe(once)
    expect(twice.text.split('\n').filter(l => l === blockBegin('nix')).length).toBe(1)
  })

  it('remove restores the original text', () => {
    const inserted = insertBlock('a\n', 'nix', 'echo hi').text
    expect(removeBlock(inserted, 'nix')).toEqual({ text: 'a\n', changed: true })
  })

  it('round-trips an empty file', () => {
    const inserted = insertBlock('', 'm', 'x').text
    expect(inserted).toBe('# >>> stateward:m >>>\nx\n# <<< stateward:m <<<\n')
    expect(removeBlock(inserted, 'm').text).toBe('')
  })

  it('honors a custom comment prefix', () => {
    const { text } = insertBlock('', 'm', 'x', { commentPrefix: '//' })
    expect(text.startsWith('// >>> stateward:m >>>')).toBe(true)
    expect(hasBlock(text, 'm')).toBe(false)
    expect(hasBlock(text, 'm', { commentPrefix: '//' })).toBe(true)
  })

  it('leaves an unterminated block alone', () => {
    const text = `a\n${blockBegin('m')}\nx\n`
    expect(removeBlock(text, 'm')).toEqual({ text, changed: false })
  })

  it('removes only the named block', () => {
    const both = insertBlock(insertBlock('', 'one', '1').text, 'two', '2').text
    const { text } = removeBlock(both, 'one')
    expect(text).toBe(`${blockBegin('two')}\n2\n${blockEnd('two')}\n`)
  })
})

describe('file operations', () => {
  it('writes atomically and skips identical content', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stateward-test-'))
    try {
      const p = path.join(dir, 'nested', 'f.txt')
      expect(await writeFileAtomic(p, 'one', 0o600)).toEqual({ changed: true })
      expect(await writeFileAtomic(p, 'one', 0o600)).toEqual({ changed: false })
      expect((await fs.stat(p)).mode & 0o777).toBe(0o600)
      expect(await writeFileAtomic(p, 'one', 0o644)).toEqual({ changed: true })
      expect((await fs.stat(p)).mode & 0o777).toBe(0o644)
      expect(await fs.readdir(path.dirname(p))).toEqual(['f.txt'])
    } finally {
      await fs.remove(dir)
    }
  })

  it('inserts a block into a file once and removes it again', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stateward-test-'))
    try {
      const p = path.join(dir, 'profile')
      await fs.writeFile(p, 'export A=1\n')
      expect(await ensureBlockInFile(p, 'nix', '. /etc/profile.d/nix.sh')).toEqual({ changed: true })
      expect(await ensureBlockInFile(p, 'nix', '. /etc/profile.d/nix.sh')).toEqual({ changed: false })
      expect(await removeBlockFromFile(p, 'nix')).toEqual({ changed: true })
      expect(await fs.readFile(p, 'utf8')).toBe('export A=1\n')
      expect(await removeBlockFromFile(path.join(dir, 'missing'), 'nix')).toEqual({ changed: false })
    } finally {
      await fs.remove(dir)
    }
  })

  it('refuses to replace a regular file with a symlink', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stateward-test-'))
    try {
      const src = path.join(dir, 'src')
      const target = path.join(dir, 'target')
      await fs.writeFile(src, 's')
      await fs.writeFile(target, 't')
      await expect(ensureSymlink(src, target)).rejects.toThrow(/Refusing to replace non-symlink/)
      await fs.remove(target)
      expect(await ensureSymlink(src, target)).toEqual({ changed: true })
      expect(await ensureSymlink(src, target)).toEqual({ changed: false })
    } finally {
      await fs.remove(dir)
    }
  })
})
