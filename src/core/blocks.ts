export const BLOCK_TAG = 'stateward'

export interface BlockOptions {
  /**
   * Line comment prefix of the target file format. Default: '#'.
   */
  commentPrefix?: string
}

export function blockBegin(marker: string, opts: BlockOptions = {}): string {
  return `${opts.commentPrefix ?? '#'} >>> ${BLOCK_TAG}:${marker} >>>`
}

export function blockEnd(marker: string, opts: BlockOptions = {}): string {
  return `${opts.commentPrefix ?? '#'} <<< ${BLOCK_TAG}:${marker} <<<`
}

export function hasBlock(text: string, marker: string, opts: BlockOptions = {}): boolean {
  const begin = blockBegin(marker, opts)
  return text.split('\n').some(l => l.trimEnd() === begin)
}

/**
 * Append a sentinel-marked block. Returns the input unchanged when the
 * block's begin line is already present.
 */
export function insertBlock(text: string, marker: string, body: string, opts: BlockOptions = {}): { text: string; changed: boolean } {
  if (hasBlock(text, marker, opts)) return { text, changed: false }

  const lines: string[] = []
  if (text.length) {
    lines.push(text.endsWith('\n') ? text.slice(0, -1) : text)
    lines.push('')
  }
  lines.push(blockBegin(marker, opts))
  const trimmed = body.endsWith('\n') ? body.slice(0, -1) : body
  if (trimmed.length) lines.push(trimmed)
  lines.push(blockEnd(marker, opts))
  return { text: lines.join('\n') + '\n', changed: true }
}

/**
 * Remove a sentinel-marked block and the blank line that separated it.
 * An unterminated block is left alone.
 */
export function removeBlock(text: string, marker: string, opts: BlockOptions = {}): { text: string; changed: boolean } {
  const begin = blockBegin(marker, opts)
  const end = blockEnd(marker, opts)
  const lines = text.split('\n')

  const start = lines.findIndex(l => l.trimEnd() === begin)
  if (start < 0) return { text, changed: false }
  const stop = lines.findIndex((l, i) => i > start && l.trimEnd() === end)
  if (stop < 0) return { text, changed: false }

  const from = start > 0 && lines[start - 1].trim() === '' ? start - 1 : start
  // At the top of the file the separator, if any, follows the block.
  const to = from === 0 && lines[stop + 1]?.trim() === '' ? stop + 1 : stop
  lines.splice(from, to - from + 1)
  return { text: lines.join('\n'), changed: true }
}
