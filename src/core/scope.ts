import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import type { Logger } from '../types.js'
import { errorMessage } from './errors.js'

type Release = () => Promise<void> | void

/**
 * Resources acquired while probing or applying (temp files, helper
 * processes). Released in reverse order by dispose(), which the reconciler
 * calls in a finally block.
 */
export class ResourceScope {
  private releases: Array<{ label: string; release: Release }> = []
  private disposed = false

  constructor(private readonly logger?: Logger) {}

  defer(label: string, release: Release): void {
    if (this.disposed) throw new Error(`Scope already disposed; cannot register ${label}`)
    this.releases.push({ label, release })
  }

  async tempDir(prefix = 'stateward-'): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix))
    this.defer(`temp dir ${dir}`, () => fs.remove(dir))
    return dir
  }

  async tempFile(name = 'scratch'): Promise<string> {
    const dir = await this.tempDir()
    return path.join(dir, name)
  }

  /**
   * Release everything. A failing release is logged and does not stop the others.
   */
  async dispose(): Promise<string[]> {
    if (this.disposed) return []
    this.disposed = true
    const failures: string[] = []
    for (const { label, release } of this.releases.reverse()) {
      try {
        await release()
      } catch (e) {
        const msg = `Failed to release ${label}: ${errorMessage(e)}`
        failures.push(msg)
        this.logger?.warn(msg)
      }
    }
    this.releases = []
    return failures
  }
}
