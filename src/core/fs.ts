import fs from 'fs-extra'

/**
 * Read-only filesystem surface used by probes. Probes never write.
 */
export interface FS {
  pathExists(p: string): Promise<boolean>
  lstat(p: string): Promise<fs.Stats>
  readlink(p: string): Promise<string>
  readText(p: string): Promise<string>
  readdir(p: string): Promise<string[]>
}

export const nodeFS: FS = {
  pathExists: fs.pathExists,
  lstat: fs.lstat,
  readlink: fs.readlink,
  readText: (p: string) => fs.readFile(p, 'utf8'),
  readdir: (p: string) => fs.readdir(p),
}
