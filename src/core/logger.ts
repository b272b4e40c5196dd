import type { Logger } from '../types.js'

export function silentLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  }
}

export interface StderrLoggerOptions {
  verbose?: boolean
  stream?: NodeJS.WritableStream
}

export function stderrLogger(opts: StderrLoggerOptions = {}): Logger {
  const out = opts.stream ?? process.stderr
  const verbose = opts.verbose || !!process.env['STATEWARD_DEBUG']
  const write = (line: string) => {
    out.write(line + '\n')
  }
  return {
    debug: (msg) => {
      if (verbose) write(`[stateward debug] ${msg}`)
    },
    info: (msg) => write(`[stateward] ${msg}`),
    warn: (msg) => write(`[stateward warn] ${msg}`),
    error: (msg) => write(`[stateward error] ${msg}`),
  }
}
