export enum StatewardErrorCode {
  CATALOG_NOT_FOUND = 'CATALOG_NOT_FOUND',
  CATALOG_INVALID = 'CATALOG_INVALID',
  UNKNOWN_VARIABLE = 'UNKNOWN_VARIABLE',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Errors outside any single item: bad catalog, bad config. Item outcomes are
 * never thrown; they are recorded on the report.
 */
export class StatewardError extends Error {
  readonly code: StatewardErrorCode
  readonly context?: Record<string, unknown>

  constructor(code: StatewardErrorCode, message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'StatewardError'
    this.code = code
    this.context = context
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
