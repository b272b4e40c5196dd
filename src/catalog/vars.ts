import { StatewardError, StatewardErrorCode } from '../core/errors.js'

const VAR_RE = /\$\$\{|\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g
const TEMPLATE_RE = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g

export type Vars = Readonly<Record<string, string>>

/**
 * Replace `${name}` in one string. `$${` yields a literal `${`.
 */
export function expandString(value: string, vars: Vars, where = 'catalog'): string {
  return value.replace(VAR_RE, (match, key: string | undefined) => {
    if (key === undefined) return '${'
    const v = vars[key]
    if (v === undefined) {
      throw new StatewardError(StatewardErrorCode.UNKNOWN_VARIABLE, `Unknown variable \${${key}} in ${where}`, { variable: key, where })
    }
    return v
  })
}

/**
 * Walk raw JSON and expand every string value. Object keys are left as they are.
 */
export function expandDeep(value: unknown, vars: Vars, where = 'catalog'): unknown {
  if (typeof value === 'string') return expandString(value, vars, where)
  if (Array.isArray(value)) return value.map((v, i) => expandDeep(v, vars, `${where}[${i}]`))
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandDeep(v, vars, `${where}.${k}`)
    }
    return out
  }
  return value
}

/**
 * Catalog vars may refer to built-ins and to vars declared before them.
 */
export function resolveVars(declared: Record<string, unknown>, builtins: Vars): Record<string, string> {
  const vars: Record<string, string> = { ...builtins }
  for (const [k, v] of Object.entries(declared)) {
    if (typeof v !== 'string') {
      throw new StatewardError(StatewardErrorCode.CATALOG_INVALID, `Variable ${k} must be a string`, { variable: k })
    }
    vars[k] = expandString(v, vars, `vars.${k}`)
  }
  return vars
}

/**
 * Fill `{{name}}` placeholders in a bundled file. Unknown names are left verbatim.
 */
export function renderTemplate(text: string, vars: Vars): string {
  return text.replace(TEMPLATE_RE, (match, key: string) => vars[key] ?? match)
}
