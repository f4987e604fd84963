/**
 * Credential masking utilities for log output and Pino logger redaction.
 *
 * Git config can carry credentials (`http.extraheader`, `*.token`,
 * `*.password`); their values never reach the logs.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Known Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 *
 * @example
 * import { pino } from 'pino'
 * import { PINO_REDACT_PATHS } from './masking.js'
 * const logger = pino({ redact: PINO_REDACT_PATHS })
 */
export const PINO_REDACT_PATHS: string[] = [
  'password',
  'token',
  'secret',
  '*.password',
  '*.token',
  '*.secret',
  'env.GIT_ASKPASS',
]

/**
 * Final name components of git config variables whose values are secrets.
 * Compared against the lower-cased last segment of a variable name.
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'token',
  'secret',
  'extraheader',
  'oauthtoken',
  'accesstoken',
])

// ---------------------------------------------------------------------------
// Variable masking
// ---------------------------------------------------------------------------

/**
 * Whether a git config variable name refers to a credential.
 *
 * @example
 * isSensitiveVariable('http.https://example.org/.extraheader') // true
 * isSensitiveVariable('user.name')                              // false
 */
export function isSensitiveVariable(name: string): boolean {
  const lastDot = name.lastIndexOf('.')
  const key = (lastDot === -1 ? name : name.slice(lastDot + 1)).toLowerCase()
  return SENSITIVE_KEYS.has(key)
}

/**
 * Return the value to log for a variable: the value itself, or `***` when
 * the variable is a credential. Absent values pass through unchanged.
 */
export function maskVariableValue(name: string, value: string | null): string | null {
  if (value === null) return null
  return isSensitiveVariable(name) ? MASKED_VALUE : value
}
