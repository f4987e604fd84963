/**
 * Core types for gitscope
 * Shared type definitions used across all modules
 */

/** Which configuration file a variable is read from or written to */
export type ConfigScope = 'de_facto' | 'local' | 'global'

/** Scopes that map to a physical config file */
export type StoreScope = Exclude<ConfigScope, 'de_facto'>

/** All scopes, in the order they are offered to callers */
export const CONFIG_SCOPES: readonly ConfigScope[] = ['de_facto', 'local', 'global']

/** A variable's value: a single string, or null when the variable is not set */
export type ConfigValue = string | null

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/**
 * A git repository located on disk.
 * `workTree` is null for bare repositories.
 */
export interface Repository {
  gitDir: string
  workTree: string | null
}

/** Callback that receives non-fatal notices (e.g. a redirected scope) */
export type NoticeHandler = (message: string) => void

/** Type guard for ConfigScope */
export function isConfigScope(value: unknown): value is ConfigScope {
  return typeof value === 'string' && (CONFIG_SCOPES as readonly string[]).includes(value)
}
