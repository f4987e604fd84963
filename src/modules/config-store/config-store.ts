/**
 * ConfigStore interface: the underlying git configuration storage.
 *
 * A store reports each scope separately (never pre-merged) and reports every
 * value it holds for a name, so that callers can detect multi-valued
 * variables. Writes are keyed by a global/local flag; assigning `null`
 * removes the variable.
 */

import type { ConfigValue, Repository } from '../../core/types.js'

/** Variables of one scope, in store order: name → every value held */
export type ScopeEntries = ReadonlyMap<string, readonly string[]>

/** Both scopes as read from the store */
export interface StoreContents {
  local: ScopeEntries
  global: ScopeEntries
}

/** One variable to write; a null value unsets the variable */
export interface Assignment {
  name: string
  value: ConfigValue
}

export interface ConfigStore {
  /**
   * Read every variable of both scopes.
   * `local` is empty when `repository` is null.
   */
  read(repository: Repository | null): Promise<StoreContents>

  /**
   * Apply assignments, in order, to the global file (`isGlobal`) or to the
   * repository's local file. Unsetting an absent variable is not an error.
   */
  write(repository: Repository | null, isGlobal: boolean, assignments: readonly Assignment[]): Promise<void>
}
