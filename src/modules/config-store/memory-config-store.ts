/**
 * In-process ConfigStore.
 *
 * Holds one global scope and one local scope per repository (keyed by git
 * dir). Reads return copies, so a returned map never changes afterwards.
 */

import type { Repository } from '../../core/types.js'
import { UsageError } from '../../core/errors.js'
import type { Assignment, ConfigStore, ScopeEntries, StoreContents } from './config-store.js'

function copyEntries(entries: Map<string, string[]>): Map<string, string[]> {
  return new Map([...entries].map(([name, values]) => [name, [...values]]))
}

export class MemoryConfigStore implements ConfigStore {
  private readonly _global = new Map<string, string[]>()
  private readonly _local = new Map<string, Map<string, string[]>>()

  read(repository: Repository | null): Promise<StoreContents> {
    const local: ScopeEntries =
      repository !== null ? copyEntries(this._localFor(repository)) : new Map<string, string[]>()
    return Promise.resolve({ local, global: copyEntries(this._global) })
  }

  write(repository: Repository | null, isGlobal: boolean, assignments: readonly Assignment[]): Promise<void> {
    if (!isGlobal && repository === null) {
      return Promise.reject(new UsageError('a repository is required to write local config'))
    }
    const target = isGlobal || repository === null ? this._global : this._localFor(repository)

    for (const { name, value } of assignments) {
      if (value === null) {
        target.delete(name)
      } else {
        target.set(name, [value])
      }
    }
    return Promise.resolve()
  }

  /**
   * Append a value without replacing existing ones, the way
   * `git config --add` does. Produces multi-valued variables.
   */
  add(repository: Repository | null, name: string, value: string): void {
    const target = repository === null ? this._global : this._localFor(repository)
    const values = target.get(name)
    if (values === undefined) {
      target.set(name, [value])
    } else {
      values.push(value)
    }
  }

  private _localFor(repository: Repository): Map<string, string[]> {
    let entries = this._local.get(repository.gitDir)
    if (entries === undefined) {
      entries = new Map()
      this._local.set(repository.gitDir, entries)
    }
    return entries
  }
}
