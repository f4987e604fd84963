/**
 * GitConfig interface: public contract for getting and setting git config.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createGitConfig()` from git-config-impl.ts.
 */

import type { ConfigScope, NoticeHandler, Repository, StoreScope } from '../../core/types.js'
import type { ConfigStore } from '../config-store/config-store.js'
import type { RepositoryResolver } from '../repository/repository-resolver.js'
import type { ConfigSnapshot } from './config-snapshot.js'
import type { ConfigArg, VariableRecord } from './normalizer.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface GitConfigServiceOptions {
  /** Underlying store (default: `git config`) */
  store?: ConfigStore
  /** Repository lookup (default: `git rev-parse`) */
  resolver?: RepositoryResolver
  /** Receives non-fatal notices such as the de_facto → local redirect */
  notify?: NoticeHandler
  /** Scope used when a call does not name one (default: de_facto) */
  defaultWhere?: ConfigScope
}

export interface ScopedCallOptions {
  /** Path inside a repository, or an already resolved repository (default: '.') */
  repo?: string | Repository
}

export interface GetOrSetOptions extends ScopedCallOptions {
  where?: ConfigScope
}

/** Outcome of a call, for callers that need to know which path was taken */
export type GitConfigResult =
  | { kind: 'query'; scope: ConfigScope; snapshot: ConfigSnapshot }
  | { kind: 'write'; scope: StoreScope; previous: ConfigSnapshot }

// ---------------------------------------------------------------------------
// GitConfig interface
// ---------------------------------------------------------------------------

export interface GitConfig {
  /**
   * Query or set variables.
   *
   * When every argument only names variables (or there are none), reads them
   * (all variables when none are named) and returns the snapshot. Otherwise
   * writes the given values and returns the snapshot taken just before the
   * write, which restores the previous state when passed back in.
   */
  getOrSet(args?: readonly ConfigArg[], options?: GetOrSetOptions): Promise<ConfigSnapshot>

  /** getOrSet fixed to the local scope */
  local(args?: readonly ConfigArg[], options?: ScopedCallOptions): Promise<ConfigSnapshot>

  /** getOrSet fixed to the global scope */
  global(args?: readonly ConfigArg[], options?: ScopedCallOptions): Promise<ConfigSnapshot>

  /** Read named variables (all when `names` is empty) */
  get(names?: readonly string[], options?: GetOrSetOptions): Promise<ConfigSnapshot>

  /**
   * Write variables and return the previous values.
   * @throws {UsageError} when `variables` is empty
   */
  set(variables: VariableRecord | ConfigSnapshot, options?: GetOrSetOptions): Promise<ConfigSnapshot>

  /** getOrSet, also reporting whether it read or wrote and in which scope */
  execute(args?: readonly ConfigArg[], options?: GetOrSetOptions): Promise<GitConfigResult>
}
