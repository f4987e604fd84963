/**
 * Scope Resolver: which store scopes a request touches.
 *
 * Reads:
 *   global   → [global]
 *   local    → [local], or [] outside a repository
 *   de_facto → [global, local] (later wins), or [global] outside a repository
 *
 * Writes go to exactly one scope; de_facto is redirected to local, and a
 * local write outside a repository is a precondition failure.
 */

import type { ConfigScope, NoticeHandler, Repository, StoreScope } from '../../core/types.js'
import { NoRepositoryError } from '../../core/errors.js'

/** Notice emitted when a write asks for de_facto */
export const DE_FACTO_WRITE_NOTICE = 'setting where = "local"'

/**
 * Store scopes to read for `scope`, lowest precedence first.
 */
export function resolveReadSources(scope: ConfigScope, repository: Repository | null): StoreScope[] {
  switch (scope) {
    case 'global':
      return ['global']
    case 'local':
      return repository !== null ? ['local'] : []
    case 'de_facto':
      return repository !== null ? ['global', 'local'] : ['global']
  }
}

/**
 * The single store scope a write to `scope` lands in.
 *
 * @param location - the location the caller asked for, used in the error message
 * @param notify   - receives the redirect notice for de_facto
 * @throws {NoRepositoryError} when the write lands in local and there is no repository
 */
export function resolveWriteTarget(
  scope: ConfigScope,
  repository: Repository | null,
  location: string,
  notify: NoticeHandler
): StoreScope {
  let target: StoreScope
  if (scope === 'de_facto') {
    notify(DE_FACTO_WRITE_NOTICE)
    target = 'local'
  } else {
    target = scope
  }

  if (target === 'local' && repository === null) {
    throw new NoRepositoryError(location)
  }
  return target
}
