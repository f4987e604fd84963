/**
 * RepositoryResolver interface: decides whether a filesystem location lies
 * inside a git repository and, if so, returns a handle to it.
 */

import type { Repository } from '../../core/types.js'

export interface RepositoryResolver {
  /**
   * Resolve the repository that contains `location`.
   * @returns the repository, or null when `location` is not inside one
   *          (including when it does not exist).
   */
  resolve(location: string): Promise<Repository | null>
}
