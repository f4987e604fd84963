/**
 * In-process RepositoryResolver over a fixed table of repositories.
 *
 * A location resolves to the repository whose work tree (or git dir, for bare
 * repositories) equals it or contains it. Used by tests and by embedders that
 * already know their repositories.
 */

import { resolve as resolvePath, sep } from 'node:path'
import type { Repository } from '../../core/types.js'
import type { RepositoryResolver } from './repository-resolver.js'

function contains(root: string, location: string): boolean {
  return location === root || location.startsWith(root.endsWith(sep) ? root : root + sep)
}

export class StaticRepositoryResolver implements RepositoryResolver {
  private readonly _repositories: Repository[]

  constructor(repositories: Repository[] = []) {
    this._repositories = [...repositories]
  }

  /** Register another repository */
  add(repository: Repository): void {
    this._repositories.push(repository)
  }

  resolve(location: string): Promise<Repository | null> {
    const target = resolvePath(location)
    let best: Repository | null = null
    let bestLength = -1

    // Innermost repository wins (nested repositories / submodules)
    for (const repo of this._repositories) {
      const root = resolvePath(repo.workTree ?? repo.gitDir)
      if ((contains(root, target) || contains(resolvePath(repo.gitDir), target)) && root.length > bestLength) {
        best = repo
        bestLength = root.length
      }
    }

    return Promise.resolve(best)
  }
}
