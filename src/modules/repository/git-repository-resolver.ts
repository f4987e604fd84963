/**
 * RepositoryResolver backed by `git rev-parse`.
 */

import { resolve as resolvePath } from 'node:path'
import type { Repository } from '../../core/types.js'
import { spawnGit } from '../git/git-utils.js'
import { createLogger } from '../../utils/logger.js'
import type { RepositoryResolver } from './repository-resolver.js'

const logger = createLogger('repository-resolver')

export interface GitRepositoryResolverOptions {
  /** git executable to run (default: `git` on PATH) */
  gitBinary?: string
}

export class GitRepositoryResolver implements RepositoryResolver {
  private readonly _gitBinary: string

  constructor(options: GitRepositoryResolverOptions = {}) {
    this._gitBinary = options.gitBinary ?? 'git'
  }

  async resolve(location: string): Promise<Repository | null> {
    const cwd = resolvePath(location)

    const probe = await spawnGit(['rev-parse', '--absolute-git-dir', '--is-bare-repository'], {
      cwd,
      binary: this._gitBinary,
    })
    if (probe.code !== 0) {
      logger.debug({ location, stderr: probe.stderr }, 'Not inside a git repository')
      return null
    }

    const [gitDir, bare] = probe.stdout.split('\n').map((line) => line.trim())
    if (gitDir === undefined || gitDir === '') {
      return null
    }

    if (bare === 'true') {
      return { gitDir, workTree: null }
    }

    // Fails when run from inside the git directory itself; there is no work tree there
    const toplevel = await spawnGit(['rev-parse', '--show-toplevel'], {
      cwd,
      binary: this._gitBinary,
    })
    const workTree = toplevel.code === 0 && toplevel.stdout !== '' ? toplevel.stdout : null

    logger.debug({ location, gitDir, workTree }, 'Resolved git repository')
    return { gitDir, workTree }
  }
}

/**
 * Create a RepositoryResolver that asks git.
 */
export function createRepositoryResolver(
  options: GitRepositoryResolverOptions = {}
): RepositoryResolver {
  return new GitRepositoryResolver(options)
}
