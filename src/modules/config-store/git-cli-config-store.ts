/**
 * ConfigStore backed by the `git config` command.
 *
 * Reads use `git config --list --null`, whose records are `name\nvalue\0`
 * (or `name\0` for a valueless boolean entry). Writes use one `git config`
 * invocation per assignment.
 */

import type { Repository } from '../../core/types.js'
import { GitCommandError, UsageError } from '../../core/errors.js'
import { runGit, spawnGit } from '../git/git-utils.js'
import { createLogger } from '../../utils/logger.js'
import { maskVariableValue } from '../../cli/utils/masking.js'
import type { Assignment, ConfigStore, ScopeEntries, StoreContents } from './config-store.js'

const logger = createLogger('git-cli-config-store')

/** `git config --unset` exit code when there is nothing to unset */
const EXIT_NOTHING_TO_UNSET = 5

export interface GitCliConfigStoreOptions {
  /** git executable to run (default: `git` on PATH) */
  gitBinary?: string
  /**
   * File used as the global scope instead of `git config --global`
   * (i.e. instead of ~/.gitconfig or $XDG_CONFIG_HOME/git/config).
   */
  globalConfigPath?: string
  /** Environment for git subprocesses (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/**
 * Parse `git config --list --null` output.
 */
export function parseConfigList(output: string): Map<string, string[]> {
  const entries = new Map<string, string[]>()
  for (const record of output.split('\0')) {
    if (record === '') continue
    const newline = record.indexOf('\n')
    const name = newline === -1 ? record : record.slice(0, newline)
    // A key with no `=` is an implicit boolean true
    const value = newline === -1 ? 'true' : record.slice(newline + 1)
    const values = entries.get(name)
    if (values === undefined) {
      entries.set(name, [value])
    } else {
      values.push(value)
    }
  }
  return entries
}

function isMissingFile(stderr: string): boolean {
  return /no such file or directory/i.test(stderr)
}

export class GitCliConfigStore implements ConfigStore {
  private readonly _gitBinary: string
  private readonly _globalConfigPath: string | undefined
  private readonly _env: NodeJS.ProcessEnv | undefined

  constructor(options: GitCliConfigStoreOptions = {}) {
    this._gitBinary = options.gitBinary ?? 'git'
    this._globalConfigPath = options.globalConfigPath
    this._env = options.env
  }

  async read(repository: Repository | null): Promise<StoreContents> {
    const global = await this._list(null, true)
    const local = repository !== null ? await this._list(repository, false) : new Map<string, string[]>()
    return { local, global }
  }

  async write(
    repository: Repository | null,
    isGlobal: boolean,
    assignments: readonly Assignment[]
  ): Promise<void> {
    if (!isGlobal && repository === null) {
      throw new UsageError('a repository is required to write local config')
    }

    for (const { name, value } of assignments) {
      const scopeArgs = this._scopeArgs(isGlobal)
      if (value === null) {
        await runGit(this._withRepository(repository, ['config', ...scopeArgs, '--unset-all', name]), {
          binary: this._gitBinary,
          env: this._env,
          allowedExitCodes: [EXIT_NOTHING_TO_UNSET],
        })
        logger.debug({ name, scope: isGlobal ? 'global' : 'local' }, 'Unset config variable')
      } else {
        await runGit(this._withRepository(repository, ['config', ...scopeArgs, name, value]), {
          binary: this._gitBinary,
          env: this._env,
        })
        logger.debug(
          { name, value: maskVariableValue(name, value), scope: isGlobal ? 'global' : 'local' },
          'Set config variable'
        )
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _scopeArgs(isGlobal: boolean): string[] {
    if (!isGlobal) return ['--local']
    return this._globalConfigPath !== undefined ? ['--file', this._globalConfigPath] : ['--global']
  }

  private _withRepository(repository: Repository | null, args: string[]): string[] {
    return repository !== null ? ['--git-dir', repository.gitDir, ...args] : args
  }

  private async _list(repository: Repository | null, isGlobal: boolean): Promise<ScopeEntries> {
    const args = this._withRepository(repository, ['config', ...this._scopeArgs(isGlobal), '--list', '--null'])
    const result = await spawnGit(args, { binary: this._gitBinary, env: this._env, raw: true })

    if (result.code !== 0) {
      // No global config file yet: nothing is set globally
      if (isGlobal && isMissingFile(result.stderr)) {
        return new Map()
      }
      throw new GitCommandError(args, result.code, result.stderr)
    }

    return parseConfigList(result.stdout)
  }
}

/**
 * Create a ConfigStore that delegates to `git config`.
 */
export function createGitCliConfigStore(options: GitCliConfigStoreOptions = {}): ConfigStore {
  return new GitCliConfigStore(options)
}
