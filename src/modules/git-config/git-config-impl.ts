/**
 * GitConfig implementation: wires the normalizer, repository lookup, reader
 * and writer together.
 *
 * Every call resolves the repository and reads the store afresh; nothing is
 * cached between calls.
 *
 * A write first captures the previous values of every variable named in the
 * call (in the scope being written), then applies the assignments. If an
 * assignment fails part-way, the ones already applied are reverted from that
 * capture before the error is rethrown.
 */

import type { ConfigScope, Repository, StoreScope } from '../../core/types.js'
import { ConfigWriteError, UsageError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ConfigStore } from '../config-store/config-store.js'
import { createGitCliConfigStore } from '../config-store/git-cli-config-store.js'
import { isValidVariableName } from '../config-store/variable-name.js'
import type { RepositoryResolver } from '../repository/repository-resolver.js'
import { createRepositoryResolver } from '../repository/git-repository-resolver.js'
import { ConfigReader } from './config-reader.js'
import { ConfigWriter } from './config-writer.js'
import type { ConfigSnapshot } from './config-snapshot.js'
import { entryNames, normalize, toAssignments } from './normalizer.js'
import type { ConfigArg, VariableRecord } from './normalizer.js'
import type {
  GetOrSetOptions,
  GitConfig,
  GitConfigResult,
  GitConfigServiceOptions,
  ScopedCallOptions,
} from './git-config.js'

const logger = createLogger('git-config')

interface Location {
  repository: Repository | null
  /** What to call the location in messages */
  label: string
}

export class GitConfigImpl implements GitConfig {
  private readonly _resolver: RepositoryResolver
  private readonly _reader: ConfigReader
  private readonly _writer: ConfigWriter
  private readonly _defaultWhere: ConfigScope

  constructor(options: GitConfigServiceOptions = {}) {
    const store: ConfigStore = options.store ?? createGitCliConfigStore()
    this._resolver = options.resolver ?? createRepositoryResolver()
    this._reader = new ConfigReader(store)
    this._writer = new ConfigWriter(store, options.notify !== undefined ? { notify: options.notify } : {})
    this._defaultWhere = options.defaultWhere ?? 'de_facto'
  }

  async getOrSet(args: readonly ConfigArg[] = [], options: GetOrSetOptions = {}): Promise<ConfigSnapshot> {
    const result = await this.execute(args, options)
    return result.kind === 'query' ? result.snapshot : result.previous
  }

  local(args: readonly ConfigArg[] = [], options: ScopedCallOptions = {}): Promise<ConfigSnapshot> {
    return this.getOrSet(args, { ...options, where: 'local' })
  }

  global(args: readonly ConfigArg[] = [], options: ScopedCallOptions = {}): Promise<ConfigSnapshot> {
    return this.getOrSet(args, { ...options, where: 'global' })
  }

  get(names: readonly string[] = [], options: GetOrSetOptions = {}): Promise<ConfigSnapshot> {
    return this.getOrSet(names, options)
  }

  async set(variables: VariableRecord | ConfigSnapshot, options: GetOrSetOptions = {}): Promise<ConfigSnapshot> {
    if (normalize([variables]).isQuery) {
      throw new UsageError('at least one variable must be given to write')
    }
    const result = await this.execute([variables], options)
    if (result.kind !== 'write') {
      throw new UsageError('at least one variable must be given to write')
    }
    return result.previous
  }

  async execute(args: readonly ConfigArg[] = [], options: GetOrSetOptions = {}): Promise<GitConfigResult> {
    const where = options.where ?? this._defaultWhere
    const { entries, isQuery } = normalize(args)
    const { repository, label } = await this._locate(options.repo ?? '.')

    if (isQuery) {
      const snapshot = await this._reader.read(entryNames(entries), where, repository)
      return { kind: 'query', scope: where, snapshot }
    }

    const assignments = this._writer.validate(toAssignments(entries))
    const target = this._writer.resolveTarget(where, repository, label)
    // Names that cannot be written back stay out of the restore point
    const restorable = entryNames(entries).filter(isValidVariableName)
    const previous = await this._reader.read(restorable, target, repository)

    try {
      await this._writer.apply(assignments, target, repository)
    } catch (err) {
      if (err instanceof ConfigWriteError && err.applied.length > 0) {
        throw await this._rollBack(err, previous, target, repository)
      }
      throw err
    }

    return { kind: 'write', scope: target, previous }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _locate(repo: string | Repository): Promise<Location> {
    if (typeof repo !== 'string') {
      return { repository: repo, label: repo.workTree ?? repo.gitDir }
    }
    return { repository: await this._resolver.resolve(repo), label: repo }
  }

  /**
   * Revert the assignments a failed write committed, and return the error to
   * rethrow, marked with whether the revert succeeded.
   */
  private async _rollBack(
    err: ConfigWriteError,
    previous: ConfigSnapshot,
    target: StoreScope,
    repository: Repository | null
  ): Promise<ConfigWriteError> {
    const restore = err.applied.map((name) => ({ name, value: previous.get(name) ?? null }))
    try {
      await this._writer.apply(restore, target, repository)
    } catch (rollbackErr) {
      logger.error(
        { err: rollbackErr, applied: err.applied, failed: err.failed, scope: target },
        'Could not revert partially applied write'
      )
      return new ConfigWriteError(err.failed, err.applied, err.cause, { scope: target, rolledBack: false })
    }
    logger.warn({ applied: err.applied, failed: err.failed, scope: target }, 'Reverted partially applied write')
    return new ConfigWriteError(err.failed, err.applied, err.cause, { scope: target, rolledBack: true })
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new GitConfig instance.
 *
 * @example
 * const git = createGitConfig()
 * const previous = await git.local([{ 'user.name': 'louise' }])
 * await git.local([previous]) // restore
 */
export function createGitConfig(options: GitConfigServiceOptions = {}): GitConfig {
  return new GitConfigImpl(options)
}
