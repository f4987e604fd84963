/**
 * Config Writer: validates assignments and applies them, one at a time, to
 * exactly one scope.
 *
 * There is no cross-variable transaction here: when an assignment fails, the
 * ones before it stay committed and are reported in the ConfigWriteError.
 * Rolling them back is up to the caller (see GitConfigImpl).
 */

import type { ConfigScope, NoticeHandler, Repository, StoreScope } from '../../core/types.js'
import { ConfigWriteError, UsageError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { maskVariableValue } from '../../cli/utils/masking.js'
import type { Assignment, ConfigStore } from '../config-store/config-store.js'
import { canonicalizeVariableName, isValidVariableName } from '../config-store/variable-name.js'
import { resolveWriteTarget } from './scope-resolver.js'

const logger = createLogger('config-writer')

export interface ConfigWriterOptions {
  /** Receives non-fatal notices; defaults to logging them at warn */
  notify?: NoticeHandler
}

export class ConfigWriter {
  private readonly _store: ConfigStore
  private readonly _notify: NoticeHandler

  constructor(store: ConfigStore, options: ConfigWriterOptions = {}) {
    this._store = store
    this._notify =
      options.notify ??
      ((message: string) => {
        logger.warn(message)
      })
  }

  /**
   * Check the write preconditions and return the assignments with canonical
   * names.
   *
   * @throws {UsageError} when the list is empty, a name is invalid or
   *         repeated, or a value is not a string or null
   */
  validate(assignments: readonly Assignment[]): Assignment[] {
    if (assignments.length === 0) {
      throw new UsageError('at least one variable must be given to write')
    }

    const seen = new Set<string>()
    return assignments.map(({ name, value }) => {
      if (!isValidVariableName(name)) {
        throw new UsageError(`invalid config variable name: ${JSON.stringify(name)}`, { name })
      }
      const canonical = canonicalizeVariableName(name)
      if (seen.has(canonical)) {
        throw new UsageError(`variable given more than once: ${canonical}`, { name: canonical })
      }
      seen.add(canonical)
      if (value !== null && typeof value !== 'string') {
        throw new UsageError(`value of ${canonical} must be a string or null`, { name: canonical })
      }
      return { name: canonical, value }
    })
  }

  /**
   * Scope the write lands in. Redirects de_facto to local with a notice.
   *
   * @throws {NoRepositoryError} for a local write without a repository
   */
  resolveTarget(scope: ConfigScope, repository: Repository | null, location: string): StoreScope {
    return resolveWriteTarget(scope, repository, location, this._notify)
  }

  /**
   * Apply already validated assignments to `target`, in order.
   *
   * @throws {ConfigWriteError} naming the failed variable and those applied before it
   */
  async apply(
    assignments: readonly Assignment[],
    target: StoreScope,
    repository: Repository | null
  ): Promise<void> {
    const applied: string[] = []
    for (const assignment of assignments) {
      try {
        await this._store.write(repository, target === 'global', [assignment])
      } catch (err) {
        throw new ConfigWriteError(assignment.name, applied, err, { scope: target })
      }
      applied.push(assignment.name)
      logger.info(
        { name: assignment.name, value: maskVariableValue(assignment.name, assignment.value), scope: target },
        assignment.value === null ? 'Unset config variable' : 'Set config variable'
      )
    }
  }

  /**
   * Validate, resolve the target scope, and apply.
   * @returns the scope that was written
   */
  async write(
    assignments: readonly Assignment[],
    scope: ConfigScope,
    repository: Repository | null,
    location: string
  ): Promise<StoreScope> {
    const valid = this.validate(assignments)
    const target = this.resolveTarget(scope, repository, location)
    await this.apply(valid, target, repository)
    return target
  }
}
