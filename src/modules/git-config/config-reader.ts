/**
 * Config Reader: reads the store, merges scopes by precedence, checks that
 * every variable has a single value, and filters to the requested names.
 */

import type { ConfigScope, ConfigValue, Repository } from '../../core/types.js'
import { ConfigInvariantError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ConfigStore } from '../config-store/config-store.js'
import { canonicalizeVariableName } from '../config-store/variable-name.js'
import { ConfigSnapshot } from './config-snapshot.js'
import { resolveReadSources } from './scope-resolver.js'

const logger = createLogger('config-reader')

export class ConfigReader {
  private readonly _store: ConfigStore

  constructor(store: ConfigStore) {
    this._store = store
  }

  /**
   * Read `names` (all variables when empty) as seen from `scope`.
   *
   * Names are returned in canonical form, in the order first requested;
   * names that are not set map to null.
   *
   * @throws {ConfigInvariantError} when a variable in the selected view has
   *         more than one value
   */
  async read(
    names: readonly string[],
    scope: ConfigScope,
    repository: Repository | null
  ): Promise<ConfigSnapshot> {
    const sources = resolveReadSources(scope, repository)
    const contents = await this._store.read(repository)

    // Later sources override earlier ones; an overridden key keeps its position
    const merged = new Map<string, readonly string[]>()
    for (const source of sources) {
      for (const [name, values] of contents[source]) {
        merged.set(name, values)
      }
    }

    const multiValued = [...merged].filter(([, values]) => values.length > 1).map(([name]) => name)
    if (multiValued.length > 0) {
      throw new ConfigInvariantError(multiValued)
    }

    logger.debug({ scope, sources, variables: merged.size, requested: names.length }, 'Read config')

    if (names.length === 0) {
      const all: Array<[string, ConfigValue]> = []
      for (const [name, values] of merged) {
        const value = values[0]
        if (value !== undefined) all.push([name, value])
      }
      return new ConfigSnapshot(all)
    }

    const requested = [...new Set(names.map(canonicalizeVariableName))]
    return new ConfigSnapshot(
      requested.map((name): [string, ConfigValue] => [name, merged.get(name)?.[0] ?? null])
    )
  }
}
