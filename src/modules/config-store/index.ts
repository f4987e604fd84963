/**
 * Barrel exports for the config-store module.
 */

export type { ConfigStore, ScopeEntries, StoreContents, Assignment } from './config-store.js'
export {
  GitCliConfigStore,
  createGitCliConfigStore,
  parseConfigList,
} from './git-cli-config-store.js'
export type { GitCliConfigStoreOptions } from './git-cli-config-store.js'
export { MemoryConfigStore } from './memory-config-store.js'
export {
  parseVariableName,
  canonicalizeVariableName,
  isValidVariableName,
} from './variable-name.js'
export type { VariableNameParts } from './variable-name.js'
