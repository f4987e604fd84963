/**
 * Barrel exports for the git-config module.
 */

export { createGitConfig, GitConfigImpl } from './git-config-impl.js'
export type {
  GitConfig,
  GitConfigServiceOptions,
  GetOrSetOptions,
  ScopedCallOptions,
  GitConfigResult,
} from './git-config.js'
export { ConfigSnapshot, SnapshotJsonSchema, UNSET_LABEL } from './config-snapshot.js'
export type { SnapshotJson } from './config-snapshot.js'
export { ConfigReader } from './config-reader.js'
export { ConfigWriter } from './config-writer.js'
export type { ConfigWriterOptions } from './config-writer.js'
export { normalize, entryNames, toAssignments } from './normalizer.js'
export type {
  ConfigArg,
  VariableArg,
  VariableEntry,
  VariableInput,
  VariableRecord,
  NormalizedArgs,
} from './normalizer.js'
export {
  resolveReadSources,
  resolveWriteTarget,
  DE_FACTO_WRITE_NOTICE,
} from './scope-resolver.js'
