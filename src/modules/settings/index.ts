/**
 * Barrel exports for the settings module.
 */

export { loadSettings, readEnvOverrides, SETTINGS_FILE_NAME } from './settings-loader.js'
export type { SettingsLoaderOptions } from './settings-loader.js'
export {
  GitScopeSettingsSchema,
  PartialGitScopeSettingsSchema,
  ConfigScopeSchema,
  OutputFormatSchema,
} from './settings-schema.js'
export type { GitScopeSettings, PartialGitScopeSettings, OutputFormat } from './settings-schema.js'
export { DEFAULT_SETTINGS } from './defaults.js'
