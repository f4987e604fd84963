/**
 * Built-in default settings.
 *
 * Overridden by: user settings file → environment variables → CLI flags
 */

import type { GitScopeSettings } from './settings-schema.js'

export const DEFAULT_SETTINGS: GitScopeSettings = {
  git: {
    binary: 'git',
  },
  defaults: {
    where: 'de_facto',
  },
  output: {
    format: 'text',
  },
}
