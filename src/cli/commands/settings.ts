/**
 * `gitscope settings` command group
 *
 * Subcommands:
 *   - `gitscope settings show`  : display the merged gitscope settings
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { SettingsError } from '../../core/errors.js'
import { loadSettings } from '../../modules/settings/settings-loader.js'
import type { GitScopeSettings } from '../../modules/settings/settings-schema.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('settings-cmd')

export const SETTINGS_EXIT_SUCCESS = 0
export const SETTINGS_EXIT_ERROR = 1
export const SETTINGS_EXIT_INVALID = 2

export interface SettingsShowOptions {
  settingsDir?: string
  format?: 'yaml' | 'json'
}

export async function runSettingsShow(opts: SettingsShowOptions = {}): Promise<number> {
  let settings: GitScopeSettings
  try {
    settings = await loadSettings({
      ...(opts.settingsDir !== undefined && { settingsDir: opts.settingsDir }),
    })
  } catch (err) {
    if (err instanceof SettingsError) {
      process.stderr.write(`  Settings error: ${err.message}\n`)
      return SETTINGS_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load settings')
    process.stderr.write(`  Error loading settings: ${message}\n`)
    return SETTINGS_EXIT_ERROR
  }

  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(settings, null, 2) + '\n')
  } else {
    process.stdout.write('# gitscope settings\n\n')
    process.stdout.write(yaml.dump(settings))
  }
  return SETTINGS_EXIT_SUCCESS
}

/**
 * Register the `settings` command group on a Commander program.
 */
export function registerSettingsCommand(program: Command): void {
  const settingsCmd = program
    .command('settings')
    .description("View gitscope's own settings")

  settingsCmd
    .command('show')
    .description('Display the merged settings (defaults, settings file, environment)')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--settings-dir <dir>', 'Directory holding gitscope config.yaml')
    .action(async (opts: { format: string; settingsDir?: string }) => {
      if (opts.format !== 'yaml' && opts.format !== 'json') {
        process.stderr.write(`  Error: unknown format "${opts.format}" (expected yaml or json)\n`)
        process.exit(SETTINGS_EXIT_INVALID)
      }
      const exitCode = await runSettingsShow({
        format: opts.format,
        ...(opts.settingsDir !== undefined && { settingsDir: opts.settingsDir }),
      })
      process.exit(exitCode)
    })
}
