/**
 * `gitscope config` command (the default command)
 *
 *   gitscope [config] [variables...]
 *
 * A bare name queries a variable, `name=value` sets it, `--unset <name>`
 * removes it, and `--restore <file>` replays a snapshot saved with `--save`.
 * With no variables at all, every variable in scope is listed.
 */

import type { Command } from 'commander'
import { readFile, writeFile } from 'fs/promises'
import type { ConfigScope } from '../../core/types.js'
import { isConfigScope } from '../../core/types.js'
import {
  ConfigInvariantError,
  GitScopeError,
  NoRepositoryError,
  SettingsError,
  UsageError,
} from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { loadSettings } from '../../modules/settings/settings-loader.js'
import { OutputFormatSchema } from '../../modules/settings/settings-schema.js'
import type { GitScopeSettings, OutputFormat, PartialGitScopeSettings } from '../../modules/settings/settings-schema.js'
import { createGitConfig } from '../../modules/git-config/git-config-impl.js'
import type { GitConfig } from '../../modules/git-config/git-config.js'
import { ConfigSnapshot } from '../../modules/git-config/config-snapshot.js'
import type { ConfigArg, VariableRecord } from '../../modules/git-config/normalizer.js'
import { createGitCliConfigStore } from '../../modules/config-store/git-cli-config-store.js'
import { createRepositoryResolver } from '../../modules/repository/git-repository-resolver.js'
import { formatSnapshot } from '../formatters/snapshot-formatter.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/**
 * Turn command-line variables into getOrSet arguments: `name=value` sets
 * (split at the first `=`), anything else is a name to query.
 */
export function parseVariableArgs(variables: readonly string[]): ConfigArg[] {
  return variables.map((variable): ConfigArg => {
    const eq = variable.indexOf('=')
    if (eq === -1) return variable
    const record: VariableRecord = { [variable.slice(0, eq)]: variable.slice(eq + 1) }
    return record
  })
}

/**
 * Scope from the --local / --global / --where flags, or undefined when
 * none was given.
 *
 * @throws {UsageError} on conflicting flags or an unknown scope
 */
export function resolveWhereFlag(opts: { where?: string; local?: boolean; global?: boolean }): ConfigScope | undefined {
  const chosen: ConfigScope[] = []
  if (opts.local === true) chosen.push('local')
  if (opts.global === true) chosen.push('global')
  if (opts.where !== undefined) {
    if (!isConfigScope(opts.where)) {
      throw new UsageError(`unknown scope "${opts.where}" (expected de_facto, local or global)`, {
        where: opts.where,
      })
    }
    chosen.push(opts.where)
  }
  if (new Set(chosen).size > 1) {
    throw new UsageError(`conflicting scopes: ${chosen.join(', ')}`)
  }
  return chosen[0]
}

async function readSnapshotFile(filePath: string): Promise<ConfigSnapshot> {
  let parsed: unknown
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf-8'))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new UsageError(`Failed to read snapshot file ${filePath}: ${message}`, { filePath })
  }
  return ConfigSnapshot.fromJSON(parsed)
}

// ---------------------------------------------------------------------------
// `config` action
// ---------------------------------------------------------------------------

export interface ConfigCommandOptions {
  where?: string
  local?: boolean
  global?: boolean
  repo?: string
  unset?: string[]
  restore?: string
  save?: string
  showPrevious?: boolean
  format?: string
  gitBinary?: string
  globalConfig?: string
  settingsDir?: string
  /** Service to use instead of one built from settings (for testing) */
  gitConfig?: GitConfig
}

function cliOverrides(opts: ConfigCommandOptions, format: OutputFormat | undefined): PartialGitScopeSettings {
  return {
    git: {
      ...(opts.gitBinary !== undefined && { binary: opts.gitBinary }),
      ...(opts.globalConfig !== undefined && { global_config: opts.globalConfig }),
    },
    output: {
      ...(format !== undefined && { format }),
    },
  }
}

function buildGitConfig(settings: GitScopeSettings): GitConfig {
  return createGitConfig({
    store: createGitCliConfigStore({
      gitBinary: settings.git.binary,
      ...(settings.git.global_config !== undefined && { globalConfigPath: settings.git.global_config }),
    }),
    resolver: createRepositoryResolver({ gitBinary: settings.git.binary }),
    notify: (message: string) => {
      process.stderr.write(`${message}\n`)
    },
    defaultWhere: settings.defaults.where,
  })
}

function isInvalidInput(err: unknown): err is GitScopeError {
  return (
    err instanceof UsageError ||
    err instanceof NoRepositoryError ||
    err instanceof ConfigInvariantError ||
    err instanceof SettingsError
  )
}

export async function runConfig(variables: readonly string[], opts: ConfigCommandOptions = {}): Promise<number> {
  let formatFlag: OutputFormat | undefined
  if (opts.format !== undefined) {
    const parsed = OutputFormatSchema.safeParse(opts.format)
    if (!parsed.success) {
      process.stderr.write(`  Error: unknown format "${opts.format}" (expected text or json)\n`)
      return CONFIG_EXIT_INVALID
    }
    formatFlag = parsed.data
  }

  try {
    const settings = await loadSettings({
      ...(opts.settingsDir !== undefined && { settingsDir: opts.settingsDir }),
      cliOverrides: cliOverrides(opts, formatFlag),
    })
    const format: OutputFormat = settings.output.format
    const where = resolveWhereFlag(opts) ?? settings.defaults.where

    const args: ConfigArg[] = parseVariableArgs(variables)
    for (const name of opts.unset ?? []) {
      args.push({ [name]: null })
    }
    if (opts.restore !== undefined) {
      args.push(await readSnapshotFile(opts.restore))
    }

    const gitConfig = opts.gitConfig ?? buildGitConfig(settings)
    const result = await gitConfig.execute(args, { where, repo: opts.repo ?? '.' })

    if (result.kind === 'query') {
      process.stdout.write(formatSnapshot(result.snapshot, format) + '\n')
      return CONFIG_EXIT_SUCCESS
    }

    if (opts.save !== undefined) {
      await writeFile(opts.save, JSON.stringify(result.previous.toJSON(), null, 2) + '\n', 'utf-8')
    }
    if (opts.showPrevious === true) {
      process.stdout.write(formatSnapshot(result.previous, format) + '\n')
    }
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (isInvalidInput(err)) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Config command failed')
    process.stderr.write(`  Error: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/**
 * Register the `config` command on a Commander program, as its default command.
 */
export function registerConfigCommand(program: Command): void {
  program
    .command('config', { isDefault: true })
    .description('Get or set git configuration variables')
    .argument('[variables...]', 'Names to query, or name=value pairs to set')
    .option('--where <scope>', 'Scope: de_facto (local over global), local or global')
    .option('--local', 'Use the repository config (.git/config)')
    .option('--global', 'Use the user config (~/.gitconfig)')
    .option('--repo <dir>', 'Path inside the target repository', '.')
    .option('--unset <name>', 'Remove a variable (repeatable)', collect, [])
    .option('--restore <file>', 'Replay a snapshot saved with --save')
    .option('--save <file>', 'When writing, save the previous values to a JSON file')
    .option('--show-previous', 'When writing, print the previous values')
    .option('--format <format>', 'Output format: text or json')
    .option('--git-binary <path>', 'git executable to run')
    .option('--global-config <file>', 'File to use as the global scope')
    .option('--settings-dir <dir>', 'Directory holding gitscope config.yaml')
    .action(async (variables: string[], opts: ConfigCommandOptions) => {
      const exitCode = await runConfig(variables, opts)
      process.exit(exitCode)
    })
}
