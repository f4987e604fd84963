/**
 * Settings loader: merges gitscope's own settings in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → user settings file  (~/.gitscope/config.yaml)
 *     → environment vars    (GITSCOPE_* prefixed)
 *     → CLI flag overrides  (passed via SettingsLoaderOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { SettingsError } from '../../core/errors.js'
import {
  GitScopeSettingsSchema,
  PartialGitScopeSettingsSchema,
  type GitScopeSettings,
  type PartialGitScopeSettings,
} from './settings-schema.js'
import { DEFAULT_SETTINGS } from './defaults.js'

const logger = createLogger('settings')

/** Name of the settings file inside the settings directory */
export const SETTINGS_FILE_NAME = 'config.yaml'

export interface SettingsLoaderOptions {
  /** Directory holding config.yaml (default: ~/.gitscope) */
  settingsDir?: string
  /** Environment to read GITSCOPE_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Values that override everything; typically populated from CLI flags */
  cliOverrides?: PartialGitScopeSettings
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

function mergeSettings(base: GitScopeSettings, overlay: PartialGitScopeSettings): GitScopeSettings {
  return {
    git: { ...base.git, ...overlay.git },
    defaults: { ...base.defaults, ...overlay.defaults },
    output: { ...base.output, ...overlay.output },
  }
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Read GITSCOPE_* environment variables into a partial settings overlay.
 * Invalid values are logged and ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialGitScopeSettings {
  const raw = {
    git: {
      ...(env.GITSCOPE_GIT_BINARY !== undefined && { binary: env.GITSCOPE_GIT_BINARY }),
      ...(env.GITSCOPE_GLOBAL_CONFIG !== undefined && { global_config: env.GITSCOPE_GLOBAL_CONFIG }),
    },
    defaults: {
      ...(env.GITSCOPE_WHERE !== undefined && { where: env.GITSCOPE_WHERE }),
    },
    output: {
      ...(env.GITSCOPE_FORMAT !== undefined && { format: env.GITSCOPE_FORMAT }),
    },
  }

  const parsed = PartialGitScopeSettingsSchema.safeParse(raw)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// File loading
// ---------------------------------------------------------------------------

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

async function loadSettingsFile(filePath: string): Promise<PartialGitScopeSettings | null> {
  if (!(await fileExists(filePath))) return null

  let parsed: unknown
  try {
    const raw = await readFile(filePath, 'utf-8')
    parsed = yaml.load(raw)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new SettingsError(`Failed to read settings file at ${filePath}: ${message}`, { filePath })
  }

  // An empty file is an empty overlay
  if (parsed === undefined || parsed === null) return {}

  const result = PartialGitScopeSettingsSchema.safeParse(parsed)
  if (!result.success) {
    throw new SettingsError(`Invalid settings file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
      filePath,
      issues: result.error.issues,
    })
  }
  return result.data
}

// ---------------------------------------------------------------------------
// loadSettings
// ---------------------------------------------------------------------------

/**
 * Load and validate settings from every source in hierarchy order.
 *
 * @throws {SettingsError} if the settings file cannot be read or is invalid
 */
export async function loadSettings(options: SettingsLoaderOptions = {}): Promise<GitScopeSettings> {
  const settingsDir = options.settingsDir !== undefined
    ? resolve(options.settingsDir)
    : resolve(homedir(), '.gitscope')

  let merged: GitScopeSettings = structuredClone(DEFAULT_SETTINGS)

  const fileSettings = await loadSettingsFile(join(settingsDir, SETTINGS_FILE_NAME))
  if (fileSettings !== null) {
    merged = mergeSettings(merged, fileSettings)
  }

  merged = mergeSettings(merged, readEnvOverrides(options.env ?? process.env))

  if (options.cliOverrides !== undefined) {
    merged = mergeSettings(merged, options.cliOverrides)
  }

  const result = GitScopeSettingsSchema.safeParse(merged)
  if (!result.success) {
    throw new SettingsError(`Settings validation failed:\n${formatIssues(result.error.issues)}`, {
      issues: result.error.issues,
    })
  }

  logger.debug({ settingsDir }, 'Settings loaded')
  return result.data
}
