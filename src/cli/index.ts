#!/usr/bin/env node
/**
 * gitscope CLI - Main entry point
 * Provides the `gitscope` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerSettingsCommand } from './commands/settings.js'

const logger = createLogger('cli')

/** Resolve the package.json version relative to this file */
async function getPackageVersion(): Promise<string> {
  const __filename = fileURLToPath(import.meta.url)
  const __dirname = dirname(__filename)
  // Run from src/cli (tsx) or dist/cli (built)
  const paths = [resolve(__dirname, '../../package.json'), resolve(__dirname, '../package.json')]

  for (const pkgPath of paths) {
    try {
      const content = await readFile(pkgPath, 'utf-8')
      const pkg = JSON.parse(content) as { version?: string; name?: string }
      if (pkg.name === 'gitscope' && pkg.version !== undefined) {
        return pkg.version
      }
    } catch {
      // Try next path
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('gitscope')
    .description('Get, set and restore git configuration across local and global scopes')
    .version(version, '-v, --version', 'Output the current version')

  registerConfigCommand(program)
  registerSettingsCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
