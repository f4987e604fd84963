/**
 * git-utils.ts: Low-level git command helpers.
 *
 * git runs as a child process; output is collected in memory.
 *
 * Functions:
 *  - spawnGit: Execute git with given args, returns stdout/stderr/code
 *  - runGit: spawnGit that throws GitCommandError on unexpected exit codes
 */

import { spawn } from 'node:child_process'
import { GitCommandError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('git-utils')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpawnOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** git executable to run (default: `git` on PATH) */
  binary?: string
  /** Keep stdout exactly as written; needed for NUL-delimited output */
  raw?: boolean
}

export interface GitSpawnResult {
  stdout: string
  stderr: string
  code: number
}

export interface RunGitOptions extends SpawnOptions {
  /** Exit codes treated as success in addition to 0 */
  allowedExitCodes?: number[]
}

// ---------------------------------------------------------------------------
// spawnGit
// ---------------------------------------------------------------------------

/**
 * Spawn a git subprocess with the given args.
 *
 * Never rejects: a spawn failure (missing binary, missing cwd) resolves with
 * exit code 1 and the error message on stderr.
 */
export function spawnGit(args: string[], options?: SpawnOptions): Promise<GitSpawnResult> {
  return new Promise((resolve) => {
    logger.debug({ args, cwd: options?.cwd }, 'spawnGit')

    const proc = spawn(options?.binary ?? 'git', args, {
      cwd: options?.cwd,
      env: options?.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    // Decoded once on close: a multibyte character may span two chunks
    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk)
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk)
    })

    proc.on('close', (code: number | null) => {
      const stdout = Buffer.concat(stdoutChunks).toString('utf-8')
      const stderr = Buffer.concat(stderrChunks).toString('utf-8')
      resolve({
        stdout: options?.raw === true ? stdout : stdout.trim(),
        stderr: stderr.trim(),
        code: code ?? 1,
      })
    })

    proc.on('error', (err: Error) => {
      resolve({ stdout: '', stderr: err.message, code: 1 })
    })
  })
}

// ---------------------------------------------------------------------------
// runGit
// ---------------------------------------------------------------------------

/**
 * Run git and return its result, throwing when the exit code is neither 0
 * nor one of `allowedExitCodes`.
 *
 * @throws {GitCommandError}
 */
export async function runGit(args: string[], options: RunGitOptions = {}): Promise<GitSpawnResult> {
  const { allowedExitCodes = [], ...spawnOptions } = options
  const result = await spawnGit(args, spawnOptions)
  if (result.code !== 0 && !allowedExitCodes.includes(result.code)) {
    throw new GitCommandError(args, result.code, result.stderr)
  }
  return result
}
