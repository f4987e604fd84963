/**
 * Unit tests for GitCliConfigStore
 *
 * Tests cover:
 *  - parsing of `git config --list --null` output
 *  - which git arguments each scope uses
 *  - missing global config file reads as empty
 *  - unset of an absent variable is not an error
 *
 * child_process.spawn is mocked to avoid real git operations.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { EventEmitter } from 'node:events'
import type { ChildProcess } from 'node:child_process'

const mockSpawn = vi.fn()

vi.mock('node:child_process', () => ({
  spawn: (...args: unknown[]) => mockSpawn(...args),
}))

import { GitCliConfigStore, parseConfigList } from '../git-cli-config-store.js'
import { GitCommandError, UsageError } from '../../../core/errors.js'
import type { Repository } from '../../../core/types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface FakeResult {
  stdout?: string
  stderr?: string
  code?: number
}

function fakeProcess(result: FakeResult): ChildProcess {
  const stdout = new EventEmitter()
  const stderr = new EventEmitter()
  const proc = Object.assign(new EventEmitter(), { stdout, stderr })

  setImmediate(() => {
    if (result.stdout !== undefined) stdout.emit('data', Buffer.from(result.stdout))
    if (result.stderr !== undefined) stderr.emit('data', Buffer.from(result.stderr))
    proc.emit('close', result.code ?? 0)
  })

  return proc as unknown as ChildProcess
}

function queue(...results: FakeResult[]): void {
  for (const result of results) {
    mockSpawn.mockImplementationOnce(() => fakeProcess(result))
  }
}

function spawnedArgs(call: number): unknown {
  return mockSpawn.mock.calls[call]?.[1]
}

const REPO: Repository = { gitDir: '/work/project/.git', workTree: '/work/project' }

beforeEach(() => {
  vi.clearAllMocks()
})

// ---------------------------------------------------------------------------
// parseConfigList
// ---------------------------------------------------------------------------

describe('parseConfigList', () => {
  it('parses name/value records', () => {
    const entries = parseConfigList('user.name\nlouise\0user.email\nlouise@example.org\0')
    expect([...entries]).toEqual([
      ['user.name', ['louise']],
      ['user.email', ['louise@example.org']],
    ])
  })

  it('reads a valueless entry as true', () => {
    expect(parseConfigList('core.bare\0').get('core.bare')).toEqual(['true'])
  })

  it('keeps newlines inside values', () => {
    expect(parseConfigList('alias.lg\nlog\n--graph\0').get('alias.lg')).toEqual(['log\n--graph'])
  })

  it('collects repeated names into one list', () => {
    const entries = parseConfigList('remote.origin.fetch\na\0remote.origin.fetch\nb\0')
    expect(entries.get('remote.origin.fetch')).toEqual(['a', 'b'])
  })

  it('returns an empty map for empty output', () => {
    expect(parseConfigList('').size).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// read
// ---------------------------------------------------------------------------

describe('GitCliConfigStore.read', () => {
  it('reads only the global scope without a repository', async () => {
    queue({ stdout: 'user.name\nthelma\0' })
    const store = new GitCliConfigStore()

    const contents = await store.read(null)

    expect(contents.global.get('user.name')).toEqual(['thelma'])
    expect(contents.local.size).toBe(0)
    expect(mockSpawn).toHaveBeenCalledTimes(1)
    expect(mockSpawn).toHaveBeenCalledWith(
      'git',
      ['config', '--global', '--list', '--null'],
      expect.objectContaining({ stdio: ['ignore', 'pipe', 'pipe'] })
    )
  })

  it('reads the local scope through --git-dir', async () => {
    queue({ stdout: '' }, { stdout: 'user.name\nlouise\0' })
    const store = new GitCliConfigStore()

    const contents = await store.read(REPO)

    expect(contents.local.get('user.name')).toEqual(['louise'])
    expect(spawnedArgs(1)).toEqual(['--git-dir', '/work/project/.git', 'config', '--local', '--list', '--null'])
  })

  it('treats a missing global config file as empty', async () => {
    queue({
      code: 128,
      stderr: "fatal: unable to read config file '/home/u/.gitconfig': No such file or directory",
    })
    const store = new GitCliConfigStore()

    const contents = await store.read(null)

    expect(contents.global.size).toBe(0)
  })

  it('throws GitCommandError when the local read fails', async () => {
    queue({ stdout: '' }, { code: 128, stderr: 'fatal: not a git repository' })
    const store = new GitCliConfigStore()

    await expect(store.read(REPO)).rejects.toBeInstanceOf(GitCommandError)
  })

  it('uses --file for a configured global config path', async () => {
    queue({ stdout: '' })
    const store = new GitCliConfigStore({ globalConfigPath: '/tmp/test-gitconfig' })

    await store.read(null)

    expect(spawnedArgs(0)).toEqual(['config', '--file', '/tmp/test-gitconfig', '--list', '--null'])
  })

  it('runs the configured git binary', async () => {
    queue({ stdout: '' })
    const store = new GitCliConfigStore({ gitBinary: '/opt/git/bin/git' })

    await store.read(null)

    expect(mockSpawn.mock.calls[0]?.[0]).toBe('/opt/git/bin/git')
  })
})

// ---------------------------------------------------------------------------
// write
// ---------------------------------------------------------------------------

describe('GitCliConfigStore.write', () => {
  it('sets local variables one invocation each', async () => {
    queue({}, {})
    const store = new GitCliConfigStore()

    await store.write(REPO, false, [
      { name: 'user.name', value: 'louise' },
      { name: 'user.email', value: 'louise@example.org' },
    ])

    expect(spawnedArgs(0)).toEqual(['--git-dir', '/work/project/.git', 'config', '--local', 'user.name', 'louise'])
    expect(spawnedArgs(1)).toEqual([
      '--git-dir',
      '/work/project/.git',
      'config',
      '--local',
      'user.email',
      'louise@example.org',
    ])
  })

  it('sets global variables with --global', async () => {
    queue({})
    const store = new GitCliConfigStore()

    await store.write(null, true, [{ name: 'user.name', value: 'thelma' }])

    expect(spawnedArgs(0)).toEqual(['config', '--global', 'user.name', 'thelma'])
  })

  it('unsets with --unset-all', async () => {
    queue({})
    const store = new GitCliConfigStore()

    await store.write(REPO, false, [{ name: 'user.name', value: null }])

    expect(spawnedArgs(0)).toEqual(['--git-dir', '/work/project/.git', 'config', '--local', '--unset-all', 'user.name'])
  })

  it('does not fail when unsetting an absent variable', async () => {
    queue({ code: 5 })
    const store = new GitCliConfigStore()

    await expect(store.write(null, true, [{ name: 'color.ui', value: null }])).resolves.toBeUndefined()
  })

  it('throws GitCommandError when a set fails', async () => {
    queue({ code: 3, stderr: 'error: invalid config file' })
    const store = new GitCliConfigStore()

    await expect(store.write(null, true, [{ name: 'user.name', value: 'x' }])).rejects.toThrow(
      'git config --global user.name x failed with exit code 3: error: invalid config file'
    )
  })

  it('refuses a local write without a repository', async () => {
    const store = new GitCliConfigStore()

    await expect(store.write(null, false, [{ name: 'user.name', value: 'x' }])).rejects.toBeInstanceOf(UsageError)
    expect(mockSpawn).not.toHaveBeenCalled()
  })
})
