import { describe, it, expect, vi } from 'vitest'
import { NoRepositoryError } from '../../../core/errors.js'
import type { Repository } from '../../../core/types.js'
import { DE_FACTO_WRITE_NOTICE, resolveReadSources, resolveWriteTarget } from '../scope-resolver.js'

const REPO: Repository = { gitDir: '/work/project/.git', workTree: '/work/project' }

describe('resolveReadSources', () => {
  it('reads global alone for global', () => {
    expect(resolveReadSources('global', REPO)).toEqual(['global'])
    expect(resolveReadSources('global', null)).toEqual(['global'])
  })

  it('reads local only inside a repository', () => {
    expect(resolveReadSources('local', REPO)).toEqual(['local'])
    expect(resolveReadSources('local', null)).toEqual([])
  })

  it('layers local over global for de_facto', () => {
    expect(resolveReadSources('de_facto', REPO)).toEqual(['global', 'local'])
    expect(resolveReadSources('de_facto', null)).toEqual(['global'])
  })
})

describe('resolveWriteTarget', () => {
  it('redirects de_facto to local with a notice', () => {
    const notify = vi.fn()
    expect(resolveWriteTarget('de_facto', REPO, '/work/project', notify)).toBe('local')
    expect(notify).toHaveBeenCalledWith(DE_FACTO_WRITE_NOTICE)
    expect(DE_FACTO_WRITE_NOTICE).toBe('setting where = "local"')
  })

  it('writes global without a repository', () => {
    const notify = vi.fn()
    expect(resolveWriteTarget('global', null, '/tmp', notify)).toBe('global')
    expect(notify).not.toHaveBeenCalled()
  })

  it('fails a local write outside a repository', () => {
    expect(() => resolveWriteTarget('local', null, '/tmp', vi.fn())).toThrow(
      new NoRepositoryError('/tmp')
    )
    expect(() => resolveWriteTarget('local', null, '/tmp', vi.fn())).toThrow('no git repository exists at /tmp')
  })

  it('fails a redirected de_facto write outside a repository', () => {
    expect(() => resolveWriteTarget('de_facto', null, '/tmp', vi.fn())).toThrow(NoRepositoryError)
  })
})
