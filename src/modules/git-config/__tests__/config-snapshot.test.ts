import { describe, it, expect } from 'vitest'
import { UsageError } from '../../../core/errors.js'
import { ConfigSnapshot, UNSET_LABEL } from '../config-snapshot.js'

describe('ConfigSnapshot', () => {
  const snapshot = new ConfigSnapshot([
    ['user.name', 'louise'],
    ['color.branch', null],
    ['user.email', 'louise@example.org'],
  ])

  it('keeps entry order', () => {
    expect(snapshot.names()).toEqual(['user.name', 'color.branch', 'user.email'])
    expect([...snapshot]).toEqual([
      ['user.name', 'louise'],
      ['color.branch', null],
      ['user.email', 'louise@example.org'],
    ])
  })

  it('distinguishes unset from unmentioned', () => {
    expect(snapshot.get('color.branch')).toBeNull()
    expect(snapshot.has('color.branch')).toBe(true)
    expect(snapshot.get('core.editor')).toBeUndefined()
    expect(snapshot.has('core.editor')).toBe(false)
    expect(snapshot.size).toBe(3)
  })

  it('formats as aligned name = value lines', () => {
    expect(snapshot.format()).toBe(
      [
        'user.name    = louise',
        `color.branch = ${UNSET_LABEL}`,
        'user.email   = louise@example.org',
      ].join('\n')
    )
    expect(String(snapshot)).toBe(snapshot.format())
  })

  it('formats an empty snapshot', () => {
    expect(new ConfigSnapshot().format()).toBe('(no variables)')
  })

  it('round-trips through JSON', () => {
    const json: unknown = JSON.parse(JSON.stringify(snapshot))
    expect(json).toEqual({ 'user.name': 'louise', 'color.branch': null, 'user.email': 'louise@example.org' })
    expect(ConfigSnapshot.fromJSON(json).entries()).toEqual(snapshot.entries())
  })

  it('rejects JSON that is not a name → string|null map', () => {
    expect(() => ConfigSnapshot.fromJSON({ 'user.name': 42 })).toThrow(UsageError)
    expect(() => ConfigSnapshot.fromJSON(['user.name'])).toThrow(/^Invalid snapshot:/)
  })
})
