/**
 * Unit tests for the variable normalizer.
 */

import { describe, it, expect } from 'vitest'
import { UsageError } from '../../../core/errors.js'
import { ConfigSnapshot } from '../config-snapshot.js'
import { entryNames, normalize, toAssignments } from '../normalizer.js'
import type { ConfigArg } from '../normalizer.js'

describe('normalize', () => {
  it('treats no arguments as a query', () => {
    expect(normalize([])).toEqual({ entries: [], isQuery: true })
  })

  it('turns strings into query entries', () => {
    expect(normalize(['user.name', 'user.email'])).toEqual({
      entries: [
        { name: 'user.name', mode: 'query' },
        { name: 'user.email', mode: 'query' },
      ],
      isQuery: true,
    })
  })

  it('turns records into set and unset entries', () => {
    const { entries, isQuery } = normalize([{ 'user.name': 'louise', 'color.ui': null, 'core.editor': undefined }])
    expect(isQuery).toBe(false)
    expect(entries).toEqual([
      { name: 'user.name', mode: 'set', value: 'louise' },
      { name: 'color.ui', mode: 'unset' },
      { name: 'core.editor', mode: 'unset' },
    ])
  })

  it('stringifies numbers and booleans', () => {
    const { entries } = normalize([{ 'core.abbrev': 12, 'core.filemode': false }])
    expect(entries).toEqual([
      { name: 'core.abbrev', mode: 'set', value: '12' },
      { name: 'core.filemode', mode: 'set', value: 'false' },
    ])
  })

  it('flattens one level of list', () => {
    const { entries } = normalize([['user.name', { 'user.email': 'louise@example.org' }]])
    expect(entries).toEqual([
      { name: 'user.name', mode: 'query' },
      { name: 'user.email', mode: 'set', value: 'louise@example.org' },
    ])
  })

  it('replays a snapshot', () => {
    const snapshot = new ConfigSnapshot([
      ['user.name', 'louise'],
      ['user.email', null],
    ])
    expect(normalize([snapshot]).entries).toEqual([
      { name: 'user.name', mode: 'set', value: 'louise' },
      { name: 'user.email', mode: 'unset' },
    ])
  })

  it('treats an empty snapshot as a query of nothing', () => {
    expect(normalize([new ConfigSnapshot()])).toEqual({ entries: [], isQuery: true })
  })

  it('rejects a list nested in a list', () => {
    const nested: unknown = [['user.name']]
    expect(() => normalize([nested as ConfigArg])).toThrow('variables may be nested in at most one list')
  })

  it('rejects a list value', () => {
    const value: unknown = ['a', 'b']
    const arg: unknown = { 'user.name': value }
    expect(() => normalize([arg as ConfigArg])).toThrow(
      'value of user.name must be a single string, number or boolean, got a list'
    )
  })

  it('rejects an object value', () => {
    const arg: unknown = { 'user.name': { first: 'louise' } }
    expect(() => normalize([arg as ConfigArg])).toThrow(
      'value of user.name must be a single string, number or boolean, got an object'
    )
  })

  it('rejects a non-finite number', () => {
    expect(() => normalize([{ 'core.abbrev': Number.NaN }])).toThrow(
      'value of core.abbrev must be a single string, number or boolean, got a non-finite number'
    )
  })

  it('rejects empty names', () => {
    expect(() => normalize([''])).toThrow(UsageError)
    expect(() => normalize([{ ' ': 'x' }])).toThrow('variable names must be non-empty strings')
  })

  it('keeps duplicates in order', () => {
    const { entries } = normalize([{ 'user.name': 'a' }, { 'user.name': 'b' }])
    expect(entries.map((entry) => entry.mode === 'set' && entry.value)).toEqual(['a', 'b'])
  })
})

describe('entryNames', () => {
  it('canonicalises and deduplicates in first-seen order', () => {
    const { entries } = normalize(['User.Email', { 'user.name': 'x', 'user.email': 'y' }])
    expect(entryNames(entries)).toEqual(['user.email', 'user.name'])
  })
})

describe('toAssignments', () => {
  it('skips queries and keeps the last value at the first position', () => {
    const { entries } = normalize([
      'color.ui',
      { 'user.name': 'a', 'user.email': 'e' },
      { 'User.Name': 'b' },
    ])
    expect(toAssignments(entries)).toEqual([
      { name: 'user.name', value: 'b' },
      { name: 'user.email', value: 'e' },
    ])
  })

  it('maps unset to null', () => {
    const { entries } = normalize([{ 'user.name': null }])
    expect(toAssignments(entries)).toEqual([{ name: 'user.name', value: null }])
  })
})
