/**
 * Variable Name/Value Normalizer.
 *
 * Flattens caller arguments into an ordered list of entries:
 *  - a string names a variable to query
 *  - a record `{ name: value }` sets each variable (null/undefined unsets it)
 *  - a ConfigSnapshot is replayed as a record
 *  - an array may hold any of the above, one level deep only
 */

import { z } from 'zod'
import type { ConfigValue } from '../../core/types.js'
import { UsageError } from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigSnapshot } from './config-snapshot.js'
import type { Assignment } from '../config-store/config-store.js'
import { canonicalizeVariableName } from '../config-store/variable-name.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A value a caller may assign; null or undefined unsets the variable */
export type VariableInput = string | number | boolean | null | undefined

/** Variables to set, keyed by name */
export type VariableRecord = Readonly<Record<string, VariableInput>>

/** A single argument accepted before flattening */
export type VariableArg = string | VariableRecord | ConfigSnapshot

/** Any argument accepted by getOrSet */
export type ConfigArg = VariableArg | readonly VariableArg[]

export type VariableEntry =
  | { name: string; mode: 'query' }
  | { name: string; mode: 'set'; value: string }
  | { name: string; mode: 'unset' }

export interface NormalizedArgs {
  entries: VariableEntry[]
  /** True when no entry carries a value (including when there are none) */
  isQuery: boolean
}

// ---------------------------------------------------------------------------
// Value validation
// ---------------------------------------------------------------------------

const VariableInputSchema = z.union([
  z.string(),
  z.number().finite(),
  z.boolean(),
  z.null(),
  z.undefined(),
])

function toEntry(name: string, raw: unknown): VariableEntry {
  const parsed = VariableInputSchema.safeParse(raw)
  if (!parsed.success) {
    const kind = Array.isArray(raw)
      ? 'a list'
      : typeof raw === 'object'
        ? 'an object'
        : typeof raw === 'number'
          ? 'a non-finite number'
          : `a ${typeof raw}`
    throw new UsageError(`value of ${name} must be a single string, number or boolean, got ${kind}`, {
      name,
    })
  }
  const value = parsed.data
  if (value === null || value === undefined) {
    return { name, mode: 'unset' }
  }
  return { name, mode: 'set', value: String(value) }
}

function checkName(name: unknown): string {
  if (typeof name !== 'string' || name.trim() === '') {
    throw new UsageError('variable names must be non-empty strings', { name })
  }
  return name
}

// ---------------------------------------------------------------------------
// Flattening
// ---------------------------------------------------------------------------

function expand(arg: unknown, depth: number, out: VariableEntry[]): void {
  if (typeof arg === 'string') {
    out.push({ name: checkName(arg), mode: 'query' })
    return
  }

  if (arg instanceof ConfigSnapshot) {
    for (const [name, value] of arg) {
      out.push(toEntry(name, value))
    }
    return
  }

  if (Array.isArray(arg)) {
    if (depth > 0) {
      throw new UsageError('variables may be nested in at most one list')
    }
    const items: unknown[] = arg
    for (const item of items) {
      expand(item, depth + 1, out)
    }
    return
  }

  if (isPlainObject(arg)) {
    for (const [name, value] of Object.entries(arg)) {
      out.push(toEntry(checkName(name), value))
    }
    return
  }

  throw new UsageError(`unsupported variable argument: ${arg === null ? 'null' : typeof arg}`)
}

/**
 * Flatten caller arguments into entries, preserving first-seen order.
 * Duplicate names are kept.
 *
 * @throws {UsageError} on nested lists, non-scalar values, or empty names
 */
export function normalize(args: readonly ConfigArg[]): NormalizedArgs {
  const entries: VariableEntry[] = []
  for (const arg of args) {
    expand(arg, 0, entries)
  }
  return {
    entries,
    isQuery: entries.every((entry) => entry.mode === 'query'),
  }
}

/**
 * Names to read for a set of entries: canonical, distinct, in first-seen order.
 */
export function entryNames(entries: readonly VariableEntry[]): string[] {
  return [...new Set(entries.map((entry) => canonicalizeVariableName(entry.name)))]
}

/**
 * Collapse entries into the assignments of a write. For each name the last
 * set/unset wins, placed where its first set/unset appeared; query entries
 * are not written.
 */
export function toAssignments(entries: readonly VariableEntry[]): Assignment[] {
  const byName = new Map<string, ConfigValue>()
  for (const entry of entries) {
    if (entry.mode === 'query') continue
    byName.set(canonicalizeVariableName(entry.name), entry.mode === 'set' ? entry.value : null)
  }
  return [...byName].map(([name, value]) => ({ name, value }))
}
