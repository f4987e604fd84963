/**
 * ConfigSnapshot: an immutable, ordered name → value mapping captured by a
 * read. A null value means the variable was not set.
 *
 * Snapshots hold no reference to the store: later writes never change a
 * snapshot that was already returned. Passing a snapshot back as the
 * variables of a write restores the state it captured.
 */

import { z } from 'zod'
import type { ConfigValue } from '../../core/types.js'
import { UsageError } from '../../core/errors.js'

/** JSON form of a snapshot, as written by `toJSON()` */
export const SnapshotJsonSchema = z.record(z.string().min(1), z.string().nullable())
export type SnapshotJson = z.infer<typeof SnapshotJsonSchema>

/** Placeholder displayed for variables that are not set */
export const UNSET_LABEL = '<unset>'

export class ConfigSnapshot implements Iterable<readonly [string, ConfigValue]> {
  private readonly _entries: ReadonlyMap<string, ConfigValue>

  constructor(entries: Iterable<readonly [string, ConfigValue]> = []) {
    this._entries = new Map(entries)
  }

  /** Build a snapshot from a plain object, validating its shape */
  static fromJSON(json: unknown): ConfigSnapshot {
    const parsed = SnapshotJsonSchema.safeParse(json)
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `  • ${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('\n')
      throw new UsageError(`Invalid snapshot:\n${issues}`, { issues: parsed.error.issues })
    }
    return new ConfigSnapshot(Object.entries(parsed.data))
  }

  get size(): number {
    return this._entries.size
  }

  has(name: string): boolean {
    return this._entries.has(name)
  }

  /**
   * Value of `name`: the string value, null when captured as not set, or
   * undefined when the snapshot does not mention `name` at all.
   */
  get(name: string): ConfigValue | undefined {
    return this._entries.get(name)
  }

  names(): string[] {
    return [...this._entries.keys()]
  }

  entries(): Array<readonly [string, ConfigValue]> {
    return [...this._entries.entries()]
  }

  [Symbol.iterator](): Iterator<readonly [string, ConfigValue]> {
    return this._entries.entries()
  }

  toJSON(): SnapshotJson {
    return Object.fromEntries(this._entries)
  }

  /**
   * Labelled list, one `name = value` per line, names padded to a common
   * width.
   */
  format(): string {
    if (this._entries.size === 0) return '(no variables)'
    const width = Math.max(...this.names().map((name) => name.length))
    return this.entries()
      .map(([name, value]) => `${name.padEnd(width)} = ${value ?? UNSET_LABEL}`)
      .join('\n')
  }

  toString(): string {
    return this.format()
  }
}
