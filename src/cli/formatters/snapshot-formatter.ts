/**
 * Snapshot output formatting for the CLI.
 */

import type { ConfigSnapshot } from '../../modules/git-config/config-snapshot.js'
import type { OutputFormat } from '../../modules/settings/settings-schema.js'

/**
 * Render a snapshot for stdout, without a trailing newline.
 *
 * text: the labelled `name = value` list
 * json: the snapshot's JSON object, unset variables as null
 */
export function formatSnapshot(snapshot: ConfigSnapshot, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(snapshot.toJSON(), null, 2)
  }
  return snapshot.format()
}
