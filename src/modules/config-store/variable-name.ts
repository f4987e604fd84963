/**
 * Git config variable names.
 *
 * A name is `section.key` or `section.subsection.key`. The section and the
 * key are case-insensitive and stored lower-cased; the subsection is
 * case-sensitive and may contain dots.
 */

const SECTION_PATTERN = /^[A-Za-z0-9-]+$/
const KEY_PATTERN = /^[A-Za-z][A-Za-z0-9-]*$/

export interface VariableNameParts {
  section: string
  subsection: string | null
  key: string
}

/**
 * Split a variable name into its parts.
 * @returns the parts, or null when the name is not a valid git config name
 */
export function parseVariableName(name: string): VariableNameParts | null {
  const firstDot = name.indexOf('.')
  const lastDot = name.lastIndexOf('.')
  if (firstDot <= 0 || lastDot === name.length - 1) return null

  const section = name.slice(0, firstDot)
  const key = name.slice(lastDot + 1)
  const subsection = firstDot === lastDot ? null : name.slice(firstDot + 1, lastDot)

  if (!SECTION_PATTERN.test(section) || !KEY_PATTERN.test(key)) return null
  if (subsection !== null && /[\n\0]/.test(subsection)) return null

  return { section, subsection, key }
}

/**
 * Canonical form of a variable name, as git lists it.
 * Invalid names are returned unchanged so they can still be looked up (and
 * not found).
 *
 * @example
 * canonicalizeVariableName('User.Name')                 // 'user.name'
 * canonicalizeVariableName('Remote.Origin.URL')         // 'remote.Origin.url'
 */
export function canonicalizeVariableName(name: string): string {
  const parts = parseVariableName(name)
  if (parts === null) return name
  const section = parts.section.toLowerCase()
  const key = parts.key.toLowerCase()
  return parts.subsection === null ? `${section}.${key}` : `${section}.${parts.subsection}.${key}`
}

export function isValidVariableName(name: string): boolean {
  return parseVariableName(name) !== null
}
