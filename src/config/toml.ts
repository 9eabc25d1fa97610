/**
 * TOML generation for the config file.
 * Parsing goes through smol-toml (see store.ts).
 */

/**
 * Escape a string value for TOML (handle quotes and backslashes)
 */
export function escapeTomlString(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')
}

export interface TomlField {
  key: string
  value: string
}

export function formatTomlLine(field: TomlField): string {
  return `${field.key}="${escapeTomlString(field.value)}"`
}

/**
 * Generate a TOML file of string fields, one `key="value"` line each
 */
export function generateTOML(fields: TomlField[], header?: string[]): string {
  const lines: string[] = []

  if (header) {
    lines.push(...header, '')
  }

  for (const field of fields) {
    lines.push(formatTomlLine(field))
  }

  return lines.join('\n') + '\n'
}
