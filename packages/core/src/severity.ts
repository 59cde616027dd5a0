import { ConfigError } from './errors.js'
import { describeJson } from './json.js'

import type { JsonValue } from './json.js'

export type Severity = 'off' | 'warn' | 'error'

const SEVERITY_TOKENS = new Map<string | number, Severity>([
  ['off', 'off'],
  ['allow', 'off'],
  ['warn', 'warn'],
  ['error', 'error'],
  ['deny', 'error'],
  [0, 'off'],
  [1, 'warn'],
  [2, 'error']
])

/**
 * Parses a severity written either as a bare token (`"warn"`, `2`) or as the
 * first element of an ESLint-style `[severity, options]` tuple.
 */
export function parseSeverity(value: JsonValue | undefined): Severity {
  const token = Array.isArray(value) ? value[0] : value
  const severity = typeof token === 'string' || typeof token === 'number' ? SEVERITY_TOKENS.get(token) : undefined
  if (severity === undefined) {
    const raw = describeJson(value)
    throw new ConfigError(
      'severity',
      `Unsupported severity: ${raw} (expected one of "off", "allow", "warn", "error", "deny", 0, 1, 2)`,
      { value: raw }
    )
  }

  return severity
}

export function isSeverityEnabled(severity: Severity): boolean {
  return severity !== 'off'
}
