import { ConfigError, describeJson, formatRuleKey, isJsonObject, parseRuleKey, parseSeverity } from '@rulemerge/core'
import createDebug from 'debug'

import type { JsonValue, RuleIdentifier, Severity } from '@rulemerge/core'

const debugRules = createDebug('rulemerge:rules')

export type RuleValue = {
  severity: Severity
  config: JsonValue | undefined
}

export type RuleOverride = RuleValue & {
  id: RuleIdentifier
}

/** Explicit rule entries keyed by `category/name`. */
export type RuleOverrides = Map<string, RuleOverride>

export function resolveRules(document: JsonValue): RuleOverrides {
  const overrides: RuleOverrides = new Map()
  if (!isJsonObject(document)) {
    return overrides
  }

  const rules = document.rules
  if (!isJsonObject(rules)) {
    return overrides
  }

  for (const [key, value] of Object.entries(rules)) {
    const id = parseRuleKey(key)
    if (id.name === '') {
      debugRules('rule=%s has an empty name and matches no rule', key)
    }

    const { severity, config } = resolveRuleValue(value, key)
    overrides.set(formatRuleKey(id), { id, severity, config })
  }

  debugRules('overrides=%d', overrides.size)
  return overrides
}

/**
 * Resolves the two accepted shapes of a rule entry:
 *
 * ```json
 * { "no-console": "off", "quotes": ["error", "single"] }
 * ```
 */
export function resolveRuleValue(value: JsonValue, ruleKey?: string): RuleValue {
  if (typeof value === 'string') {
    return { severity: parseSeverity(value), config: undefined }
  }

  if (Array.isArray(value) && value.length > 0) {
    return { severity: parseSeverity(value), config: value[1] }
  }

  const raw = describeJson(value)
  const target = ruleKey === undefined ? '' : ` for ${ruleKey}`
  throw new ConfigError('rule-value', `Invalid rule value${target}: ${raw}`, { rule: ruleKey, value: raw })
}
