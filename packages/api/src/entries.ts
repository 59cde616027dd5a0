import { canonicalizeJson, compareText, formatRuleKey } from '@rulemerge/core'

import type { ResolvedRule } from './resolve.js'
import type { JsonValue, Severity } from '@rulemerge/core'

export type RuleEntry = [severity: Severity] | [severity: Severity, config: JsonValue]

/** Renders a resolved set back to an ESLint-style `rules` object with sorted keys. */
export function toRuleEntries<TRule>(resolved: readonly ResolvedRule<TRule>[]): Record<string, RuleEntry> {
  const entries = resolved
    .map<[string, RuleEntry]>((rule) => [
      formatRuleKey(rule),
      rule.config === undefined ? [rule.severity] : [rule.severity, canonicalizeJson(rule.config)]
    ])
    .sort(([a], [b]) => compareText(a, b))

  return Object.fromEntries(entries)
}
