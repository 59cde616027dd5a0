import { formatRuleKey, parseRuleKey } from '@rulemerge/core'

import type { JsonValue } from '@rulemerge/core'

export type RuleDescriptor<TRule> = {
  readonly category: string
  readonly name: string
  /** Builds a configured rule from the second element of a `[severity, config]` entry. */
  deserializeConfig(config: JsonValue | undefined): TRule
}

export type RuleCatalog<TRule> = readonly RuleDescriptor<TRule>[]

export function createRuleCatalog<TRule>(descriptors: Iterable<RuleDescriptor<TRule>>): RuleCatalog<TRule> {
  const seen = new Set<string>()
  const catalog: RuleDescriptor<TRule>[] = []

  for (const descriptor of descriptors) {
    const key = formatRuleKey(descriptor)
    if (seen.has(key)) {
      throw new Error(`Duplicate rule in catalog: ${key}`)
    }
    seen.add(key)
    catalog.push(descriptor)
  }

  return Object.freeze(catalog)
}

export function defineRule<TRule>(
  key: string,
  deserializeConfig: (config: JsonValue | undefined) => TRule
): RuleDescriptor<TRule> {
  const { category, name } = parseRuleKey(key)
  return { category, name, deserializeConfig }
}
