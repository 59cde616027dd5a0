import { compareText, ConfigError, errorMessage, formatRuleKey, isSeverityEnabled } from '@rulemerge/core'
import createDebug from 'debug'

import { PRESET_CATEGORIES, resolveExtends } from './extends.js'
import { resolveRules } from './rules.js'

import type { RuleCatalog } from './catalog.js'
import type { RuleOverrides } from './rules.js'
import type { JsonValue, Severity } from '@rulemerge/core'

const debugResolve = createDebug('rulemerge:resolve')

/** Severity reported for rules that are active only because a preset enables their category. */
export const PRESET_SEVERITY: Severity = 'error'

export type ResolvedRule<TRule> = {
  category: string
  name: string
  severity: Severity
  source: 'extends' | 'rules'
  config: JsonValue | undefined
  rule: TRule
}

export type ResolveOptions = {
  presets?: ReadonlyMap<string, string>
}

export function resolveLintConfig<TRule>(
  catalog: RuleCatalog<TRule>,
  document: JsonValue,
  options?: ResolveOptions
): ResolvedRule<TRule>[] {
  const extendsSet = resolveExtends(document, options?.presets ?? PRESET_CATEGORIES)
  const overrides = resolveRules(document)
  return resolveRuleSet(catalog, extendsSet, overrides)
}

/**
 * Presets provide the defaults and explicit `rules` entries override them: an explicit
 * entry decides on its own whether a rule is active, whatever its category's preset says.
 */
export function resolveRuleSet<TRule>(
  catalog: RuleCatalog<TRule>,
  extendsSet: ReadonlySet<string> | undefined,
  overrides: RuleOverrides
): ResolvedRule<TRule>[] {
  const startedAt = Date.now()
  const seen = new Set<string>()
  const resolved: ResolvedRule<TRule>[] = []

  for (const descriptor of catalog) {
    const key = formatRuleKey(descriptor)
    if (seen.has(key)) {
      debugResolve('rule=%s listed twice in catalog, keeping first', key)
      continue
    }
    seen.add(key)

    const inExtends = extendsSet?.has(descriptor.category) ?? false
    const override = overrides.get(key)
    const severity = override?.severity ?? 'off'
    const explicit = override !== undefined

    if (!((inExtends && !explicit) || isSeverityEnabled(severity))) {
      continue
    }

    const config = override?.config
    let rule: TRule
    try {
      rule = descriptor.deserializeConfig(config)
    } catch (error: unknown) {
      throw new ConfigError('rule-config', `Invalid configuration for rule ${key}: ${errorMessage(error)}`, {
        rule: key,
        cause: error
      })
    }

    resolved.push({
      category: descriptor.category,
      name: descriptor.name,
      severity: explicit ? severity : PRESET_SEVERITY,
      source: explicit ? 'rules' : 'extends',
      config,
      rule
    })
  }

  debugResolve(
    'catalog=%d overrides=%d included=%d elapsedMs=%d',
    catalog.length,
    overrides.size,
    resolved.length,
    Date.now() - startedAt
  )
  return resolved.sort(compareResolvedRules)
}

function compareResolvedRules<TRule>(a: ResolvedRule<TRule>, b: ResolvedRule<TRule>): number {
  return compareText(a.name, b.name) || compareText(a.category, b.category)
}
