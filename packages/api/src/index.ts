export { createRuleCatalog, defineRule } from './catalog.js'
export type { RuleCatalog, RuleDescriptor } from './catalog.js'

export { PRESET_CATEGORIES, resolveExtends } from './extends.js'

export { resolveRules, resolveRuleValue } from './rules.js'
export type { RuleOverride, RuleOverrides, RuleValue } from './rules.js'

export { PRESET_SEVERITY, resolveLintConfig, resolveRuleSet } from './resolve.js'
export type { ResolvedRule, ResolveOptions } from './resolve.js'

export { toRuleEntries } from './entries.js'
export type { RuleEntry } from './entries.js'

export { findLintConfig, LINT_CONFIG_SEARCH_PLACES, loadLintRules, readLintConfig } from './config.js'
export type { FoundLintConfig } from './config.js'

export {
  ConfigError,
  DEFAULT_CATEGORY,
  formatRuleKey,
  isSeverityEnabled,
  parseRuleKey,
  parseSeverity
} from '@rulemerge/core'
export type { ConfigErrorKind, JsonValue, RuleIdentifier, Severity } from '@rulemerge/core'
