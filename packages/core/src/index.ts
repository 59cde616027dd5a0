export { ConfigError, errorMessage } from './errors.js'
export type { ConfigErrorDetails, ConfigErrorKind } from './errors.js'

export { canonicalizeJson, compareText, describeJson, isJsonObject } from './json.js'
export type { JsonObject, JsonPrimitive, JsonValue } from './json.js'

export { DEFAULT_CATEGORY, formatRuleKey, parseRuleKey } from './rule-key.js'
export type { RuleIdentifier } from './rule-key.js'

export { isSeverityEnabled, parseSeverity } from './severity.js'
export type { Severity } from './severity.js'
