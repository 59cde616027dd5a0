import { createRuleCatalog, defineRule } from '../src/index.js'

import type { JsonValue, RuleCatalog } from '../src/index.js'

export type FakeRule = {
  key: string
  options: JsonValue
}

export function fakeCatalog(keys: readonly string[]): RuleCatalog<FakeRule> {
  return createRuleCatalog(keys.map((key) => defineRule(key, (config) => ({ key, options: config ?? null }))))
}
