import { ConfigError, isJsonObject } from '@rulemerge/core'
import createDebug from 'debug'

import type { JsonValue } from '@rulemerge/core'

const debugExtends = createDebug('rulemerge:extends')

/** Presets whose rule family can be enabled wholesale through `extends`. */
export const PRESET_CATEGORIES: ReadonlyMap<string, string> = new Map([
  ['eslint:recommended', 'eslint'],
  ['plugin:react/recommended', 'react'],
  ['plugin:@typescript-eslint/recommended', 'typescript'],
  ['plugin:react-hooks/recommended', 'react'],
  ['plugin:unicorn/recommended', 'unicorn'],
  ['plugin:jest/recommended', 'jest']
])

/**
 * Maps the `extends` presets of a config document to the rule categories they enable.
 * Returns `undefined` when the document has no `extends` key. Unknown presets are dropped.
 */
export function resolveExtends(
  document: JsonValue,
  presets: ReadonlyMap<string, string> = PRESET_CATEGORIES
): Set<string> | undefined {
  if (!isJsonObject(document) || !('extends' in document)) {
    return undefined
  }

  const extendsValue = document.extends
  if (!Array.isArray(extendsValue)) {
    throw new ConfigError('property-shape', 'Invalid config property "extends": expected an array', {
      property: 'extends'
    })
  }

  const categories = new Set<string>()
  for (const preset of extendsValue) {
    if (typeof preset !== 'string') {
      continue
    }

    const category = presets.get(preset)
    if (category === undefined) {
      debugExtends('preset=%s unknown, ignored', preset)
      continue
    }
    categories.add(category)
  }

  debugExtends('presets=%d categories=%o', extendsValue.length, [...categories])
  return categories
}
