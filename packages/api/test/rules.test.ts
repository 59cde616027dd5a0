import { describe, expect, it } from 'vitest'

import { ConfigError, resolveRules, resolveRuleValue } from '../src/index.js'

import type { JsonValue } from '../src/index.js'

describe('resolveRuleValue', () => {
  it('parses the string form without config', () => {
    expect(resolveRuleValue('warn')).toEqual({ severity: 'warn', config: undefined })
  })

  it('parses the array form with and without config', () => {
    expect(resolveRuleValue(['error'])).toEqual({ severity: 'error', config: undefined })
    expect(resolveRuleValue(['warn', { opt: 1 }])).toEqual({ severity: 'warn', config: { opt: 1 } })
    expect(resolveRuleValue([2, 'always', 'ignored'])).toEqual({ severity: 'error', config: 'always' })
  })

  it('rejects values that are neither a string nor a non-empty array', () => {
    const invalid: JsonValue[] = [[], 2, true, null, { severity: 'warn' }]
    for (const value of invalid) {
      expect(() => resolveRuleValue(value)).toThrow(ConfigError)
    }
  })

  it('names the rule and raw value in the error', () => {
    try {
      resolveRuleValue({ level: 'warn' }, 'no-console')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      if (error instanceof ConfigError) {
        expect(error.kind).toBe('rule-value')
        expect(error.rule).toBe('no-console')
        expect(error.value).toBe('{"level":"warn"}')
        expect(error.message).toBe('Invalid rule value for no-console: {"level":"warn"}')
      }
    }
  })

  it('reports unknown severities from either form', () => {
    expect(() => resolveRuleValue('on')).toThrow('Unsupported severity: "on"')
    expect(() => resolveRuleValue(['on', {}])).toThrow('Unsupported severity: ["on",{}]')
  })
})

describe('resolveRules', () => {
  it('returns an empty map when rules are absent or malformed', () => {
    expect(resolveRules({}).size).toBe(0)
    expect(resolveRules({ rules: ['no-console'] }).size).toBe(0)
    expect(resolveRules({ rules: 'off' }).size).toBe(0)
    expect(resolveRules(['rules']).size).toBe(0)
    expect(resolveRules(null).size).toBe(0)
  })

  it('keys overrides by normalized identifier', () => {
    const overrides = resolveRules({
      rules: {
        'no-console': 'error',
        '@typescript-eslint/no-explicit-any': ['warn', { fixToUnknown: true }],
        'react/jsx-key': 'off'
      }
    })

    expect([...overrides.keys()]).toEqual(['eslint/no-console', 'typescript/no-explicit-any', 'react/jsx-key'])
    expect(overrides.get('typescript/no-explicit-any')).toEqual({
      id: { category: 'typescript', name: 'no-explicit-any' },
      severity: 'warn',
      config: { fixToUnknown: true }
    })
    expect(overrides.get('react/jsx-key')).toEqual({
      id: { category: 'react', name: 'jsx-key' },
      severity: 'off',
      config: undefined
    })
  })

  it('lets the later of two aliased keys win', () => {
    const overrides = resolveRules({
      rules: {
        '@typescript-eslint/no-shadow': 'error',
        'typescript/no-shadow': 'off'
      }
    })

    expect(overrides.size).toBe(1)
    expect(overrides.get('typescript/no-shadow')?.severity).toBe('off')
  })

  it('aborts on the first invalid entry', () => {
    expect(() =>
      resolveRules({
        rules: {
          'no-console': 'warn',
          'no-debugger': [],
          eqeqeq: 'bogus'
        }
      })
    ).toThrow('Invalid rule value for no-debugger: []')
  })
})
