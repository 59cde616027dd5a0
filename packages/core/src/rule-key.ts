export const DEFAULT_CATEGORY = 'eslint'

const CATEGORY_ALIASES = new Map<string, string>([['typescript-eslint', 'typescript']])

export type RuleIdentifier = {
  category: string
  name: string
}

// "no-console" -> eslint/no-console, "@typescript-eslint/no-explicit-any" -> typescript/no-explicit-any
export function parseRuleKey(raw: string): RuleIdentifier {
  const separator = raw.indexOf('/')
  if (separator === -1) {
    return { category: DEFAULT_CATEGORY, name: raw }
  }

  const category = raw.slice(0, separator).replace(/^@+/, '')
  return {
    category: CATEGORY_ALIASES.get(category) ?? category,
    name: raw.slice(separator + 1)
  }
}

export function formatRuleKey(id: RuleIdentifier): string {
  return `${id.category}/${id.name}`
}
