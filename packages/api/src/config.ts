import { ConfigError, errorMessage } from '@rulemerge/core'
import { cosmiconfig } from 'cosmiconfig'
import createDebug from 'debug'
import { readFile } from 'node:fs/promises'
import path from 'node:path'

import { resolveLintConfig } from './resolve.js'

import type { RuleCatalog } from './catalog.js'
import type { ResolvedRule, ResolveOptions } from './resolve.js'
import type { JsonValue } from '@rulemerge/core'

const debugConfig = createDebug('rulemerge:config')

export const LINT_CONFIG_SEARCH_PLACES = ['.eslintrc.json', '.eslintrc', 'package.json']

export type FoundLintConfig = {
  path: string
  document: JsonValue
}

export async function readLintConfig(filePath: string): Promise<JsonValue> {
  let raw: string
  try {
    raw = await readFile(filePath, 'utf8')
  } catch (error: unknown) {
    throw new ConfigError('file-open', `Unable to read lint config (${errorMessage(error)})`, {
      path: filePath,
      cause: error
    })
  }

  return parseLintConfig(filePath, raw)
}

const jsonLoader = (filePath: string, content: string): JsonValue => parseLintConfig(filePath, content)

export async function findLintConfig(cwd?: string): Promise<FoundLintConfig | null> {
  const root = path.resolve(cwd ?? process.cwd())
  const explorer = cosmiconfig('eslint', {
    searchPlaces: LINT_CONFIG_SEARCH_PLACES,
    searchStrategy: 'none',
    packageProp: 'eslintConfig',
    loaders: {
      '.json': jsonLoader,
      noExt: jsonLoader
    }
  })

  const result = await explorer.search(root)
  if (!result) {
    debugConfig('root=%s no lint config found', root)
    return null
  }

  debugConfig('root=%s found=%s', root, result.filepath)
  const document: JsonValue = result.config
  return {
    path: result.filepath,
    document
  }
}

/** Reads a lint config file and resolves it against `catalog`; errors carry the file path. */
export async function loadLintRules<TRule>(
  catalog: RuleCatalog<TRule>,
  filePath: string,
  options?: ResolveOptions
): Promise<ResolvedRule<TRule>[]> {
  const document = await readLintConfig(filePath)
  try {
    return resolveLintConfig(catalog, document, options)
  } catch (error: unknown) {
    if (error instanceof ConfigError && error.path === undefined) {
      throw error.withPath(filePath)
    }
    throw error
  }
}

function parseLintConfig(filePath: string, raw: string): JsonValue {
  try {
    const document: JsonValue = JSON.parse(raw)
    return document
  } catch (error: unknown) {
    throw new ConfigError('json-syntax', `Invalid JSON in lint config (${errorMessage(error)})`, {
      path: filePath,
      cause: error
    })
  }
}
