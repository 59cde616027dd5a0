export type ConfigErrorKind =
  | 'file-open'
  | 'json-syntax'
  | 'property-shape'
  | 'rule-value'
  | 'severity'
  | 'rule-config'

export type ConfigErrorDetails = {
  path?: string
  property?: string
  rule?: string
  value?: string
  cause?: unknown
}

/**
 * Raised for every failure while reading or resolving a lint config.
 * `message` carries the file path as a prefix once one is attached.
 */
export class ConfigError extends Error {
  readonly kind: ConfigErrorKind
  readonly detail: string
  readonly path: string | undefined
  readonly property: string | undefined
  readonly rule: string | undefined
  readonly value: string | undefined

  constructor(kind: ConfigErrorKind, detail: string, details: ConfigErrorDetails = {}) {
    super(
      details.path === undefined ? detail : `${details.path}: ${detail}`,
      details.cause === undefined ? undefined : { cause: details.cause }
    )
    this.name = 'ConfigError'
    this.kind = kind
    this.detail = detail
    this.path = details.path
    this.property = details.property
    this.rule = details.rule
    this.value = details.value
  }

  withPath(path: string): ConfigError {
    return new ConfigError(this.kind, this.detail, {
      path,
      property: this.property,
      rule: this.rule,
      value: this.value,
      cause: this.cause
    })
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
