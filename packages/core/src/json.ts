export type JsonPrimitive = null | boolean | number | string
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject
export type JsonObject = { [key: string]: JsonValue }

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function describeJson(value: JsonValue | undefined): string {
  return value === undefined ? 'undefined' : JSON.stringify(value)
}

export function canonicalizeJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map((entry) => canonicalizeJson(entry))
  }

  if (isJsonObject(value)) {
    const result: JsonObject = {}
    for (const key of Object.keys(value).sort()) {
      result[key] = canonicalizeJson(value[key])
    }
    return result
  }

  return value
}

// Code unit order, independent of the runtime locale.
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}
