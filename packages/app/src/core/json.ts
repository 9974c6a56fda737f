// CHANGE: introduce the JSON value tree shared by decode and encode
// WHY: both directions meet at one closed variant type
// QUOTE(TZ): "a dynamically-typed JSON value tree"
// REF: req-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: isJson(x) = true
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export type JsonArray = ReadonlyArray<Json>

export type RawValue = boolean | number | string

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const isRawValue = (value: unknown): value is RawValue =>
  typeof value === "string" || typeof value === "boolean" ||
  (typeof value === "number" && Number.isFinite(value))

/**
 * Deep check that a runtime value is a JSON tree.
 *
 * @pure true
 * @complexity O(n) where n = number of nodes
 */
export const isJson = (value: unknown): value is Json => {
  if (value === null || isRawValue(value)) {
    return true
  }
  if (Array.isArray(value)) {
    return value.every((item) => isJson(item))
  }
  if (isJsonObject(value)) {
    return Object.values(value).every((item) => isJson(item))
  }
  return false
}

export const isJsonArray = (value: unknown): value is JsonArray => Array.isArray(value) && isJson(value)
