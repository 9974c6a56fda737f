import * as Option from "effect/Option"

import type { Json } from "./json.js"
import type { EncodeRule } from "./transforms.js"
import { defaultEncodeRules } from "./transforms.js"

// CHANGE: normalize arbitrary runtime values into a JSON tree
// WHY: the encode direction must always produce a legal JSON document
// QUOTE(TZ): "encode always returns a value that a strict 'is valid JSON' validator accepts, and never raises an error"
// REF: req-encode-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: isJson(encode(v)) = true
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unsupported values become null; encode never fails on its own
// COMPLEXITY: O(n) where n = number of reachable values

/**
 * A type that describes itself as a loosely typed value to be encoded in its place.
 * The representation may itself contain Encodable values.
 */
export interface Encodable {
  readonly toEncodable: () => unknown
}

export const isEncodable = (value: unknown): value is Encodable =>
  typeof value === "object" && value !== null && "toEncodable" in value &&
  typeof value.toEncodable === "function"

const isPlainObject = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

const stringKeyedEntries = (map: ReadonlyMap<unknown, unknown>): Option.Option<ReadonlyArray<[string, unknown]>> => {
  const entries: Array<[string, unknown]> = []
  for (const [key, value] of map) {
    if (typeof key !== "string") {
      return Option.none()
    }
    entries.push([key, value])
  }
  return Option.some(entries)
}

const representationOf = (value: Encodable): Option.Option<unknown> =>
  Option.liftThrowable(() => value.toEncodable())()

export type Encoder = (value: unknown) => Json

/**
 * Build an encoder that consults `rules` (custom scalars such as Date and URL)
 * after the Encodable capability.
 *
 * @pure true
 * @invariant a value reached again through its own descendants encodes as null
 */
export const makeEncoder = (rules: ReadonlyArray<EncodeRule>): Encoder => {
  const encodeEntries = (
    entries: ReadonlyArray<readonly [string, unknown]>,
    ancestors: ReadonlySet<object>
  ): Json => Object.fromEntries(entries.map(([key, item]) => [key, encodeValue(item, ancestors)]))

  const applyRules = (value: object): Option.Option<unknown> => {
    for (const rule of rules) {
      const representation = rule(value)
      if (Option.isSome(representation)) {
        return representation
      }
    }
    return Option.none()
  }

  const encodeObject = (value: object, ancestors: ReadonlySet<object>): Json => {
    if (ancestors.has(value)) {
      return null
    }
    const path = new Set(ancestors).add(value)
    if (isEncodable(value)) {
      // a representation that throws is unsupported
      return Option.match(representationOf(value), {
        onNone: () => null,
        onSome: (representation) => encodeValue(representation, path)
      })
    }
    const custom = applyRules(value)
    if (Option.isSome(custom)) {
      return encodeValue(custom.value, path)
    }
    if (Array.isArray(value)) {
      // holes become null
      return Array.from(value, (item: unknown) => encodeValue(item, path))
    }
    if (value instanceof Map) {
      return Option.match(stringKeyedEntries(value), {
        onNone: () => null,
        onSome: (entries) => encodeEntries(entries, path)
      })
    }
    if (isPlainObject(value)) {
      return encodeEntries(Object.entries(value), path)
    }
    return null
  }

  const encodeValue = (value: unknown, ancestors: ReadonlySet<object>): Json => {
    if (value === null || value === undefined) {
      return null
    }
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : null
    }
    if (typeof value === "string" || typeof value === "boolean") {
      return value
    }
    if (typeof value === "object") {
      return encodeObject(value, ancestors)
    }
    // bigint, symbol, function
    return null
  }

  return (value) => encodeValue(value, new Set())
}

/**
 * Encode any value into a JSON tree, with Date and URL handled as ISO 8601 and href strings.
 *
 * @param value - Anything; unsupported values become null.
 * @returns A JSON tree that serializes without error.
 *
 * @pure true
 * @complexity O(n)
 */
export const encode: Encoder = makeEncoder(defaultEncodeRules)
