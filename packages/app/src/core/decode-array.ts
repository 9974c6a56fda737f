import * as Either from "effect/Either"

import { decode } from "./decode.js"
import type { DecodingError } from "./errors.js"
import { nestIndex } from "./errors.js"
import type { JsonObject } from "./json.js"
import type { Decodable } from "./target.js"
import { arrayOf, jsonObject } from "./target.js"

// CHANGE: decode arrays of nested models in strict or relaxed mode
// WHY: one bad element may either be dropped or abort the whole array
// QUOTE(TZ): "relaxed (skip failures) or strict (propagate with index) modes"
// REF: req-decode-array-1
// SOURCE: n/a
// FORMAT THEOREM: relaxed(k, o) = [d(x) | x ∈ o[k], d(x) = Right]; strict fails at the first Left with k[i].p
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: relaxed output keeps source order; error indices are source positions
// COMPLEXITY: O(n) where n = array length

export interface DiscardedElement {
  readonly index: number
  readonly error: DecodingError
}

export interface RelaxedArray<A> {
  readonly values: ReadonlyArray<A>
  readonly discarded: ReadonlyArray<DiscardedElement>
}

const objectArray = arrayOf(jsonObject)

/**
 * Relaxed decode that also reports which elements were dropped and why.
 *
 * @pure true
 * @invariant values.length + discarded.length = source length
 */
export const decodeArrayCollect = <A>(
  key: string,
  object: JsonObject,
  decodable: Decodable<A>
): Either.Either<RelaxedArray<A>, DecodingError> =>
  Either.map(decode(key, object, objectArray), (items) => {
    const values: Array<A> = []
    const discarded: Array<DiscardedElement> = []
    for (const [index, item] of items.entries()) {
      const element = decodable.fromJson(item)
      if (Either.isRight(element)) {
        values.push(element.right)
      } else {
        discarded.push({ index, error: element.left })
      }
    }
    return { values, discarded }
  })

const decodeStrict = <A>(
  key: string,
  items: ReadonlyArray<JsonObject>,
  decodable: Decodable<A>
): Either.Either<ReadonlyArray<A>, DecodingError> => {
  const decoded: Array<A> = []
  for (const [index, item] of items.entries()) {
    const element = decodable.fromJson(item)
    if (Either.isLeft(element)) {
      return Either.left(nestIndex(key, index, element.left))
    }
    decoded.push(element.right)
  }
  return Either.right(decoded)
}

/**
 * Decode the array stored under `key` into models.
 *
 * @param key - Field of `object` holding an array of JSON objects.
 * @param object - JSON object holding the field.
 * @param decodable - Model to construct from every element.
 * @param strict - Abort on the first element failure instead of dropping it.
 * @returns Decoded models, or the array-shape error on `key`, or (strict) the first element error.
 *
 * @pure true
 * @invariant strict failures have parameter `${key}[${index}].${child}`
 * @complexity O(n)
 */
export const decodeArray = <A>(
  key: string,
  object: JsonObject,
  decodable: Decodable<A>,
  strict: boolean
): Either.Either<ReadonlyArray<A>, DecodingError> => {
  if (!strict) {
    return Either.map(decodeArrayCollect(key, object, decodable), (relaxed) => relaxed.values)
  }
  const items = decode(key, object, objectArray)
  if (Either.isLeft(items)) {
    return Either.left(items.left)
  }
  return decodeStrict(key, items.right, decodable)
}
