import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { DecodingError } from "./errors.js"
import { invalid, missing, nestField } from "./errors.js"
import type { JsonObject } from "./json.js"
import type { DecodableTarget, PrimitiveTarget, RawRepresentableTarget, Target, TransformTarget } from "./target.js"
import { jsonObject, string } from "./target.js"

// CHANGE: dispatch a keyed decode by the target's static description
// WHY: one entry point serves primitives, raw-representables, nested models and custom scalars
// QUOTE(TZ): "absence always takes precedence over type mismatch"
// REF: req-decode-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k ∉ keys(o), ∀t: decode(k, o, t) = Left(Missing(k))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: absence is reported before any type matching
// COMPLEXITY: O(n) where n = size of the decoded sub-tree

const decodePrimitive = <A>(
  key: string,
  value: unknown,
  target: PrimitiveTarget<A>
): Either.Either<A, DecodingError> => target.is(value) ? Either.right(value) : Either.left(invalid(key))

const decodeRawRepresentable = <A>(
  key: string,
  object: JsonObject,
  target: RawRepresentableTarget<A>
): Either.Either<A, DecodingError> => {
  const raw = decode(key, object, target.raw)
  if (Either.isLeft(raw)) {
    return Either.left(raw.left)
  }
  const value = target.fromRaw(raw.right)
  return Option.isSome(value) ? Either.right(value.value) : Either.left(invalid(key))
}

const decodeNested = <A>(
  key: string,
  object: JsonObject,
  target: DecodableTarget<A>
): Either.Either<A, DecodingError> => {
  const child = decode(key, object, jsonObject)
  if (Either.isLeft(child)) {
    return Either.left(child.left)
  }
  return Either.mapLeft(target.decodable.fromJson(child.right), (error) => nestField(key, error))
}

const decodeTransform = <A>(
  key: string,
  object: JsonObject,
  target: TransformTarget<A>
): Either.Either<A, DecodingError> => {
  const text = decode(key, object, string)
  if (Either.isLeft(text)) {
    return Either.left(text.left)
  }
  const value = target.transform.parse(text.right)
  return Option.isSome(value) ? Either.right(value.value) : Either.left(invalid(key))
}

/**
 * Decode the value stored under `key` as the described target.
 *
 * @param key - Field of `object` to read.
 * @param object - JSON object holding the field.
 * @param target - Static description of the requested type.
 * @returns The decoded value, or a DecodingError whose parameter is the path to the failing field.
 *
 * @pure true
 * @invariant key absent → Missing(key); present but unusable → Invalid(key) or a nested path
 * @complexity O(n)
 */
export const decode = <A>(
  key: string,
  object: JsonObject,
  target: Target<A>
): Either.Either<A, DecodingError> => {
  // own keys only: "toString" on a plain object is absent, not invalid
  const value = Object.hasOwn(object, key) ? object[key] : undefined
  if (value === undefined) {
    return Either.left(missing(key))
  }
  switch (target._tag) {
    case "Primitive":
      return decodePrimitive(key, value, target)
    case "RawRepresentable":
      return decodeRawRepresentable(key, object, target)
    case "Decodable":
      return decodeNested(key, object, target)
    case "Transform":
      return decodeTransform(key, object, target)
  }
}

/**
 * Turn a Missing failure into None so the field reads as optional.
 * Invalid failures still propagate.
 *
 * @pure true
 */
export const recoverMissing = <A>(
  result: Either.Either<A, DecodingError>
): Either.Either<Option.Option<A>, DecodingError> => {
  if (Either.isRight(result)) {
    return Either.right(Option.some(result.right))
  }
  return result.left.code === "missing" ? Either.right(Option.none()) : Either.left(result.left)
}
