import type * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { DecodingError } from "./errors.js"
import type { Json, JsonArray, JsonObject, RawValue } from "./json.js"
import { isJson, isJsonArray, isJsonObject, isRawValue } from "./json.js"
import type { ScalarTransform, UrlReference } from "./transforms.js"
import { iso8601Date, urlReference } from "./transforms.js"

// CHANGE: describe decode targets as tagged strategies
// WHY: TypeScript erases generics, so the caller passes the target's static description
// QUOTE(TZ): "reject at compile time any T outside {scalar, sequence-of-T, mapping-of-T, Decodable, RawRepresentable, registered-transform}"
// REF: req-target-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t ∈ Target: t._tag ∈ {"Primitive","RawRepresentable","Decodable","Transform"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: targets are only built through the constructors below
// COMPLEXITY: O(1)/O(1)

/**
 * A type that can construct itself from a JSON object.
 *
 * A class with a static `fromJson` satisfies this structurally.
 */
export interface Decodable<A> {
  readonly fromJson: (json: JsonObject) => Either.Either<A, DecodingError>
}

export interface PrimitiveTarget<A> {
  readonly _tag: "Primitive"
  readonly name: string
  readonly is: (value: unknown) => value is A
}

export interface RawRepresentableTarget<A> {
  readonly _tag: "RawRepresentable"
  readonly name: string
  readonly raw: PrimitiveTarget<RawValue>
  readonly fromRaw: (raw: RawValue) => Option.Option<A>
}

export interface DecodableTarget<A> {
  readonly _tag: "Decodable"
  readonly name: string
  readonly decodable: Decodable<A>
}

export interface TransformTarget<A> {
  readonly _tag: "Transform"
  readonly name: string
  readonly transform: ScalarTransform<A>
}

export type Target<A> =
  | PrimitiveTarget<A>
  | RawRepresentableTarget<A>
  | DecodableTarget<A>
  | TransformTarget<A>

const primitive = <A>(name: string, is: (value: unknown) => value is A): PrimitiveTarget<A> => ({
  _tag: "Primitive",
  name,
  is
})

export const string: PrimitiveTarget<string> = primitive(
  "string",
  (value): value is string => typeof value === "string"
)

export const number: PrimitiveTarget<number> = primitive(
  "number",
  (value): value is number => typeof value === "number" && Number.isFinite(value)
)

export const integer: PrimitiveTarget<number> = primitive(
  "integer",
  (value): value is number => Number.isSafeInteger(value)
)

export const boolean: PrimitiveTarget<boolean> = primitive(
  "boolean",
  (value): value is boolean => typeof value === "boolean"
)

export const nullValue: PrimitiveTarget<null> = primitive("null", (value): value is null => value === null)

export const rawValue: PrimitiveTarget<RawValue> = primitive("raw", isRawValue)

// the loosely typed shapes
export const jsonValue: PrimitiveTarget<Json> = primitive("json", isJson)

export const jsonObject: PrimitiveTarget<JsonObject> = primitive("object", isJsonObject)

export const jsonArray: PrimitiveTarget<JsonArray> = primitive("array", isJsonArray)

export const arrayOf = <A>(item: PrimitiveTarget<A>): PrimitiveTarget<ReadonlyArray<A>> =>
  primitive(
    `Array<${item.name}>`,
    (value): value is ReadonlyArray<A> => Array.isArray(value) && value.every((entry) => item.is(entry))
  )

export const recordOf = <A>(entry: PrimitiveTarget<A>): PrimitiveTarget<Readonly<Record<string, A>>> =>
  primitive(
    `Record<string, ${entry.name}>`,
    (value): value is Readonly<Record<string, A>> =>
      isJsonObject(value) && Object.values(value).every((item) => entry.is(item))
  )

/**
 * Target for a type backed by a raw scalar. The raw scalar is decoded first,
 * then handed to `fromRaw`; None means no case matches.
 */
export const rawRepresentable = <A, R extends RawValue>(
  raw: PrimitiveTarget<R>,
  fromRaw: (raw: R) => Option.Option<A>
): RawRepresentableTarget<A> => ({
  _tag: "RawRepresentable",
  name: `RawRepresentable<${raw.name}>`,
  raw,
  fromRaw: (value) => raw.is(value) ? fromRaw(value) : Option.none()
})

export const literals = <L extends RawValue>(...values: ReadonlyArray<L>): RawRepresentableTarget<L> => {
  const isMember = (value: RawValue): value is L => values.some((candidate) => candidate === value)
  return rawRepresentable<L, RawValue>(rawValue, (value) => isMember(value) ? Option.some(value) : Option.none())
}

export type EnumLike = { readonly [key: string]: string | number; readonly [index: number]: string }

// numeric enums carry a number index for their reverse mapping; members are the named keys
export type EnumValue<E extends EnumLike> = E[Exclude<keyof E, number>]

/**
 * Target for a TypeScript `enum`. Reverse mappings of numeric enums are not members.
 */
export const enums = <E extends EnumLike>(enumObject: E): RawRepresentableTarget<EnumValue<E>> => {
  const members = new Set<unknown>(
    Object.values(enumObject).filter((value) => typeof value === "number" || typeof enumObject[value] !== "number")
  )
  const isMember = (value: unknown): value is EnumValue<E> => members.has(value)
  return rawRepresentable<EnumValue<E>, RawValue>(
    rawValue,
    (value) => isMember(value) ? Option.some(value) : Option.none()
  )
}

export const decodable = <A>(target: Decodable<A>, name = "Decodable"): DecodableTarget<A> => ({
  _tag: "Decodable",
  name,
  decodable: target
})

export const transform = <A>(scalar: ScalarTransform<A>): TransformTarget<A> => ({
  _tag: "Transform",
  name: scalar.name,
  transform: scalar
})

export const date: TransformTarget<Date> = transform(iso8601Date)

export const url: TransformTarget<UrlReference> = transform(urlReference)
