import * as Effect from "effect/Effect"
import type * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import type { CodecConfig } from "../core/config.js"
import { decodeArray, decodeArrayCollect } from "../core/decode-array.js"
import type { DiscardedElement } from "../core/decode-array.js"
import type { AppError } from "../core/errors.js"
import { jsonParseError, renderDecodingError, shapeError } from "../core/errors.js"
import { makeEncoder } from "../core/encode.js"
import type { Json, JsonObject } from "../core/json.js"
import { isJsonObject } from "../core/json.js"
import type { Decodable } from "../core/target.js"

// CHANGE: connect the pure codec to JSON text
// WHY: callers hold text; the core only sees JSON trees
// QUOTE(TZ): "decodes a JSON array into a typed sequence"
// REF: req-document-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: decodeDocument(t, d) = Right(a) → d.fromJson(JSON.parse(t)) = Right(a)
// PURITY: SHELL
// EFFECT: Effect<A, AppError>
// INVARIANT: every element dropped by relaxed decoding is logged when logDiscarded is set
// COMPLEXITY: O(n)

const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number,
    Schema.String,
    Schema.Array(JsonSchema),
    Schema.Record({ key: Schema.String, value: JsonSchema })
  )
)

const JsonParseSchema = Schema.parseJson(JsonSchema)

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

/**
 * Parse JSON text into a JSON tree.
 *
 * @pure false
 * @effect none beyond failure
 */
export const parseDocument = (raw: string): Effect.Effect<Json, AppError> =>
  pipe(
    Schema.decodeUnknown(JsonParseSchema)(raw),
    Effect.mapError((error) => jsonParseError(ParseResult.TreeFormatter.formatErrorSync(error)))
  )

const parseRootObject = (raw: string): Effect.Effect<JsonObject, AppError> =>
  Effect.gen(function*(_) {
    const json = yield* _(parseDocument(raw))
    if (!isJsonObject(json)) {
      return yield* _(Effect.fail(shapeError("document root must be a JSON object")))
    }
    return json
  })

export const decodeDocument = <A>(
  raw: string,
  decodable: Decodable<A>
): Effect.Effect<A, AppError> =>
  Effect.gen(function*(_) {
    const root = yield* _(parseRootObject(raw))
    return yield* _(fromEither(decodable.fromJson(root)))
  })

const logDiscarded = (key: string, discarded: ReadonlyArray<DiscardedElement>): Effect.Effect<void> =>
  Effect.forEach(
    discarded,
    ({ error, index }) =>
      Effect.logDebug(`dropped ${key}[${index}]: ${renderDecodingError(error)}`).pipe(
        Effect.annotateLogs({ key, index, code: error.code, parameter: error.parameter })
      ),
    { discard: true }
  )

/**
 * Decode the array under `key` of the document root.
 *
 * Strictness follows `config.strictArrays`. In relaxed mode the dropped elements are
 * logged at debug level unless `config.logDiscarded` is off.
 */
export const decodeArrayDocument = <A>(
  raw: string,
  key: string,
  decodable: Decodable<A>,
  config: CodecConfig
): Effect.Effect<ReadonlyArray<A>, AppError> =>
  Effect.gen(function*(_) {
    const root = yield* _(parseRootObject(raw))
    if (config.strictArrays) {
      return yield* _(fromEither(decodeArray(key, root, decodable, true)))
    }
    const relaxed = yield* _(fromEither(decodeArrayCollect(key, root, decodable)))
    if (config.logDiscarded && relaxed.discarded.length > 0) {
      yield* _(logDiscarded(key, relaxed.discarded))
    }
    return relaxed.values
  })

/**
 * Encode a value and serialize the resulting tree.
 *
 * @pure false
 * @invariant never fails: unsupported values serialize as null
 */
export const encodeDocument = (value: unknown, config: CodecConfig): Effect.Effect<string> =>
  Effect.sync(() => JSON.stringify(makeEncoder(config.encodeRules)(value)))
