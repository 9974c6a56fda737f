import { Match } from "effect"

// CHANGE: unify the error algebra for decoding and the JSON text boundary
// WHY: failures must name the exact field or array slot without a stack trace
// QUOTE(TZ): "a complete breadcrumb from the decode root to the exact failing field or array slot"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: DecodingError.parameter is the path from the decode root to the failing leaf
// COMPLEXITY: O(1)/O(1)

export type DecodingErrorCode = "missing" | "invalid"

export type DecodingError = {
  readonly _tag: "DecodingError"
  readonly code: DecodingErrorCode
  readonly parameter: string
}
export type JsonParseError = { readonly _tag: "JsonParseError"; readonly message: string }
export type ShapeError = { readonly _tag: "ShapeError"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }

export type AppError =
  | DecodingError
  | JsonParseError
  | ShapeError
  | ConfigError

export const decodingError = (code: DecodingErrorCode, parameter: string): DecodingError => ({
  _tag: "DecodingError",
  code,
  parameter
})

export const missing = (parameter: string): DecodingError => decodingError("missing", parameter)

export const invalid = (parameter: string): DecodingError => decodingError("invalid", parameter)

/**
 * Prefix a child error with the key of the object field it was decoded from.
 *
 * @invariant code is preserved
 */
export const nestField = (key: string, error: DecodingError): DecodingError =>
  decodingError(error.code, `${key}.${error.parameter}`)

/**
 * Prefix a child error with the key and source index of the array element it was decoded from.
 *
 * @invariant index refers to the source array position
 */
export const nestIndex = (key: string, index: number, error: DecodingError): DecodingError =>
  decodingError(error.code, `${key}[${index}].${error.parameter}`)

export const jsonParseError = (message: string): JsonParseError => ({
  _tag: "JsonParseError",
  message
})

export const shapeError = (message: string): ShapeError => ({
  _tag: "ShapeError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const renderDecodingError = (error: DecodingError): string =>
  Match.value(error.code).pipe(
    Match.when("missing", () => `missing parameter: ${error.parameter}`),
    Match.when("invalid", () => `invalid parameter: ${error.parameter}`),
    Match.exhaustive
  )

export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("DecodingError", (value) => renderDecodingError(value)),
    Match.tag("JsonParseError", (value) => `malformed JSON: ${value.message}`),
    Match.tag("ShapeError", (value) => value.message),
    Match.tag("ConfigError", (value) => `invalid options: ${value.message}`),
    Match.exhaustive
  )
