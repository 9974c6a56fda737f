import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as S from "effect/Schema"

import type { CodecConfig, CodecOptions, FileOptions } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError } from "../core/errors.js"

// CHANGE: decode codec options from JSON text with schema validation
// WHY: keep boundary data typed and reject invalid options early
// QUOTE(TZ): "options read from JSON are validated before use"
// REF: req-options-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(opts) → opts fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileOptions, AppError>
// INVARIANT: absent text yields the defaults
// COMPLEXITY: O(n)

const RawOptionsSchema = S.partial(
  S.Struct({
    strictArrays: S.Boolean,
    logDiscarded: S.Boolean
  })
)

const OptionsSchema = S.parseJson(RawOptionsSchema)

export const decodeFileOptions = (raw: string): Effect.Effect<FileOptions, AppError> =>
  pipe(
    S.decodeUnknown(OptionsSchema)(raw),
    Effect.map((options) => ({
      ...(options.strictArrays === undefined ? {} : { strictArrays: options.strictArrays }),
      ...(options.logDiscarded === undefined ? {} : { logDiscarded: options.logDiscarded })
    })),
    Effect.mapError((error) => configError(ParseResult.TreeFormatter.formatErrorSync(error)))
  )

export const loadConfig = (
  options: CodecOptions,
  raw: string | undefined
): Effect.Effect<CodecConfig, AppError> =>
  Effect.gen(function*(_) {
    if (raw === undefined) {
      return resolveConfig(options, undefined)
    }
    const fileOptions = yield* _(decodeFileOptions(raw))
    yield* _(Effect.logDebug("codec options loaded").pipe(Effect.annotateLogs({ ...fileOptions })))
    return resolveConfig(options, fileOptions)
  })
