import type { EncodeRule } from "./transforms.js"
import { defaultEncodeRules } from "./transforms.js"

// CHANGE: define codec options, merge rules and defaults
// WHY: explicit options override options read from JSON, which override defaults
// QUOTE(TZ): "explicit options override file options, which override defaults"
// REF: req-config-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(opts, file).k = opts.k ?? file.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the default Date and URL rules are always present, after any custom rule
// COMPLEXITY: O(n)/O(1)

export interface FileOptions {
  readonly strictArrays?: boolean
  readonly logDiscarded?: boolean
}

export interface CodecOptions extends FileOptions {
  readonly encodeRules?: ReadonlyArray<EncodeRule>
}

export interface CodecConfig {
  readonly encodeRules: ReadonlyArray<EncodeRule>
  readonly strictArrays: boolean
  readonly logDiscarded: boolean
}

export const defaultConfig: CodecConfig = {
  encodeRules: defaultEncodeRules,
  strictArrays: false,
  logDiscarded: true
}

// custom rules come first so they can claim values the defaults would handle
const resolveEncodeRules = (options: CodecOptions): ReadonlyArray<EncodeRule> => [
  ...(options.encodeRules ?? []),
  ...defaultEncodeRules
]

/**
 * Resolve the effective config from explicit options, options read from JSON, and defaults.
 *
 * @param options - Options given in code.
 * @param fileOptions - Optional options decoded from JSON text.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(n)
 */
export const resolveConfig = (
  options: CodecOptions,
  fileOptions: FileOptions | undefined
): CodecConfig => ({
  encodeRules: resolveEncodeRules(options),
  strictArrays: options.strictArrays ?? fileOptions?.strictArrays ?? defaultConfig.strictArrays,
  logDiscarded: options.logDiscarded ?? fileOptions?.logDiscarded ?? defaultConfig.logDiscarded
})
