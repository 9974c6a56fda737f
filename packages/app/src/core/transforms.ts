import * as Option from "effect/Option"

import { iso8601UTC } from "./date-format.js"

// CHANGE: describe custom scalars that travel through JSON as strings
// WHY: dates and URLs need a parse step on decode and a format step on encode
// QUOTE(TZ): "Custom scalar transform match (date, URL, and any future registered transform)"
// REF: req-transforms-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t, a: t.format(a) = Some(s) → t.parse(s) = Some(a') with a' ≡ a
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: parse never throws; failures are None
// COMPLEXITY: O(n)/O(1) where n = text length

export interface ScalarTransform<A> {
  readonly name: string
  readonly is: (value: unknown) => value is A
  readonly parse: (text: string) => Option.Option<A>
  readonly format: (value: A) => Option.Option<string>
}

/**
 * Maps a runtime value to the representation it should be encoded as.
 * None means the rule does not apply to the value.
 */
export type EncodeRule = (value: unknown) => Option.Option<unknown>

const isDate = (value: unknown): value is Date => value instanceof Date

const isUrl = (value: unknown): value is URL => value instanceof URL

export const iso8601Date: ScalarTransform<Date> = {
  name: "Date",
  is: isDate,
  parse: iso8601UTC.parse,
  format: iso8601UTC.format
}

const parseUrl = Option.liftThrowable((text: string): URL => new URL(text))

// URL instances encode as their normalized `href`.
export const webUrl: ScalarTransform<URL> = {
  name: "URL",
  is: isUrl,
  parse: parseUrl,
  format: (url) => Option.some(url.href)
}

/**
 * A URL reference as it appeared on the wire. Absolute references also carry
 * the parsed `URL`; relative ones (`/recipes/1`, `recipes`) keep only the text.
 */
export interface UrlReference {
  readonly _tag: "UrlReference"
  readonly reference: string
  readonly absolute: Option.Option<URL>
}

// RFC 3986 character set; percent signs must start a two-digit escape.
const referenceCharacters = /^[A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=%]+$/u
const brokenEscape = /%(?![0-9A-Fa-f]{2})/u
const resolutionBase = "http://reference.invalid/"

const resolveRelative = Option.liftThrowable((text: string): URL => new URL(text, resolutionBase))

const isUrlReference = (value: unknown): value is UrlReference =>
  typeof value === "object" && value !== null && "_tag" in value && value._tag === "UrlReference"

const parseReference = (text: string): Option.Option<UrlReference> => {
  if (!referenceCharacters.test(text) || brokenEscape.test(text)) {
    return Option.none()
  }
  const absolute = parseUrl(text)
  if (Option.isNone(absolute) && Option.isNone(resolveRelative(text))) {
    return Option.none()
  }
  const reference: UrlReference = { _tag: "UrlReference", reference: text, absolute }
  return Option.some(reference)
}

export const urlReference: ScalarTransform<UrlReference> = {
  name: "URL",
  is: isUrlReference,
  parse: parseReference,
  format: (value) =>
    Option.some(Option.match(value.absolute, { onNone: () => value.reference, onSome: (url) => url.href }))
}

/**
 * Lift a transform into an encode rule. A value the transform owns but cannot
 * format (an invalid Date) is represented as null.
 */
export const encodeRule = <A>(transform: ScalarTransform<A>): EncodeRule => (value) =>
  transform.is(value)
    ? Option.some(Option.getOrNull(transform.format(value)))
    : Option.none()

export const defaultEncodeRules: ReadonlyArray<EncodeRule> = [
  encodeRule(iso8601Date),
  encodeRule(webUrl),
  encodeRule(urlReference)
]
