import * as Option from "effect/Option"

// CHANGE: provide the fixed ISO 8601 UTC date pattern used on the wire
// WHY: dates travel as strings and must round-trip at second precision
// QUOTE(TZ): "fixed-format (yyyy-MM-ddTHH:mm:ssZ), POSIX-locale, UTC-timezone parser"
// REF: req-date-format-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: ms(d) = 0 ∧ 0 ≤ year(d) ≤ 9999 → parse(format(d)) = d
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the formatter is created once and never mutated
// COMPLEXITY: O(1)/O(1)

export interface DateFormatter {
  readonly parse: (text: string) => Option.Option<Date>
  readonly format: (date: Date) => Option.Option<string>
}

const wirePattern = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/u

const pad = (value: number, width: number): string => String(value).padStart(width, "0")

const groupNumber = (match: RegExpExecArray, index: number): number => Number(match[index] ?? Number.NaN)

interface DateFields {
  readonly year: number
  readonly month: number
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
}

const readFields = (match: RegExpExecArray): DateFields => ({
  year: groupNumber(match, 1),
  month: groupNumber(match, 2),
  day: groupNumber(match, 3),
  hour: groupNumber(match, 4),
  minute: groupNumber(match, 5),
  second: groupNumber(match, 6)
})

// setUTCFullYear keeps years below 100 literal, unlike Date.UTC
const buildDate = (fields: DateFields): Date => {
  const date = new Date(0)
  date.setUTCFullYear(fields.year, fields.month - 1, fields.day)
  date.setUTCHours(fields.hour, fields.minute, fields.second, 0)
  return date
}

const sameFields = (date: Date, fields: DateFields): boolean =>
  date.getUTCFullYear() === fields.year &&
  date.getUTCMonth() === fields.month - 1 &&
  date.getUTCDate() === fields.day &&
  date.getUTCHours() === fields.hour &&
  date.getUTCMinutes() === fields.minute &&
  date.getUTCSeconds() === fields.second

const parse = (text: string): Option.Option<Date> => {
  const match = wirePattern.exec(text)
  if (match === null) {
    return Option.none()
  }
  const fields = readFields(match)
  const date = buildDate(fields)
  // out-of-range fields roll over (Feb 30 → Mar 2); reject them
  return sameFields(date, fields) ? Option.some(date) : Option.none()
}

const format = (date: Date): Option.Option<string> => {
  if (Number.isNaN(date.getTime())) {
    return Option.none()
  }
  const year = date.getUTCFullYear()
  if (year < 0 || year > 9999) {
    return Option.none()
  }
  return Option.some(
    `${pad(year, 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}` +
      `T${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}Z`
  )
}

/**
 * Process-wide formatter for `yyyy-MM-dd'T'HH:mm:ss'Z'` in UTC.
 *
 * Formatting truncates sub-second precision; parsing rejects every other shape,
 * including offsets and fractional seconds.
 */
export const iso8601UTC: DateFormatter = Object.freeze({
  parse,
  format
})
