import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import { decode, recoverMissing } from "../../src/core/decode.js"
import { invalid, missing } from "../../src/core/errors.js"
import type { JsonObject } from "../../src/core/json.js"
import {
  arrayOf,
  boolean,
  date,
  decodable,
  enums,
  integer,
  jsonArray,
  jsonObject,
  jsonValue,
  literals,
  nullValue,
  number,
  rawRepresentable,
  recordOf,
  string,
  url
} from "../../src/core/target.js"
import { leftOf, rightOf } from "../support/either.js"
import { Model, RootModel, sample, Status, Trunk } from "../support/models.js"

describe("decode primitives", () => {
  it.effect("returns values that already have the requested shape", () =>
    Effect.sync(() => {
      expect(rightOf(decode("my_string", sample, string))).toBe("this is a string")
      expect(rightOf(decode("my_number", sample, number))).toBe(123.045)
      expect(rightOf(decode("my_integer", sample, integer))).toBe(99)
      expect(rightOf(decode("my_boolean", sample, boolean))).toBe(true)
      expect(rightOf(decode("my_null", sample, nullValue))).toBe(null)
    }))

  it.effect("returns containers unchanged", () =>
    Effect.sync(() => {
      expect(rightOf(decode("my_array", sample, arrayOf(string)))).toBe(sample["my_array"])
      expect(rightOf(decode("my_dictionary", sample, recordOf(string)))).toEqual({ one: "a", two: "b", three: "c" })
      expect(rightOf(decode("my_mixed_array", sample, jsonArray))).toEqual([1, "one", true])
      expect(rightOf(decode("my_model", sample, jsonObject))).toEqual({ id: 1, type: "a model" })
    }))

  it.effect("accepts any JSON value, null included, for the loosely typed target", () =>
    Effect.sync(() => {
      expect(rightOf(decode("my_mixed_array", sample, jsonValue))).toBe(sample["my_mixed_array"])
      expect(rightOf(decode("my_null", sample, jsonValue))).toBe(null)
      expect(leftOf(decode("absent", sample, jsonValue))).toEqual(missing("absent"))
    }))

  it.effect("reports a present value of the wrong shape as invalid", () =>
    Effect.sync(() => {
      expect(leftOf(decode("my_number", sample, string))).toEqual(invalid("my_number"))
      expect(leftOf(decode("my_number", sample, integer))).toEqual(invalid("my_number"))
      expect(leftOf(decode("my_mixed_array", sample, arrayOf(string)))).toEqual(invalid("my_mixed_array"))
      expect(leftOf(decode("my_null", sample, string))).toEqual(invalid("my_null"))
      expect(leftOf(decode("my_array", sample, jsonObject))).toEqual(invalid("my_array"))
    }))
})

describe("decode missing keys", () => {
  it.effect("reports an absent key as missing for every kind of target", () =>
    Effect.sync(() => {
      expect(leftOf(decode("absent", sample, string))).toEqual(missing("absent"))
      expect(leftOf(decode("absent", sample, enums(Status)))).toEqual(missing("absent"))
      expect(leftOf(decode("absent", sample, decodable(Model)))).toEqual(missing("absent"))
      expect(leftOf(decode("absent", sample, date))).toEqual(missing("absent"))
    }))

  it.effect("ignores keys inherited from the prototype", () =>
    Effect.sync(() => {
      expect(leftOf(decode("toString", {}, string))).toEqual(missing("toString"))
    }))

  it.effect("recovers missing fields as None and keeps invalid ones", () =>
    Effect.sync(() => {
      expect(Option.isNone(rightOf(recoverMissing(decode("absent", sample, string))))).toBe(true)
      expect(Option.getOrNull(rightOf(recoverMissing(decode("my_string", sample, string))))).toBe(
        "this is a string"
      )
      expect(leftOf(recoverMissing(decode("my_number", sample, string)))).toEqual(invalid("my_number"))
    }))
})

describe("decode raw-representable values", () => {
  it.effect("maps raw values onto enum members", () =>
    Effect.sync(() => {
      expect(rightOf(decode("my_status", sample, enums(Status)))).toBe(Status.active)
    }))

  it.effect("rejects raw values without a matching case", () =>
    Effect.sync(() => {
      expect(leftOf(decode("status", { status: 99 }, enums(Status)))).toEqual(invalid("status"))
      expect(leftOf(decode("status", { status: "active" }, enums(Status)))).toEqual(invalid("status"))
      expect(leftOf(decode("status", { status: [2] }, enums(Status)))).toEqual(invalid("status"))
    }))

  it.effect("supports literal unions and custom raw constructors", () =>
    Effect.sync(() => {
      const size = literals("small", "large")
      expect(rightOf(decode("size", { size: "large" }, size))).toBe("large")
      expect(leftOf(decode("size", { size: "medium" }, size))).toEqual(invalid("size"))

      const percent = rawRepresentable(integer, (raw) => raw >= 0 && raw <= 100 ? Option.some(raw / 100) : Option.none())
      expect(rightOf(decode("ratio", { ratio: 25 }, percent))).toBe(0.25)
      expect(leftOf(decode("ratio", { ratio: 101 }, percent))).toEqual(invalid("ratio"))
      expect(leftOf(decode("ratio", { ratio: 2.5 }, percent))).toEqual(invalid("ratio"))
    }))
})

describe("decode nested decodables", () => {
  it.effect("constructs nested models", () =>
    Effect.sync(() => {
      const root = rightOf(decode("my_root_model", sample, decodable(RootModel)))
      expect(root).toEqual(new RootModel(true, new Model(1, "a nested model")))
    }))

  it.effect("prefixes child failures with the field path", () =>
    Effect.sync(() => {
      expect(leftOf(decode("my_malformed_root_model", sample, decodable(RootModel)))).toEqual(
        invalid("my_malformed_root_model.model.type")
      )
    }))

  it.effect("builds the full dotted path through several levels", () =>
    Effect.sync(() => {
      const bad: JsonObject = { a: { b: { c: "bad" } } }
      expect(leftOf(Trunk.fromJson(bad))).toEqual(invalid("a.b.c"))
      expect(leftOf(Trunk.fromJson({ a: { b: {} } }))).toEqual(missing("a.b.c"))
      expect(leftOf(Trunk.fromJson({ a: { b: 5 } }))).toEqual(invalid("a.b"))
      expect(leftOf(decode("root", { root: bad }, decodable(Trunk)))).toEqual(invalid("root.a.b.c"))
    }))
})

describe("decode custom scalars", () => {
  it.effect("parses ISO 8601 UTC dates", () =>
    Effect.sync(() => {
      expect(rightOf(decode("my_date", sample, date)).getTime()).toBe(Date.UTC(2017, 4, 16, 11, 44, 0))
    }))

  it.effect("rejects dates in any other shape", () =>
    Effect.sync(() => {
      expect(leftOf(decode("d", { d: "2017-05-16T11:44:00" }, date))).toEqual(invalid("d"))
      expect(leftOf(decode("d", { d: 1494935040 }, date))).toEqual(invalid("d"))
    }))

  it.effect("parses absolute URLs", () =>
    Effect.sync(() => {
      const reference = rightOf(decode("my_url", sample, url))
      expect(reference.reference).toBe("https://example.com/us")
      expect(Option.getOrNull(Option.map(reference.absolute, (parsed) => parsed.href))).toBe("https://example.com/us")
    }))

  it.effect("accepts relative references and keeps them as written", () =>
    Effect.sync(() => {
      const path = rightOf(decode("u", { u: "/recipes/1" }, url))
      expect(path.reference).toBe("/recipes/1")
      expect(Option.isNone(path.absolute)).toBe(true)
      expect(rightOf(decode("u", { u: "recipes" }, url)).reference).toBe("recipes")
      expect(rightOf(decode("u", { u: "../recipes?page=2#top" }, url)).reference).toBe("../recipes?page=2#top")
    }))

  it.effect("rejects malformed URLs", () =>
    Effect.sync(() => {
      expect(leftOf(decode("u", { u: "not a url" }, url))).toEqual(invalid("u"))
      expect(leftOf(decode("u", { u: "" }, url))).toEqual(invalid("u"))
      expect(leftOf(decode("u", { u: "/recipes/%zz" }, url))).toEqual(invalid("u"))
      expect(leftOf(decode("u", { u: "http://[" }, url))).toEqual(invalid("u"))
    }))
})
