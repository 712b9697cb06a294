import * as t from "vitest"
import * as ContentNegotiation from "./ContentNegotiation.ts"
import * as MediaType from "./MediaType.ts"

const cases: Array<[accept: string, available: Array<string> | undefined, expected: Array<string>]> = [
  ["text/html", undefined, ["text/html"]],
  ["text/html, text/*", undefined, ["text/html", "text/*"]],
  ["text/html, text/plain;q=0.8", undefined, ["text/html", "text/plain"]],
  ["text/html, application/*;q=0.2, image/jpeg;q=0.8", undefined, ["text/html", "image/jpeg", "application/*"]],
  ["text/html", ["text/*"], []],
  ["text/*, image/*", ["text/*"], ["text/*"]],
  ["text/html, image/jpeg;q=0.8", ["*/*"], []],
  ["text/html;q=0.6, image/jpeg;q=0.8", ["*/*"], []],
  [
    "text/*;q=0.1, image/*;q=0.1, application/*;q=0.2",
    ["text/*", "image/*", "application/*"],
    ["application/*", "text/*", "image/*"],
  ],
  [
    "text/*;q=0.1, image/*;q=0.1, application/*;q=0.2",
    ["text/*", "image/*", "application/json"],
    ["application/json", "text/*", "image/*"],
  ],
  ["text/*, image/*;q=0.8, application/*;q=0.2", ["text/plain", "application/*"], ["text/plain", "application/*"]],
  ["text/*, image/*;q=0.8, application/*;q=0.2", ["text/plain", "application/json"], ["text/plain", "application/json"]],
  ["", ["text/*", "image/*"], []],
  ["text/*, image/*;q=0.8, application/json;q=0.2", [], ["text/*", "image/*", "application/json"]],
  ["text/*, image/*;q=0.1, application/json;q=0.2", [], ["text/*", "application/json", "image/*"]],
  ["*/*", [], ["*/*"]],
  ["*/*", ["text/html"], ["text/html"]],
  ["*/*, text/*", [], ["*/*", "text/*"]],
  ["*/*;q=0.5, text/*", [], ["text/*", "*/*"]],
  ["*/*, text/*;q=x", [], ["*/*"]],
  ["*/*, text/*;q=x", ["text/html"], ["text/html"]],
]

t.describe("ContentNegotiation.media", () => {
  t.it.each(cases)("%j offering %j", (accept, available, expected) => {
    t.expect(ContentNegotiation.media(accept, available)).toEqual(expected)
  })

  t.it("lists the less specific match first at equal quality", () => {
    t
      .expect(ContentNegotiation.media("text/*, image/*", ["text/html", "image/*"]))
      .toEqual(["text/html", "image/*"])
    t
      .expect(ContentNegotiation.media("text/*, application/json", ["application/json", "text/plain"]))
      .toEqual(["text/plain", "application/json"])
  })

  t.it("lists header entries without their parameters", () => {
    t
      .expect(ContentNegotiation.media("text/html;level=1, text/plain;charset=utf-8;q=0.5"))
      .toEqual(["text/html", "text/plain"])
  })

  t.it("matches types case-insensitively and returns the offered spelling", () => {
    t
      .expect(ContentNegotiation.media("TEXT/HTML", ["text/html"]))
      .toEqual(["text/html"])
  })

  t.it("requires every parameter of the entry", () => {
    t
      .expect(ContentNegotiation.media("text/html;level=1;charset=utf-8", [
        "text/html;level=1",
        "text/html;charset=UTF-8;level=1",
      ]))
      .toEqual(["text/html;charset=UTF-8;level=1"])
  })

  t.it("treats parameter names like constructor as plain names", () => {
    t.expect(ContentNegotiation.media("text/html;constructor=x", ["text/html"])).toEqual([])
    t
      .expect(ContentNegotiation.media("text/html;constructor=x", ["text/html;constructor=X"]))
      .toEqual(["text/html;constructor=X"])
    t
      .expect(ContentNegotiation.media("text/html", ["text/html;toString=1"]))
      .toEqual(["text/html;toString=1"])
  })

  t.it("keeps a __proto__ parameter as a constraint", () => {
    t.expect(ContentNegotiation.media("text/html;__proto__=x", ["text/html"])).toEqual([])
    t
      .expect(ContentNegotiation.media("text/html;__proto__=x", ["text/html;__proto__=x"]))
      .toEqual(["text/html;__proto__=x"])
  })
})

t.describe("MediaType.parseHeader", () => {
  t.it("parses a single type", () => {
    t
      .expect(MediaType.parseHeader("text/html"))
      .toEqual([{ type: "text", subtype: "html", parameters: new Map(), quality: 1, order: 0 }])
  })

  t.it("parses entries in header order", () => {
    t
      .expect(MediaType.parseHeader("text/html, application/*;q=0.2, image/jpeg;q=0.8"))
      .toEqual([
        { type: "text", subtype: "html", parameters: new Map(), quality: 1, order: 0 },
        { type: "application", subtype: "*", parameters: new Map(), quality: 0.2, order: 1 },
        { type: "image", subtype: "jpeg", parameters: new Map(), quality: 0.8, order: 2 },
      ])
  })

  t.it("drops a header that is one quoted string", () => {
    t
      .expect(MediaType.parseHeader("\"text/html, application/*;q=0.2, image/jpeg;q=0.8\""))
      .toEqual([])
  })

  t.it("gives survivors dense orders", () => {
    t
      .expect(MediaType.parseHeader("text, text/html;q=x, image/png"))
      .toEqual([{ type: "image", subtype: "png", parameters: new Map(), quality: 1, order: 0 }])
  })
})

t.describe("MediaType.parse", () => {
  const parsed: Array<[segment: string, parameters: Record<string, string>, quality: number]> = [
    ["text/html", {}, 1],
    ["text/html;q=0.8", {}, 0.8],
    ["text/*", {}, 1],
    ["text/*;q=.8", {}, 0.8],
    ["*/*;q=0.8", {}, 0.8],
    ["text/*;p=0.8", { p: "0.8" }, 1],
    ["text/*;p=\"", { p: "" }, 1],
    ["text/*;p=\"0.8", { p: "\"0.8" }, 1],
    ["text/*;p=\"0.8\"", { p: "0.8" }, 1],
    ["text/*;q=\"0.8\"", {}, 0.8],
    ["text/html ; q=0.8", {}, 0.8],
  ]

  t.it.each(parsed)("%j", (segment, parameters, quality) => {
    const result = MediaType.parse(segment, 3)
    t.expect(result?.parameters).toEqual(new Map(Object.entries(parameters)))
    t.expect(result?.quality).toBe(quality)
    t.expect(result?.order).toBe(3)
  })

  t.it("splits type and subtype", () => {
    t
      .expect(MediaType.parse("application/vnd.api+json", 0))
      .toEqual({ type: "application", subtype: "vnd.api+json", parameters: new Map(), quality: 1, order: 0 })
  })

  t.it("lower-cases parameter names but not values", () => {
    t
      .expect(MediaType.parse("text/plain;Charset=UTF-8", 0))
      .toEqual({ type: "text", subtype: "plain", parameters: new Map([["charset", "UTF-8"]]), quality: 1, order: 0 })
  })

  t.it("ignores parameters after the quality", () => {
    t
      .expect(MediaType.parse("text/html;level=1;q=0.5;ext=1", 0))
      .toEqual({ type: "text", subtype: "html", parameters: new Map([["level", "1"]]), quality: 0.5, order: 0 })
  })

  t.it("keeps semicolons inside quoted values", () => {
    t
      .expect(MediaType.parse("text/html;foo=\"a;b\";q=0.4", 0))
      .toEqual({ type: "text", subtype: "html", parameters: new Map([["foo", "a;b"]]), quality: 0.4, order: 0 })
  })

  t.it("stores any parameter name", () => {
    t
      .expect(MediaType.parse("text/html;__proto__=x;constructor=y", 0)?.parameters)
      .toEqual(new Map([["__proto__", "x"], ["constructor", "y"]]))
  })

  t.it("rejects malformed segments", () => {
    t.expect(MediaType.parse("text/html;q=x", 11)).toBeUndefined()
    t.expect(MediaType.parse("text", 0)).toBeUndefined()
    t.expect(MediaType.parse("text/", 0)).toBeUndefined()
    t.expect(MediaType.parse("/html", 0)).toBeUndefined()
    t.expect(MediaType.parse("text/html extra", 0)).toBeUndefined()
    t.expect(MediaType.parse("", 0)).toBeUndefined()
  })
})

t.describe("MediaType.specify", () => {
  const entry = (
    type: string,
    subtype: string,
    quality = 1,
    order = 0,
    parameters: Record<string, string> = {},
  ): MediaType.MediaType => ({ type, subtype, parameters: new Map(Object.entries(parameters)), quality, order })

  t.it("scores type and subtype matches", () => {
    t
      .expect(MediaType.specify("text/html", entry("text", "html"), 0))
      .toEqual({ order: 0, entryOrder: 0, quality: 1, specificity: 6 })
    t
      .expect(MediaType.specify("text/html;q=0.8", entry("text", "html", 0.8, 1), 1))
      .toEqual({ order: 1, entryOrder: 1, quality: 0.8, specificity: 6 })
    t
      .expect(MediaType.specify("text/*", entry("text", "*", 1, 2), 2))
      .toEqual({ order: 2, entryOrder: 2, quality: 1, specificity: 6 })
    t
      .expect(MediaType.specify("text/html;p=\"0.8\"", entry("text", "html", 0.8, 6), 6))
      .toEqual({ order: 6, entryOrder: 6, quality: 0.8, specificity: 6 })
  })

  t.it("matches wildcards on the entry side only", () => {
    t
      .expect(MediaType.specify("text/html", entry("text", "*", 1, 8), 8))
      .toEqual({ order: 8, entryOrder: 8, quality: 1, specificity: 4 })
    t
      .expect(MediaType.specify("text/*", entry("*", "*", 1, 11), 11))
      .toEqual({ order: 11, entryOrder: 11, quality: 1, specificity: 2 })
    t.expect(MediaType.specify("text/*", entry("text", "html", 1, 9), 9)).toBeUndefined()
    t.expect(MediaType.specify("text/*", entry("image", "*", 1, 10), 10)).toBeUndefined()
  })

  t.it("scores satisfied parameters 1", () => {
    t
      .expect(MediaType.specify("text/html;level=1", entry("text", "html", 1, 0, { level: "1" }), 0))
      .toEqual({ order: 0, entryOrder: 0, quality: 1, specificity: 7 })
    t
      .expect(MediaType.specify("text/html", entry("*", "*", 1, 14, { foo: "*" }), 14))
      .toEqual({ order: 14, entryOrder: 14, quality: 1, specificity: 1 })
  })

  t.it("does not match missing or different parameters", () => {
    t.expect(MediaType.specify("text/html", entry("*", "*", 1, 13, { foo: "bar" }), 13)).toBeUndefined()
    t
      .expect(MediaType.specify("text/html;level=2", entry("text", "html", 1, 0, { level: "1" }), 0))
      .toBeUndefined()
  })

  t.it("does not match an unparsable value", () => {
    t.expect(MediaType.specify("", entry("*", "*", 1, 12), 12)).toBeUndefined()
  })
})

t.describe("MediaType.format", () => {
  t.it("drops the parameters", () => {
    t.expect(MediaType.format(entry("text", "html", { level: "1" }))).toBe("text/html")
  })

  function entry(type: string, subtype: string, parameters: Record<string, string>): MediaType.MediaType {
    return { type, subtype, parameters: new Map(Object.entries(parameters)), quality: 1, order: 0 }
  }
})
