import type * as Headers from "@effect/platform/Headers"
import * as ContentNegotiation from "./ContentNegotiation.ts"
import * as HeaderSource from "./HeaderSource.ts"
import type * as Preference from "./Preference.ts"

/**
 * Negotiates against the headers of one request.
 *
 * The plural accessors return every acceptable value in preference order;
 * called without arguments they list what the client asked for. The
 * singular accessors return the first of those, or "" when there is none.
 */
export interface Negotiator {
  readonly source: HeaderSource.HeaderSource
  readonly charset: (...available: ReadonlyArray<string>) => string
  readonly charsets: (...available: ReadonlyArray<string>) => Array<string>
  readonly encoding: (...available: ReadonlyArray<string>) => string
  readonly encodings: (...available: ReadonlyArray<string>) => Array<string>
  readonly language: (...available: ReadonlyArray<string>) => string
  readonly languages: (...available: ReadonlyArray<string>) => Array<string>
  readonly mediaType: (...available: ReadonlyArray<string>) => string
  readonly mediaTypes: (...available: ReadonlyArray<string>) => Array<string>
}

export function accept(
  source: HeaderSource.HeaderSource,
  name: ContentNegotiation.DimensionName,
): string {
  const header = ContentNegotiation.headers[name]
  return HeaderSource.join(source, header.name) ?? header.fallback
}

export function mostPreferred(values: ReadonlyArray<string>): string {
  return values.length > 0 ? values[0] : ""
}

export function make(source: HeaderSource.HeaderSource): Negotiator {
  const negotiate = <E extends Preference.Preference>(
    dimension: ContentNegotiation.Dimension<E>,
    name: ContentNegotiation.DimensionName,
  ) =>
  (...available: ReadonlyArray<string>): Array<string> =>
    ContentNegotiation.preferred(dimension, accept(source, name), available)

  const charsets = negotiate(ContentNegotiation.dimensions.charset, "charset")
  const encodings = negotiate(ContentNegotiation.dimensions.encoding, "encoding")
  const languages = negotiate(ContentNegotiation.dimensions.language, "language")
  const mediaTypes = negotiate(ContentNegotiation.dimensions.mediaType, "mediaType")

  return {
    source,
    charset: (...available) => mostPreferred(charsets(...available)),
    charsets,
    encoding: (...available) => mostPreferred(encodings(...available)),
    encodings,
    language: (...available) => mostPreferred(languages(...available)),
    languages,
    mediaType: (...available) => mostPreferred(mediaTypes(...available)),
    mediaTypes,
  }
}

export function fromHeaders(headers: Headers.Headers): Negotiator {
  return make(HeaderSource.fromHeaders(headers))
}

export function fromRecord(record: HeaderSource.HeaderRecord): Negotiator {
  return make(HeaderSource.fromRecord(record))
}
