/**
 * RFC 7231 content negotiation over Accept, Accept-Language,
 * Accept-Charset and Accept-Encoding.
 *
 * Every dimension runs the same pipeline: parse the header into entries,
 * score each available value against every entry, keep the acceptable
 * ones and order them. Without available values, the header's own
 * entries are returned in preference order.
 */

import * as Headers from "@effect/platform/Headers"
import * as Option from "effect/Option"
import * as Charset from "./Charset.ts"
import * as Encoding from "./Encoding.ts"
import * as Language from "./Language.ts"
import * as MediaType from "./MediaType.ts"
import * as Preference from "./Preference.ts"
import * as Specificity from "./Specificity.ts"

export interface Dimension<E extends Preference.Preference> {
  readonly parseHeader: (accept: string) => ReadonlyArray<E>
  readonly specify: (
    value: string,
    entry: E,
    order: number,
  ) => Specificity.Specificity | undefined
  readonly format: (entry: E) => string
}

export type DimensionName = "mediaType" | "language" | "charset" | "encoding"

export const dimensions = {
  mediaType: MediaType,
  language: Language,
  charset: Charset,
  encoding: Encoding,
} satisfies {
  mediaType: Dimension<MediaType.MediaType>
  language: Dimension<Language.Language>
  charset: Dimension<Charset.Charset>
  encoding: Dimension<Encoding.Encoding>
}

/**
 * Header names, lower-cased, and the value assumed when the header is
 * missing (RFC 7231 sec 5.3: no header means anything is acceptable).
 */
export const headers: Record<DimensionName, { name: string; fallback: string }> = {
  mediaType: { name: "accept", fallback: "*/*" },
  language: { name: "accept-language", fallback: "*" },
  charset: { name: "accept-charset", fallback: "*" },
  encoding: { name: "accept-encoding", fallback: "*" },
}

function unique(values: ReadonlyArray<string>): Array<string> {
  return values.filter((value, i) => values.indexOf(value) === i)
}

/**
 * An empty `available` list is treated like a missing one.
 * A value is listed once, at its best rank.
 */
export function preferred<E extends Preference.Preference>(
  dimension: Dimension<E>,
  accept: string,
  available?: ReadonlyArray<string>,
): Array<string> {
  const entries = dimension.parseHeader(accept)

  if (available === undefined || available.length === 0) {
    return unique(
      entries
        .filter(Preference.isAcceptable)
        .sort(Preference.compare)
        .map((entry) => dimension.format(entry)),
    )
  }

  const offered = unique(available)

  return offered
    .map((value, i) => Specificity.priority(value, entries, i, dimension.specify))
    .filter(Specificity.isMatch)
    .sort(Specificity.compare)
    .map((spec) => offered[spec.order])
}

export function media(accept: string, available?: ReadonlyArray<string>): Array<string> {
  return preferred(dimensions.mediaType, accept, available)
}

export function language(accept: string, available?: ReadonlyArray<string>): Array<string> {
  return preferred(dimensions.language, accept, available)
}

export function encoding(accept: string, available?: ReadonlyArray<string>): Array<string> {
  return preferred(dimensions.encoding, accept, available)
}

export function charset(accept: string, available?: ReadonlyArray<string>): Array<string> {
  return preferred(dimensions.charset, accept, available)
}

function fromHeaders<E extends Preference.Preference>(
  dimension: Dimension<E>,
  name: DimensionName,
  source: Headers.Headers,
  available?: ReadonlyArray<string>,
): Array<string> {
  const header = headers[name]
  const accept = Option.getOrElse(Headers.get(source, header.name), () => header.fallback)
  return preferred(dimension, accept, available)
}

export function headerMedia(
  source: Headers.Headers,
  available?: ReadonlyArray<string>,
): Array<string> {
  return fromHeaders(dimensions.mediaType, "mediaType", source, available)
}

export function headerLanguage(
  source: Headers.Headers,
  available?: ReadonlyArray<string>,
): Array<string> {
  return fromHeaders(dimensions.language, "language", source, available)
}

export function headerEncoding(
  source: Headers.Headers,
  available?: ReadonlyArray<string>,
): Array<string> {
  return fromHeaders(dimensions.encoding, "encoding", source, available)
}

export function headerCharset(
  source: Headers.Headers,
  available?: ReadonlyArray<string>,
): Array<string> {
  return fromHeaders(dimensions.charset, "charset", source, available)
}
