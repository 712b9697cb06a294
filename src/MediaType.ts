import * as HeaderTokenizer from "./HeaderTokenizer.ts"
import * as Preference from "./Preference.ts"
import type * as Specificity from "./Specificity.ts"

export interface MediaType extends Preference.Preference {
  readonly type: string
  readonly subtype: string
  /**
   * Parameters other than `q`, keyed by lower-cased name.
   * Quoted values are unquoted.
   */
  readonly parameters: ReadonlyMap<string, string>
}

function unquote(value: string): string {
  if (value.length > 0 && value[0] === "\"" && value[value.length - 1] === "\"") {
    return value.slice(1, Math.max(value.length - 1, 1))
  }
  return value
}

/**
 * Reads parameters up to the first `q`; whatever follows it are
 * accept-extensions and is ignored.
 */
function parseParameters(
  params: string,
): { parameters: Map<string, string>; quality: number } | undefined {
  const parameters = new Map<string, string>()

  for (const piece of HeaderTokenizer.splitParameters(params)) {
    if (piece === "") continue

    const [rawKey, rawValue] = HeaderTokenizer.splitKeyValuePair(piece)
    const key = rawKey.trim().toLowerCase()
    const value = unquote(rawValue.trim())

    if (key === "q") {
      const quality = Preference.parseQuality(value)
      if (quality === undefined) return undefined
      return { parameters, quality }
    }

    parameters.set(key, value)
  }

  return { parameters, quality: 1 }
}

export function parse(segment: string, order: number): MediaType | undefined {
  const typeEnd = Preference.scanToken(segment, 0, "/;")
  if (typeEnd === 0 || segment[typeEnd] !== "/") return undefined

  const subtypeEnd = Preference.scanToken(segment, typeEnd + 1, ";")
  if (subtypeEnd === typeEnd + 1) return undefined

  const params = Preference.scanParameters(segment, subtypeEnd)
  if (params === undefined) return undefined

  const parsed = params === ""
    ? { parameters: new Map<string, string>(), quality: 1 }
    : parseParameters(params)
  if (parsed === undefined) return undefined

  return {
    type: segment.slice(0, typeEnd),
    subtype: segment.slice(typeEnd + 1, subtypeEnd),
    parameters: parsed.parameters,
    quality: parsed.quality,
    order,
  }
}

export function parseHeader(accept: string): Array<MediaType> {
  return Preference.parseAll(HeaderTokenizer.splitSegments(accept), parse)
}

/**
 * Type match adds 4, subtype match adds 2 and satisfied parameters add 1.
 * A `*` on the entry side matches without adding anything.
 */
export function specify(
  mediaType: string,
  entry: MediaType,
  order: number,
): Specificity.Specificity | undefined {
  const candidate = parse(mediaType.trim(), order)
  if (candidate === undefined) return undefined

  let s = 0

  if (entry.type.toLowerCase() === candidate.type.toLowerCase()) {
    s |= 4
  } else if (entry.type !== "*") {
    return undefined
  }

  if (entry.subtype.toLowerCase() === candidate.subtype.toLowerCase()) {
    s |= 2
  } else if (entry.subtype !== "*") {
    return undefined
  }

  if (entry.parameters.size > 0) {
    for (const [key, expected] of entry.parameters) {
      const actual = candidate.parameters.get(key) ?? ""
      if (expected !== "*" && expected.toLowerCase() !== actual.toLowerCase()) {
        return undefined
      }
    }
    s |= 1
  }

  return { order, entryOrder: entry.order, quality: entry.quality, specificity: s }
}

export function format(entry: MediaType): string {
  return `${entry.type}/${entry.subtype}`
}
