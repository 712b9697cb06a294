import * as Preference from "./Preference.ts"
import type * as Specificity from "./Specificity.ts"

export interface Encoding extends Preference.Preference {
  readonly encoding: string
}

export const identity = "identity"

export function parse(segment: string, order: number): Encoding | undefined {
  const end = Preference.scanToken(segment, 0, ";")
  if (end === 0) return undefined

  const params = Preference.scanParameters(segment, end)
  if (params === undefined) return undefined

  const quality = params === "" ? 1 : Preference.qualityOf(params)
  if (quality === undefined) return undefined

  return { encoding: segment.slice(0, end), quality, order }
}

/**
 * `identity` is acceptable unless the header says otherwise, so it is
 * appended when no entry (`*` included) covers it. It takes the lowest
 * quality seen in the header.
 */
export function parseHeader(accept: string): Array<Encoding> {
  const entries = Preference.parseAll(accept.split(","), parse)

  const coversIdentity = entries.some((entry) => specify(identity, entry, 0) !== undefined)
  if (coversIdentity) {
    return entries
  }

  const quality = entries.reduce((min, entry) => Math.min(min, entry.quality), 1)
  return [...entries, { encoding: identity, quality, order: entries.length }]
}

export function specify(
  encoding: string,
  entry: Encoding,
  order: number,
): Specificity.Specificity | undefined {
  let s = 0
  if (entry.encoding.toLowerCase() === encoding.toLowerCase()) {
    s |= 1
  } else if (entry.encoding !== "*") {
    return undefined
  }
  return { order, entryOrder: entry.order, quality: entry.quality, specificity: s }
}

export function format(entry: Encoding): string {
  return entry.encoding
}
