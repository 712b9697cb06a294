import * as Preference from "./Preference.ts"
import type * as Specificity from "./Specificity.ts"

export interface Charset extends Preference.Preference {
  readonly charset: string
}

export function parse(segment: string, order: number): Charset | undefined {
  const end = Preference.scanToken(segment, 0, ";")
  if (end === 0) return undefined

  const params = Preference.scanParameters(segment, end)
  if (params === undefined) return undefined

  const quality = params === "" ? 1 : Preference.qualityOf(params)
  if (quality === undefined) return undefined

  return { charset: segment.slice(0, end), quality, order }
}

export function parseHeader(accept: string): Array<Charset> {
  return Preference.parseAll(accept.split(","), parse)
}

export function specify(
  charset: string,
  entry: Charset,
  order: number,
): Specificity.Specificity | undefined {
  let s = 0
  if (entry.charset.toLowerCase() === charset.toLowerCase()) {
    s |= 1
  } else if (entry.charset !== "*") {
    return undefined
  }
  return { order, entryOrder: entry.order, quality: entry.quality, specificity: s }
}

export function format(entry: Charset): string {
  return entry.charset
}
