import * as Preference from "./Preference.ts"
import type * as Specificity from "./Specificity.ts"

/**
 * A language range split at its first `-`.
 * `zh-Hant-TW` has primary `zh` and extension `Hant-TW`.
 */
export interface Language extends Preference.Preference {
  readonly primary: string
  readonly extension: string
  readonly full: string
}

export function parse(segment: string, order: number): Language | undefined {
  const primaryEnd = Preference.scanToken(segment, 0, "-;")
  if (primaryEnd === 0) return undefined

  const primary = segment.slice(0, primaryEnd)
  let extension = ""
  let end = primaryEnd

  if (segment[primaryEnd] === "-") {
    end = Preference.scanToken(segment, primaryEnd + 1, ";")
    if (end === primaryEnd + 1) return undefined
    extension = segment.slice(primaryEnd + 1, end)
  }

  const params = Preference.scanParameters(segment, end)
  if (params === undefined) return undefined

  const quality = params === "" ? 1 : Preference.qualityOf(params)
  if (quality === undefined) return undefined

  return {
    primary,
    extension,
    full: extension === "" ? primary : `${primary}-${extension}`,
    quality,
    order,
  }
}

export function parseHeader(accept: string): Array<Language> {
  return Preference.parseAll(accept.split(","), parse)
}

/**
 * An entry matches the exact tag (4), a tag it is the prefix of (2),
 * or the prefix of the tag (1). `*` matches anything (0).
 */
export function specify(
  language: string,
  entry: Language,
  order: number,
): Specificity.Specificity | undefined {
  const candidate = parse(language.trim(), order)
  if (candidate === undefined) return undefined

  const full = entry.full.toLowerCase()
  const candidateFull = candidate.full.toLowerCase()

  let s = 0
  if (full === candidateFull) {
    s |= 4
  } else if (entry.primary.toLowerCase() === candidateFull) {
    s |= 2
  } else if (full === candidate.primary.toLowerCase()) {
    s |= 1
  } else if (entry.full !== "*") {
    return undefined
  }

  return { order, entryOrder: entry.order, quality: entry.quality, specificity: s }
}

export function format(entry: Language): string {
  return entry.full
}
