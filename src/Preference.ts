import * as HeaderTokenizer from "./HeaderTokenizer.ts"

/**
 * Fields shared by every parsed entry of an Accept-* header.
 * `order` is the position among the entries that survived parsing.
 */
export interface Preference {
  readonly quality: number
  readonly order: number
}

export function isAcceptable(preference: Preference): boolean {
  return preference.quality > 0
}

export function compare(a: Preference, b: Preference): number {
  return b.quality - a.quality || a.order - b.order
}

const decimal = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Parses a q-value. Returns undefined unless the value is a decimal
 * number; otherwise the number clamped into [0, 1].
 */
export function parseQuality(value: string): number | undefined {
  const trimmed = value.trim()
  if (!decimal.test(trimmed)) return undefined

  const q = Number(trimmed)
  if (!Number.isFinite(q)) return undefined

  return Math.min(Math.max(q, 0), 1)
}

/**
 * Quality of a `;`-separated parameter list where only `q` matters.
 * The first `q` wins; a malformed one rejects the entry.
 */
export function qualityOf(params: string): number | undefined {
  for (const piece of params.split(";")) {
    const [key, value] = HeaderTokenizer.splitKeyValuePair(piece.trim())
    if (key.trim().toLowerCase() === "q") {
      return parseQuality(value)
    }
  }
  return 1
}

export function isWhitespace(char: string): boolean {
  return char.trim() === "" && char !== ""
}

/**
 * Index of the first character at or after `start` that is whitespace
 * or one of `stops`.
 */
export function scanToken(input: string, start: number, stops: string): number {
  let i = start
  while (i < input.length && !isWhitespace(input[i]) && !stops.includes(input[i])) {
    i++
  }
  return i
}

export function skipWhitespace(input: string, start: number): number {
  let i = start
  while (i < input.length && isWhitespace(input[i])) {
    i++
  }
  return i
}

/**
 * Parses what follows the value of a segment: optional whitespace, then
 * either the end of input or `;` and the parameter list.
 * Returns the raw parameter list ("" when there is none), or undefined
 * when anything else follows.
 */
export function scanParameters(input: string, start: number): string | undefined {
  const i = skipWhitespace(input, start)
  if (i === input.length) return ""
  if (input[i] !== ";") return undefined
  return input.slice(i + 1)
}

/**
 * Parses every comma-separated segment with `parse`, keeping the ones that
 * survive. Each survivor gets the next dense order.
 */
export function parseAll<E extends Preference>(
  segments: ReadonlyArray<string>,
  parse: (segment: string, order: number) => E | undefined,
): Array<E> {
  const entries: Array<E> = []
  for (const segment of segments) {
    const entry = parse(segment.trim(), entries.length)
    if (entry !== undefined) {
      entries.push(entry)
    }
  }
  return entries
}
