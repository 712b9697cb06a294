/**
 * Result of matching one available value against one header entry.
 *
 * `order` is the index of the available value, `entryOrder` the order of
 * the entry it matched. `specificity` is a dimension-specific bitmask:
 * the higher, the more exact the match.
 */
export interface Specificity {
  readonly order: number
  readonly entryOrder: number
  readonly quality: number
  readonly specificity: number
}

export function none(order: number): Specificity {
  return { order, entryOrder: -1, quality: 0, specificity: 0 }
}

export function isMatch(spec: Specificity): boolean {
  return spec.entryOrder !== -1 && spec.quality > 0
}

/**
 * Whether `a` describes a better match for the same available value
 * than `b`: more specific, then higher quality, then an earlier entry.
 */
export function isBetter(a: Specificity, b: Specificity): boolean {
  if (b.entryOrder === -1) return true
  if (a.specificity !== b.specificity) return a.specificity > b.specificity
  if (a.quality !== b.quality) return a.quality > b.quality
  return a.entryOrder < b.entryOrder
}

/**
 * Best match of one available value among all entries.
 */
export function priority<E>(
  value: string,
  entries: ReadonlyArray<E>,
  order: number,
  specify: (value: string, entry: E, order: number) => Specificity | undefined,
): Specificity {
  let best = none(order)

  for (const entry of entries) {
    const spec = specify(value, entry, order)
    if (spec !== undefined && isBetter(spec, best)) {
      best = spec
    }
  }

  return best
}

/**
 * Order of negotiated values: quality descending, then the least specific
 * match, then the entry declared first, then the value offered first.
 */
export function compare(a: Specificity, b: Specificity): number {
  return (
    b.quality - a.quality
    || a.specificity - b.specificity
    || a.entryOrder - b.entryOrder
    || a.order - b.order
  )
}
