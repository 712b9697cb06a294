/**
 * Quote-aware splitting of header values.
 *
 * A delimiter only splits when the text accumulated so far holds an even
 * number of double quotes, so `a;b="x;y"` yields `a` and `b="x;y"`.
 * An unterminated quote never closes and swallows the rest of the input.
 */

export function quoteCount(value: string): number {
  let count = 0
  for (let i = 0; i < value.length; i++) {
    if (value.charCodeAt(i) === 34) count++
  }
  return count
}

export function split(input: string, delimiter: string): Array<string> {
  const pieces = input.split(delimiter)
  const result: Array<string> = [pieces[0]]

  for (let i = 1; i < pieces.length; i++) {
    const last = result.length - 1
    if (quoteCount(result[last]) % 2 === 0) {
      result.push(pieces[i])
    } else {
      result[last] += delimiter + pieces[i]
    }
  }

  return result
}

export function splitSegments(accept: string): Array<string> {
  return split(accept, ",")
}

export function splitParameters(params: string): Array<string> {
  return split(params, ";").map((piece) => piece.trim())
}

export function splitKeyValuePair(value: string): [key: string, value: string] {
  const index = value.indexOf("=")
  if (index === -1) {
    return [value, ""]
  }
  return [value.slice(0, index), value.slice(index + 1)]
}
