import * as Headers from "@effect/platform/Headers"
import * as Option from "effect/Option"

/**
 * Read-only view of request headers.
 *
 * `get` looks a header up case-insensitively and returns every value it
 * was sent with, or undefined when it was not sent at all. A header sent
 * with an empty value yields `[""]`.
 */
export interface HeaderSource {
  readonly get: (name: string) => ReadonlyArray<string> | undefined
}

export type HeaderRecord = Readonly<
  Record<string, string | ReadonlyArray<string> | undefined>
>

export const empty: HeaderSource = {
  get: () => undefined,
}

/**
 * Works with Node's `IncomingHttpHeaders` and any plain object of
 * header values, whatever the casing of its keys.
 */
export function fromRecord(record: HeaderRecord): HeaderSource {
  return {
    get: (name) => {
      const lower = name.toLowerCase()
      const values: Array<string> = []
      let found = false

      for (const key of Object.keys(record)) {
        if (key.toLowerCase() !== lower) continue
        const value = record[key]
        if (value === undefined) continue
        found = true
        if (typeof value === "string") {
          values.push(value)
        } else {
          values.push(...value)
        }
      }

      return found ? values : undefined
    },
  }
}

export function fromHeaders(headers: Headers.Headers): HeaderSource {
  return {
    get: (name) =>
      Option.match(Headers.get(headers, name), {
        onNone: () => undefined,
        onSome: (value) => [value],
      }),
  }
}

export function fromWeb(headers: globalThis.Headers): HeaderSource {
  return {
    get: (name) => {
      const value = headers.get(name)
      return value === null ? undefined : [value]
    },
  }
}

/**
 * All values of a header joined with `,`, or undefined when absent.
 */
export function join(source: HeaderSource, name: string): string | undefined {
  const values = source.get(name)
  return values === undefined ? undefined : values.join(",")
}
