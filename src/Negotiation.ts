import * as HttpServerRequest from "@effect/platform/HttpServerRequest"
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as ContentNegotiation from "./ContentNegotiation.ts"
import * as HeaderSource from "./HeaderSource.ts"
import * as NegotiationError from "./NegotiationError.ts"
import * as Negotiator from "./Negotiator.ts"
import type * as Preference from "./Preference.ts"

/**
 * Values the application can serve, used whenever an accessor is called
 * without its own list.
 */
export interface Available {
  readonly mediaTypes: ReadonlyArray<string>
  readonly languages: ReadonlyArray<string>
  readonly charsets: ReadonlyArray<string>
  readonly encodings: ReadonlyArray<string>
}

export class Negotiation extends Context.Tag("accept-negotiation/Negotiation")<
  Negotiation,
  Available
>() {}

export function layer(available: Partial<Available> = {}): Layer.Layer<Negotiation> {
  return Layer.succeed(
    Negotiation,
    Negotiation.of({
      mediaTypes: available.mediaTypes ?? [],
      languages: available.languages ?? [],
      charsets: available.charsets ?? [],
      encodings: available.encodings ?? [],
    }),
  )
}

const list = (name: string) =>
  Config.array(Config.string(), name).pipe(
    Config.withDefault<ReadonlyArray<string>>([]),
  )

/**
 * Reads comma-separated lists from `${prefix}_MEDIA_TYPES`,
 * `${prefix}_LANGUAGES`, `${prefix}_CHARSETS` and `${prefix}_ENCODINGS`.
 */
export function layerConfig(
  prefix = "NEGOTIATION",
): Layer.Layer<Negotiation, ConfigError.ConfigError> {
  return Layer.effect(
    Negotiation,
    Effect.gen(function*() {
      const mediaTypes = yield* list(`${prefix}_MEDIA_TYPES`)
      const languages = yield* list(`${prefix}_LANGUAGES`)
      const charsets = yield* list(`${prefix}_CHARSETS`)
      const encodings = yield* list(`${prefix}_ENCODINGS`)

      return Negotiation.of({ mediaTypes, languages, charsets, encodings })
    }),
  )
}

export const negotiator: Effect.Effect<
  Negotiator.Negotiator,
  never,
  HttpServerRequest.HttpServerRequest
> = Effect.map(
  HttpServerRequest.HttpServerRequest,
  (request) => Negotiator.fromHeaders(request.headers),
)

interface Outcome {
  readonly header: string
  readonly available: ReadonlyArray<string>
  readonly values: Array<string>
}

function negotiate<E extends Preference.Preference>(
  dimension: ContentNegotiation.Dimension<E>,
  name: ContentNegotiation.DimensionName,
  configured: (available: Available) => ReadonlyArray<string>,
) {
  return (
    available?: ReadonlyArray<string>,
  ): Effect.Effect<Outcome, never, HttpServerRequest.HttpServerRequest | Negotiation> =>
    Effect.gen(function*() {
      const request = yield* HttpServerRequest.HttpServerRequest
      const defaults = yield* Negotiation

      const header = ContentNegotiation.headers[name].name
      const accept = Negotiator.accept(HeaderSource.fromHeaders(request.headers), name)
      const offered = available ?? configured(defaults)
      const values = ContentNegotiation.preferred(dimension, accept, offered)

      yield* Effect.logDebug(
        `${header}: ${accept} -> ${values.length > 0 ? values.join(", ") : "(none)"}`,
      )

      return { header, available: offered, values }
    })
}

function best(
  outcome: Effect.Effect<Outcome, never, HttpServerRequest.HttpServerRequest | Negotiation>,
): Effect.Effect<
  string,
  NegotiationError.NotAcceptable,
  HttpServerRequest.HttpServerRequest | Negotiation
> {
  return Effect.flatMap(outcome, ({ header, available, values }) =>
    values.length > 0
      ? Effect.succeed(values[0])
      : Effect.fail(
        new NegotiationError.NotAcceptable({
          message: `No acceptable value for ${header}`,
          header,
          available,
        }),
      ))
}

const negotiateMediaTypes = negotiate(
  ContentNegotiation.dimensions.mediaType,
  "mediaType",
  (available) => available.mediaTypes,
)
const negotiateLanguages = negotiate(
  ContentNegotiation.dimensions.language,
  "language",
  (available) => available.languages,
)
const negotiateCharsets = negotiate(
  ContentNegotiation.dimensions.charset,
  "charset",
  (available) => available.charsets,
)
const negotiateEncodings = negotiate(
  ContentNegotiation.dimensions.encoding,
  "encoding",
  (available) => available.encodings,
)

export const mediaTypes = (available?: ReadonlyArray<string>) =>
  Effect.map(negotiateMediaTypes(available), (outcome) => outcome.values)

export const languages = (available?: ReadonlyArray<string>) =>
  Effect.map(negotiateLanguages(available), (outcome) => outcome.values)

export const charsets = (available?: ReadonlyArray<string>) =>
  Effect.map(negotiateCharsets(available), (outcome) => outcome.values)

export const encodings = (available?: ReadonlyArray<string>) =>
  Effect.map(negotiateEncodings(available), (outcome) => outcome.values)

/**
 * Fails with `NotAcceptable` when nothing offered is acceptable.
 * With nothing offered, the client's top preference is returned.
 */
export const mediaType = (available?: ReadonlyArray<string>) =>
  best(negotiateMediaTypes(available))

export const language = (available?: ReadonlyArray<string>) =>
  best(negotiateLanguages(available))

export const charset = (available?: ReadonlyArray<string>) =>
  best(negotiateCharsets(available))

export const encoding = (available?: ReadonlyArray<string>) =>
  best(negotiateEncodings(available))
