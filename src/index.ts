export * as ContentNegotiation from "./ContentNegotiation.ts"
export * as HeaderSource from "./HeaderSource.ts"
export * as HeaderTokenizer from "./HeaderTokenizer.ts"

export * as Charset from "./Charset.ts"
export * as Encoding from "./Encoding.ts"
export * as Language from "./Language.ts"
export * as MediaType from "./MediaType.ts"
export * as Preference from "./Preference.ts"
export * as Specificity from "./Specificity.ts"

export * as Negotiation from "./Negotiation.ts"
export * as NegotiationError from "./NegotiationError.ts"
export * as Negotiator from "./Negotiator.ts"
