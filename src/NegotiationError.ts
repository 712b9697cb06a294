import * as Schema from "effect/Schema"

export class NotAcceptable extends Schema.TaggedError<NotAcceptable>()("NotAcceptable", {
  message: Schema.String,
  header: Schema.String,
  available: Schema.Array(Schema.String),
}) {
  static readonly status = 406
}
