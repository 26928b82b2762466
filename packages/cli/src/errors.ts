import { Schema } from "effect"

export class InvalidArgument extends Schema.TaggedError<InvalidArgument>()("InvalidArgument", {
  argument: Schema.String,
  value: Schema.String,
  message: Schema.String,
}) {}
