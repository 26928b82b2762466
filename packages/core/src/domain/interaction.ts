import { Schema } from "effect"

export class Interaction extends Schema.Class<Interaction>("Interaction")({
  animalId: Schema.Int.pipe(Schema.positive()),
  at: Schema.String,
  postId: Schema.String,
  /** Post permalink; the dedup key of a post. */
  permalink: Schema.NonEmptyString,
  mediaUrl: Schema.String,
}) {}
