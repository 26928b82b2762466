import { Data, Either, Option, Schema } from "effect"
import { LocationCode, RelationCode, StatusCode } from "../domain/event.js"
import { MalformedExtraction } from "../domain/errors.js"
import { isUnnamed, normalizeName, type NameAliases } from "../domain/names.js"
import { looksAbsolute, parseTimestamp } from "../temporal/timestamp.js"
import { decodeModelJson } from "./model-output.js"

const NoRelation = Schema.Union(Schema.Literal(0, ""), Schema.Null)

/** `[u, e, "t", "p", r]` */
const WireEvent = Schema.Tuple(
  LocationCode,
  StatusCode,
  Schema.String,
  Schema.NullOr(Schema.String),
  Schema.Union(RelationCode, NoRelation)
)

/** `0`, or `["name1,name2", [[u, e, "t", "p", r], ...]]` */
export const WireExtraction = Schema.Union(
  Schema.Literal(0),
  Schema.Tuple(Schema.String, Schema.Array(WireEvent))
)
export type WireExtraction = typeof WireExtraction.Type

export type EventTime = Data.TaggedEnum<{
  /** No time given: the post's publish time applies. */
  Published: {}
  Absolute: { readonly at: Date }
  /** Free text for the temporal resolver. */
  Phrase: { readonly text: string }
}>

export const EventTime = Data.taggedEnum<EventTime>()

export interface ExtractedEvent {
  readonly location: LocationCode
  readonly status: StatusCode
  readonly time: EventTime
  readonly person: string | null
  readonly relation: RelationCode | null
}

export type DecodedResult = Data.TaggedEnum<{
  NoAnimals: {}
  Animals: { readonly names: readonly string[]; readonly events: readonly ExtractedEvent[] }
}>

export const DecodedResult = Data.taggedEnum<DecodedResult>()

export interface DecodeOptions {
  readonly aliases?: NameAliases
}

const decodeNames = (
  raw: string,
  field: string,
  aliases: NameAliases
): Either.Either<readonly string[], MalformedExtraction> => {
  // Repeated names are one animal; every unnamed entry is its own.
  const names = field
    .split(",")
    .map((part) => normalizeName(part, aliases))
    .filter((name, i, all) => name !== "" && (isUnnamed(name) || all.indexOf(name) === i))
  return names.length === 0
    ? Either.left(new MalformedExtraction({ raw, cause: field, message: "No animal names in extraction" }))
    : Either.right(names)
}

const decodeTime = (raw: string, t: string): Either.Either<EventTime, MalformedExtraction> => {
  const text = t.trim()
  if (text === "") return Either.right(EventTime.Published())
  if (!looksAbsolute(text)) return Either.right(EventTime.Phrase({ text }))
  return Option.match(parseTimestamp(text), {
    onNone: () => Either.left(new MalformedExtraction({ raw, cause: t, message: `Invalid timestamp "${t}"` })),
    onSome: (at) => Either.right(EventTime.Absolute({ at })),
  })
}

const decodeEvent = (
  raw: string,
  [location, status, t, person, relation]: typeof WireEvent.Type
): Either.Either<ExtractedEvent, MalformedExtraction> =>
  decodeTime(raw, t).pipe(
    Either.map((time): ExtractedEvent => ({
      location,
      status,
      time,
      person: person === null || person.trim() === "" ? null : person.trim(),
      relation: relation === 0 || relation === "" || relation === null ? null : relation,
    }))
  )

/** Validates the compact event encoding returned by the caption model. */
export const decodeExtraction = (
  raw: string,
  options: DecodeOptions = {}
): Either.Either<DecodedResult, MalformedExtraction> =>
  Either.gen(function* () {
    const wire = yield* decodeModelJson(WireExtraction, raw)
    if (wire === 0) return DecodedResult.NoAnimals()
    const [field, tuples] = wire
    const names = yield* decodeNames(raw, field, options.aliases ?? new Map())
    const events = yield* Either.all(tuples.map((tuple) => decodeEvent(raw, tuple)))
    return DecodedResult.Animals({ names, events })
  })
