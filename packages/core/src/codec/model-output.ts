import { Either, Schema } from "effect"
import { MalformedExtraction } from "../domain/errors.js"

export const stripMarkdown = (s: string): string =>
  s.replace(/^\s*```(?:json)?\s*\n?/i, "").replace(/\n?```\s*$/i, "").trim()

/** Parses a model reply as JSON (fences removed) and decodes it with `schema`. */
export const decodeModelJson = <A, I>(
  schema: Schema.Schema<A, I>,
  raw: string
): Either.Either<A, MalformedExtraction> =>
  Either.try({
    try: (): unknown => JSON.parse(stripMarkdown(raw)),
    catch: (cause) => new MalformedExtraction({ raw, cause, message: "Model output is not JSON" }),
  }).pipe(
    Either.flatMap((json) =>
      Schema.decodeUnknownEither(schema)(json).pipe(
        Either.mapLeft(
          (cause) => new MalformedExtraction({ raw, cause, message: "Model output does not match the expected shape" })
        )
      )
    )
  )
