import { Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { formatSummary, runPostBatch } from "@rescuelog/core/pipeline"
import { formatTimestamp } from "@rescuelog/core"
import { PostSource, Reconciler } from "@rescuelog/core/services"
import { postsLayer, type PostOrigin } from "../layers.js"
import { dryRunOpt, parseDate } from "./options.js"

const sinceOpt = Options.text("since").pipe(
  Options.withDescription("Only posts published from this date on (default: the latest animal registration day)"),
  Options.optional
)

const ingest = (origin: PostOrigin, since: Option.Option<string>, dryRun: boolean) =>
  Effect.gen(function* () {
    const from = Option.isSome(since)
      ? yield* parseDate("since", since.value)
      : Option.getOrUndefined(yield* Effect.flatMap(Reconciler, (reconciler) => reconciler.latestRegistration))
    if (from !== undefined) yield* Effect.logInfo(`Fetching ${origin} records from ${formatTimestamp(from)}`)
    const source = yield* PostSource
    const records = yield* source.listPosts({ since: from })
    yield* Effect.logInfo(`${records.length} ${origin} records to check`)
    const summary = yield* runPostBatch(records)
    yield* Console.log(formatSummary(summary))
  }).pipe(Effect.provide(postsLayer(origin, dryRun)))

export const postsCommand = Command.make(
  "posts",
  { since: sinceOpt, dryRun: dryRunOpt },
  ({ since, dryRun }) => ingest("instagram", since, dryRun)
).pipe(Command.withDescription("Record the animals and events of Instagram posts"))

export const photosCommand = Command.make(
  "photos",
  { since: sinceOpt, dryRun: dryRunOpt },
  ({ since, dryRun }) => ingest("drive", since, dryRun)
).pipe(Command.withDescription("Record the animals of photos in the Drive animals folder"))
