import { Effect } from "effect"
import { AnimalExtractor } from "../services/animal-extractor.js"
import { ReconcileOutcome, Reconciler } from "../services/reconciler.js"
import { PostSource } from "../services/record-sources.js"
import type { SourceRecord } from "../domain/source.js"
import { count, emptySummary, formatSummary, type BatchSummary } from "./summary.js"

type Step = keyof BatchSummary

const stepOf = ReconcileOutcome.$match({
  Duplicate: (): Step => "duplicates",
  Institutional: (): Step => "institutional",
  Recorded: (): Step => "written",
})

const processPost = (record: SourceRecord) =>
  Effect.gen(function* () {
    const reconciler = yield* Reconciler
    if (yield* reconciler.isRecorded(record)) return "duplicates" as const

    const source = yield* PostSource
    const extractor = yield* AnimalExtractor
    const loaded = yield* source.loadImages(record)
    const decoded = yield* extractor.extractAnimal(loaded.images, loaded.caption, loaded.publishedAt)
    const outcome = yield* reconciler.reconcile(loaded, decoded)
    if (outcome._tag === "Recorded") {
      const { created, matched, rows } = outcome
      yield* Effect.logInfo("post recorded").pipe(Effect.annotateLogs({ created, matched, rows }))
    }
    return stepOf(outcome)
  })

/** Reconciles posts one at a time; a failing post is logged and counted. */
export const runPostBatch = (records: readonly SourceRecord[]) =>
  Effect.gen(function* () {
    let summary = emptySummary
    for (const record of records) {
      const step = yield* processPost(record).pipe(
        Effect.catchTags({
          MalformedExtraction: (error) => Effect.logError(`Unusable extraction: ${error.message}`).pipe(Effect.as<Step>("failed")),
          TransientFailure: (error) => Effect.logError(`${error.operation} failed: ${error.message}`).pipe(Effect.as<Step>("failed")),
          StoreWriteFailure: (error) => Effect.logError(`Nothing written: ${error.message}`).pipe(Effect.as<Step>("failed")),
        }),
        Effect.annotateLogs({ post: record.id, permalink: record.permalink })
      )
      summary = count(summary, step)
    }
    yield* Effect.logInfo(`post batch done: ${formatSummary(summary)}`)
    return summary
  })
