import { Context, Data, Effect, Layer, Option } from "effect"
import { AnimalExtractor } from "./animal-extractor.js"
import { TabularStore } from "./tabular-store.js"
import type { DecodedResult, ExtractedEvent } from "../codec/event-codec.js"
import { loadConfig } from "../config/load.js"
import { defaultNameAliases } from "../config/rules.js"
import { tableNames } from "../config/store.js"
import type { ConfigurationError, StoreWriteFailure, TransientFailure } from "../domain/errors.js"
import type { SourceRecord } from "../domain/source.js"
import { indexAnimals, latestRegistration, newNames, planMutations } from "../reconcile/plan.js"
import { toMutation } from "../store/rows.js"

export type ReconcileOutcome = Data.TaggedEnum<{
  /** The permalink is already recorded. */
  Duplicate: {}
  /** The post names no concrete animal. */
  Institutional: {}
  Recorded: {
    readonly created: readonly number[]
    readonly matched: readonly number[]
    readonly rows: number
  }
}>

export const ReconcileOutcome = Data.taggedEnum<ReconcileOutcome>()

export class Reconciler extends Context.Tag("@rescuelog/Reconciler")<
  Reconciler,
  {
    readonly isRecorded: (record: SourceRecord) => Effect.Effect<boolean, TransientFailure>
    /** Day of the newest Animal registration; the default lower bound for fetching posts. */
    readonly latestRegistration: Effect.Effect<Option.Option<Date>, TransientFailure>
    readonly reconcile: (
      record: SourceRecord,
      decoded: DecodedResult
    ) => Effect.Effect<ReconcileOutcome, TransientFailure | StoreWriteFailure>
  }
>() {
  static readonly Live: Layer.Layer<Reconciler, ConfigurationError, TabularStore | AnimalExtractor> = Layer.effect(
    this,
    Effect.gen(function* () {
      const store = yield* TabularStore
      const extractor = yield* AnimalExtractor
      const tables = yield* loadConfig(tableNames)

      const isRecorded = (record: SourceRecord) =>
        store
          .findByColumn(tables.interaction, "contenido", record.permalink)
          .pipe(Effect.map((rows) => rows.length > 0))

      const profilesFor = (record: SourceRecord, names: readonly string[]) =>
        extractor.extractProfiles(record.images, record.caption, names).pipe(
          Effect.catchTag("MalformedExtraction", (error) =>
            Effect.logWarning(`Unusable animal profiles, using defaults: ${error.message}`).pipe(Effect.as([]))
          )
        )

      const recordAnimals = Effect.fn("Reconciler.recordAnimals")(function* (
        record: SourceRecord,
        names: readonly string[],
        events: readonly ExtractedEvent[]
      ) {
        const animals = yield* store.getAll(tables.animal)
        const known = indexAnimals(animals, defaultNameAliases)
        const nextId = (yield* store.maxNumeric(tables.animal, "id")) + 1

        const fresh = newNames(names, known)
        const profiles = fresh.length > 0 ? yield* profilesFor(record, fresh) : []

        const plan = planMutations({ record, names, events, known, nextId, profiles })

        for (const phrase of plan.unresolved) {
          yield* Effect.logWarning(`Unresolved event time "${phrase}", stored empty`)
        }
        if (Option.isSome(plan.ambiguity)) {
          yield* Effect.logWarning(plan.ambiguity.value.message)
        }

        yield* store.appendBatch(plan.rows.map((row) => toMutation(tables, row)))

        return ReconcileOutcome.Recorded({ created: plan.created, matched: plan.matched, rows: plan.rows.length })
      })

      return {
        isRecorded,
        latestRegistration: Effect.map(store.getAll(tables.animal), latestRegistration),
        reconcile: (source, decoded) =>
          Effect.gen(function* () {
            if (yield* isRecorded(source)) return ReconcileOutcome.Duplicate()
            if (decoded._tag === "NoAnimals") return ReconcileOutcome.Institutional()
            return yield* recordAnimals(source, decoded.names, decoded.events)
          }).pipe(Effect.annotateLogs({ permalink: source.permalink })),
      }
    })
  )
}
