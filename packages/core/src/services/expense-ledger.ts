import { Context, Effect, Layer } from "effect"
import { normalizeKey, TabularStore } from "./tabular-store.js"
import { loadConfig } from "../config/load.js"
import { tableNames } from "../config/store.js"
import type { ConfigurationError, StoreWriteFailure, TransientFailure } from "../domain/errors.js"
import type { Expense } from "../domain/expense.js"
import { isAdmissible } from "../expenses/classifier.js"
import { toMutation } from "../store/rows.js"

export interface LedgerResult {
  readonly written: number
  readonly duplicates: number
  /** Transport outside weekends. */
  readonly rejected: number
}

export class ExpenseLedger extends Context.Tag("@rescuelog/ExpenseLedger")<
  ExpenseLedger,
  {
    readonly isRecorded: (observation: string) => Effect.Effect<boolean, TransientFailure>
    readonly recordExpenses: (
      expenses: readonly Expense[]
    ) => Effect.Effect<LedgerResult, TransientFailure | StoreWriteFailure>
  }
>() {
  static readonly Live: Layer.Layer<ExpenseLedger, ConfigurationError, TabularStore> = Layer.effect(
    this,
    Effect.gen(function* () {
      const store = yield* TabularStore
      const tables = yield* loadConfig(tableNames)

      return {
        isRecorded: (observation) =>
          store
            .findByColumn(tables.expense, "observacion", observation)
            .pipe(Effect.map((rows) => rows.length > 0)),

        recordExpenses: Effect.fn("ExpenseLedger.recordExpenses")(function* (expenses: readonly Expense[]) {
          const rows = yield* store.getAll(tables.expense)
          const seen = new Set(rows.map((row) => normalizeKey(row["observacion"] ?? "")))

          const admissible = expenses.filter(isAdmissible)
          const fresh: Expense[] = []
          for (const expense of admissible) {
            const key = normalizeKey(expense.observation)
            if (seen.has(key)) continue
            seen.add(key)
            fresh.push(expense)
          }

          yield* store.appendBatch(fresh.map((value) => toMutation(tables, { _tag: "Expense", value })))
          const result: LedgerResult = {
            written: fresh.length,
            duplicates: admissible.length - fresh.length,
            rejected: expenses.length - admissible.length,
          }
          yield* Effect.logInfo("expenses recorded").pipe(Effect.annotateLogs({ ...result }))
          return result
        }),
      }
    })
  )
}
