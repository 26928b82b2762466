import { Effect } from "effect"
import { defaultExpenseRules, type ExpenseRules } from "../config/rules.js"
import { parseStatement, statementExpenses } from "../expenses/statement.js"
import { ExpenseLedger } from "../services/expense-ledger.js"
import { count, emptySummary, formatSummary } from "./summary.js"

export interface StatementText {
  readonly name: string
  readonly text: string
}

/** Records the provider debits of each statement; one append per statement. */
export const runStatementBatch = (statements: readonly StatementText[], rules: ExpenseRules = defaultExpenseRules) =>
  Effect.gen(function* () {
    const ledger = yield* ExpenseLedger
    let summary = emptySummary
    for (const { name, text } of statements) {
      const lines = parseStatement(text)
      const expenses = statementExpenses(lines, rules)
      yield* Effect.logInfo(`${name}: ${lines.length} movements, ${expenses.length} expenses`)

      summary = yield* ledger.recordExpenses(expenses).pipe(
        Effect.map((result) => count(count(summary, "written", result.written), "duplicates", result.duplicates)),
        Effect.catchTags({
          TransientFailure: (error) =>
            Effect.logError(`${error.operation} failed: ${error.message}`).pipe(Effect.as(count(summary, "failed"))),
          StoreWriteFailure: (error) =>
            Effect.logError(`Nothing written: ${error.message}`).pipe(Effect.as(count(summary, "failed"))),
        }),
        Effect.annotateLogs({ statement: name })
      )
    }
    yield* Effect.logInfo(`statement batch done: ${formatSummary(summary)}`)
    return summary
  })
