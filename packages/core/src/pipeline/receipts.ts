import { Effect } from "effect"
import { defaultExpenseRules, type ExpenseRules } from "../config/rules.js"
import { receiptExpense } from "../expenses/receipt.js"
import { ExpenseLedger } from "../services/expense-ledger.js"
import { ReceiptExtractor } from "../services/receipt-extractor.js"
import { ReceiptSource, type ReceiptFile } from "../services/record-sources.js"
import { count, emptySummary, formatSummary, type BatchSummary } from "./summary.js"

type Step = keyof BatchSummary

const processReceipt = (file: ReceiptFile, rules: ExpenseRules) =>
  Effect.gen(function* () {
    const ledger = yield* ExpenseLedger
    if (yield* ledger.isRecorded(file.id)) return "duplicates" as const

    const source = yield* ReceiptSource
    const extractor = yield* ReceiptExtractor
    const image = yield* source.download(file)
    const fields = yield* extractor.extractReceipt(image)
    const expense = receiptExpense(fields, { fileId: file.id, photoUrl: file.url }, rules)
    const result = yield* ledger.recordExpenses([expense])
    if (result.rejected > 0) {
      yield* Effect.logWarning(`Transport receipt outside a weekend: ${expense.date}`)
      return "failed" as const
    }
    return result.written > 0 ? ("written" as const) : ("duplicates" as const)
  })

const failed = (message: string) => Effect.logError(message).pipe(Effect.as<Step>("failed"))

/** Reads each receipt, records it and files it in the ok or error folder. */
export const runReceiptBatch = (files: readonly ReceiptFile[], rules: ExpenseRules = defaultExpenseRules) =>
  Effect.gen(function* () {
    const source = yield* ReceiptSource
    let summary = emptySummary
    for (const file of files) {
      const step = yield* processReceipt(file, rules).pipe(
        Effect.catchTags({
          MalformedExtraction: (error) => failed(`Unreadable receipt: ${error.message}`),
          TransientFailure: (error) => failed(`${error.operation} failed: ${error.message}`),
          StoreWriteFailure: (error) => failed(`Nothing written: ${error.message}`),
        }),
        Effect.tap((step) =>
          source.settle(file, step === "failed" ? "error" : "ok").pipe(
            Effect.catchTag("TransientFailure", (error) =>
              Effect.logWarning(`Could not move ${file.name}: ${error.message}`)
            )
          )
        ),
        Effect.annotateLogs({ receipt: file.name })
      )
      summary = count(summary, step)
    }
    yield* Effect.logInfo(`receipt batch done: ${formatSummary(summary)}`)
    return summary
  })
