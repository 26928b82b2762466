import { Command } from "@effect/cli"
import { Console, Effect } from "effect"
import { formatSummary, runReceiptBatch } from "@rescuelog/core/pipeline"
import { ReceiptSource } from "@rescuelog/core/services"
import { receiptsLayer } from "../layers.js"
import { dryRunOpt } from "./options.js"

export const receiptsCommand = Command.make("receipts", { dryRun: dryRunOpt }, ({ dryRun }) =>
  Effect.gen(function* () {
    const source = yield* ReceiptSource
    const files = yield* source.listReceipts()
    const summary = yield* runReceiptBatch(files)
    yield* Console.log(formatSummary(summary))
  }).pipe(Effect.provide(receiptsLayer(dryRun)))
).pipe(Command.withDescription("Record the receipts in the Drive receipts folder as expenses"))
