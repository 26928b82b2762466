import { Args, Command } from "@effect/cli"
import { FileSystem } from "@effect/platform"
import { Console, Effect } from "effect"
import { globSync } from "glob"
import { formatSummary, runStatementBatch } from "@rescuelog/core/pipeline"
import { InvalidArgument } from "../errors.js"
import { ledgerLayer } from "../layers.js"
import { dryRunOpt } from "./options.js"

const patternArg = Args.text({ name: "pattern" }).pipe(
  Args.withDescription("Glob of bank statements exported as text")
)

export const statementsCommand = Command.make(
  "statements",
  { pattern: patternArg, dryRun: dryRunOpt },
  ({ pattern, dryRun }) =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const paths = globSync(pattern, { nodir: true }).sort()
      if (paths.length === 0) {
        return yield* new InvalidArgument({ argument: "pattern", value: pattern, message: "No statement matches" })
      }

      const statements = yield* Effect.forEach(paths, (path) =>
        Effect.map(fs.readFileString(path), (text) => ({ name: path, text }))
      )
      const summary = yield* runStatementBatch(statements)
      yield* Console.log(formatSummary(summary))
    }).pipe(Effect.provide(ledgerLayer(dryRun)))
).pipe(Command.withDescription("Record provider debits of bank statements as expenses"))
