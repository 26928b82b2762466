import { Options } from "@effect/cli"
import { Effect, Option } from "effect"
import { parseDayOrTimestamp } from "@rescuelog/core"
import { InvalidArgument } from "../errors.js"

export const dryRunOpt = Options.boolean("dry-run").pipe(
  Options.withDescription("Read the spreadsheet but keep every write in memory")
)

export const parseDate = (argument: string, value: string) =>
  Option.match(parseDayOrTimestamp(value), {
    onNone: () =>
      Effect.fail(
        new InvalidArgument({ argument, value, message: `Expected DD/MM/YYYY or DD/MM/YYYY HH:MM:SS, got "${value}"` })
      ),
    onSome: (date) => Effect.succeed(date),
  })
