import { Args, Command, Options } from "@effect/cli"
import { Console, Effect } from "effect"
import { resolveToString } from "@rescuelog/core"
import { parseDate } from "./options.js"

const referenceArg = Args.text({ name: "reference" }).pipe(
  Args.withDescription("DD/MM/YYYY HH:MM:SS the phrase is relative to")
)
const phraseArg = Args.text({ name: "phrase" })
const approximateOpt = Options.boolean("approximate").pipe(
  Options.withDescription("Count months as 30 days and years as 365")
)

export const resolveCommand = Command.make(
  "resolve",
  { reference: referenceArg, phrase: phraseArg, approximate: approximateOpt },
  ({ reference, phrase, approximate }) =>
    Effect.gen(function* () {
      const at = yield* parseDate("reference", reference)
      const resolved = resolveToString(at, phrase, { calendar: !approximate })
      yield* Console.log(resolved === "" ? "unresolved" : resolved)
    })
).pipe(Command.withDescription("Print the timestamp a temporal phrase refers to"))
