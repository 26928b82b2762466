import { Command } from "@effect/cli"
import { NodeContext } from "@effect/platform-node"
import { Cause, Effect, Exit, Layer } from "effect"
import { photosCommand, postsCommand } from "./commands/posts.js"
import { receiptsCommand } from "./commands/receipts.js"
import { resolveCommand } from "./commands/resolve.js"
import { statementsCommand } from "./commands/statements.js"
import { LoggingLive } from "./layers.js"

const cli = Command.make("rescuelog").pipe(
  Command.withSubcommands([postsCommand, photosCommand, receiptsCommand, statementsCommand, resolveCommand])
)

const run = Command.run(cli, {
  name: "rescuelog",
  version: "0.1.0",
})

const main = async () => {
  const program = Effect.suspend(() => run(process.argv)).pipe(
    Effect.provide(Layer.merge(NodeContext.layer, LoggingLive))
  )
  const exit = await Effect.runPromiseExit(program)
  if (Exit.isFailure(exit)) {
    console.error(Cause.pretty(exit.cause))
    process.exit(1)
  }
}

main().catch((err) => {
  console.error("Unexpected error:", err)
  process.exit(1)
})
