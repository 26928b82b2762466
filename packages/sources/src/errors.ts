import { Duration } from "effect"
import { TransientFailure } from "@rescuelog/core"

export const REQUEST_TIMEOUT = Duration.seconds(30)

export const transient = (operation: string) => (cause: unknown): TransientFailure =>
  new TransientFailure({
    operation,
    cause,
    message: cause instanceof Error ? cause.message : String(cause),
  })
