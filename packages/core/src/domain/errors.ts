import { Data } from "effect"

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly cause: unknown
  readonly message: string
}> {}

export class TransientFailure extends Data.TaggedError("TransientFailure")<{
  readonly operation: string
  readonly cause: unknown
  readonly message: string
}> {}

export class MalformedExtraction extends Data.TaggedError("MalformedExtraction")<{
  readonly raw: string
  readonly cause: unknown
  readonly message: string
}> {}

/** Logged as a warning; never fails a record. */
export class LookupAmbiguity extends Data.TaggedError("LookupAmbiguity")<{
  readonly names: readonly string[]
  readonly assignedTo: number
  readonly message: string
}> {}

export class StoreWriteFailure extends Data.TaggedError("StoreWriteFailure")<{
  readonly tables: readonly string[]
  readonly cause: unknown
  readonly message: string
}> {}
