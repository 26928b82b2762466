import { Data } from "effect"

export class LlmApiError extends Data.TaggedError("LlmApiError")<{
  readonly status: number
  readonly body: unknown
  readonly message: string
}> {}

export class RateLimitError extends Data.TaggedError("RateLimitError")<{
  readonly status: number
  readonly retryAfter: number | null
  readonly message: string
}> {}

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly cause: unknown
  readonly message: string
}> {}

export type LlmError = LlmApiError | RateLimitError | NetworkError
