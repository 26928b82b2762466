import { Config, Context, Duration, Effect, Layer, Redacted, Schedule, Schema } from "effect"
import { loadConfig } from "../../config/load.js"
import { ChatCompletionsResult, type ChatCompletionsRequest } from "./types.js"
import { LlmApiError, NetworkError, RateLimitError, type LlmError } from "./errors.js"

export interface LlmClient {
  readonly chatCompletions: (
    request: ChatCompletionsRequest
  ) => Effect.Effect<ChatCompletionsResult, LlmError>
}

export const LlmClient = Context.GenericTag<LlmClient>("@rescuelog/LlmClient")

const LlmClientConfig = Config.all({
  apiKey: Config.redacted("OPENAI_API_KEY"),
  baseUrl: Config.string("LLM_BASE_URL").pipe(
    Config.withDefault("https://api.openai.com/v1")
  ),
  timeout: Config.integer("LLM_TIMEOUT_SECONDS").pipe(
    Config.withDefault(60),
    Config.map(Duration.seconds)
  ),
})

// Attempts that never produced a completion are retried at most three times.
const retrySchedule = Schedule.exponential("200 millis").pipe(
  Schedule.jittered,
  Schedule.compose(Schedule.recurs(3))
)

const isRetryable = (err: LlmError): boolean =>
  err._tag === "RateLimitError" ||
  err._tag === "NetworkError" ||
  (err._tag === "LlmApiError" && err.status >= 500)

const readBody = (res: Response): Effect.Effect<unknown> =>
  Effect.promise(async (): Promise<unknown> => {
    try {
      return await res.json()
    } catch {
      return { error: "Unknown error" }
    }
  })

export const LlmClientLive = Layer.effect(
  LlmClient,
  Effect.gen(function* () {
    const { apiKey, baseUrl, timeout } = yield* loadConfig(LlmClientConfig)

    const handleResponse = (res: Response): Effect.Effect<ChatCompletionsResult, LlmError> => {
      if (res.ok) {
        return Effect.tryPromise({
          try: (): Promise<unknown> => res.json(),
          catch: (cause) => new NetworkError({ cause, message: "Failed to parse response" }),
        }).pipe(
          Effect.flatMap(Schema.decodeUnknown(ChatCompletionsResult)),
          Effect.mapError((cause) =>
            cause._tag === "NetworkError"
              ? cause
              : new LlmApiError({ status: res.status, body: null, message: "Unexpected completion payload" })
          )
        )
      }

      if (res.status === 429) {
        const retryAfter = res.headers.get("Retry-After")
        return Effect.fail(
          new RateLimitError({
            status: 429,
            retryAfter: retryAfter ? parseInt(retryAfter, 10) : null,
            message: "Rate limit exceeded",
          })
        )
      }

      return readBody(res).pipe(
        Effect.flatMap((body) =>
          Effect.fail(
            new LlmApiError({
              status: res.status,
              body,
              message: `LLM API error: ${res.status} ${res.statusText}`,
            })
          )
        )
      )
    }

    const attempt = (request: ChatCompletionsRequest) =>
      Effect.tryPromise({
        try: (signal) =>
          globalThis.fetch(`${baseUrl}/chat/completions`, {
            method: "POST",
            headers: {
              Authorization: `Bearer ${Redacted.value(apiKey)}`,
              "Content-Type": "application/json",
            },
            body: JSON.stringify(request),
            signal,
          }),
        catch: (cause) => new NetworkError({ cause, message: "Failed to connect to the LLM API" }),
      }).pipe(
        Effect.flatMap(handleResponse),
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () =>
            new NetworkError({ cause: null, message: `No completion within ${Duration.format(timeout)}` }),
        })
      )

    return {
      chatCompletions: (request) =>
        attempt(request).pipe(
          Effect.tapError((err) => Effect.logDebug(`LLM attempt failed: ${err.message}`)),
          Effect.retry({ schedule: retrySchedule, while: isRetryable })
        ),
    }
  })
)
