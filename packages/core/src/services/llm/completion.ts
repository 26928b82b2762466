import { Effect } from "effect"
import { MalformedExtraction, TransientFailure } from "../../domain/errors.js"
import { toImageUrl, type ImagePayload } from "../../domain/source.js"
import type { LlmClient } from "./client.js"
import type { ChatCompletionsRequest, ChatMessage } from "./types.js"

export const userMessage = (text: string, images: readonly ImagePayload[]): ChatMessage => ({
  role: "user",
  content: [
    { type: "text", text },
    ...images.map((image) => ({ type: "image_url" as const, image_url: { url: toImageUrl(image) } })),
  ],
})

/** One chat completion, reduced to its reply text. */
export const completeText = (
  client: LlmClient,
  operation: string,
  request: ChatCompletionsRequest
): Effect.Effect<string, TransientFailure | MalformedExtraction> =>
  Effect.gen(function* () {
    const response = yield* client.chatCompletions(request).pipe(
      Effect.mapError((cause) => new TransientFailure({ operation, cause, message: cause.message }))
    )

    const textContent = response.choices[0]?.message.content
    if (!textContent) {
      return yield* new MalformedExtraction({ raw: "", cause: null, message: "No text in response" })
    }
    return textContent
  })
