import { Schema } from "effect"

export const JsonSchemaFormat = Schema.Struct({
  type: Schema.Literal("json_schema"),
  json_schema: Schema.Struct({
    name: Schema.String,
    strict: Schema.Boolean,
    schema: Schema.Unknown,
  }),
})

export const TextFormat = Schema.Struct({
  type: Schema.Literal("text"),
})

export const ResponseFormat = Schema.Union(JsonSchemaFormat, TextFormat)

export const ChatMessageContent = Schema.Union(
  Schema.String,
  Schema.Array(Schema.Union(
    Schema.Struct({
      type: Schema.Literal("text"),
      text: Schema.String,
    }),
    Schema.Struct({
      type: Schema.Literal("image_url"),
      image_url: Schema.Struct({
        url: Schema.String,
        detail: Schema.optional(Schema.Literal("auto", "low", "high")),
      }),
    })
  ))
)

export const ChatMessage = Schema.Struct({
  role: Schema.Literal("system", "user", "assistant"),
  content: ChatMessageContent,
})

export type ChatMessage = typeof ChatMessage.Type

export const ChatCompletionsRequest = Schema.Struct({
  model: Schema.String,
  messages: Schema.Array(ChatMessage),
  max_tokens: Schema.optional(Schema.Number),
  temperature: Schema.optional(Schema.Number),
  response_format: Schema.optional(ResponseFormat),
})

export type ChatCompletionsRequest = typeof ChatCompletionsRequest.Type

export const ChatChoice = Schema.Struct({
  index: Schema.Number,
  message: Schema.Struct({
    role: Schema.Literal("assistant"),
    content: Schema.NullOr(Schema.String),
  }),
  finish_reason: Schema.NullOr(Schema.String),
})

export const ChatCompletionsResult = Schema.Struct({
  id: Schema.String,
  object: Schema.optional(Schema.String),
  created: Schema.optional(Schema.Number),
  model: Schema.String,
  choices: Schema.Array(ChatChoice),
  usage: Schema.optional(Schema.Struct({
    prompt_tokens: Schema.Number,
    completion_tokens: Schema.Number,
    total_tokens: Schema.Number,
  })),
})

export type ChatCompletionsResult = typeof ChatCompletionsResult.Type
