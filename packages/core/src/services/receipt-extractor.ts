import { Context, Effect, Layer, Schema } from "effect"
import { LlmClient } from "./llm/client.js"
import { completeText, userMessage } from "./llm/completion.js"
import { aiConfig } from "../config/ai.js"
import { loadConfig } from "../config/load.js"
import { decodeModelJson } from "../codec/model-output.js"
import type { ConfigurationError, MalformedExtraction, TransientFailure } from "../domain/errors.js"
import type { ImagePayload } from "../domain/source.js"
import { receiptPrompt } from "../prompts.js"

const Text = Schema.optionalWith(Schema.String, { default: () => "" })

/** Receipt reply, keyed the way the prompt asks for it. */
export const ReceiptReply = Schema.Struct({
  Fecha: Schema.String,
  Proveedor: Schema.String,
  "Tipo de Gasto": Text,
  Mascota: Text,
  Responsable: Text,
  Detalle: Text,
  Monto: Schema.Union(Schema.Number, Schema.NumberFromString),
  "Forma de Pago": Text,
  Observaciones: Text,
})

export interface ReceiptFields {
  readonly date: string
  readonly provider: string
  readonly pet: string
  readonly responsible: string
  readonly detail: string
  readonly amount: number
  readonly paymentMethod: string
  readonly notes: string
}

const toFields = (reply: typeof ReceiptReply.Type): ReceiptFields => ({
  date: reply.Fecha.trim(),
  provider: reply.Proveedor.trim(),
  pet: reply.Mascota.trim(),
  responsible: reply.Responsable.trim(),
  detail: reply.Detalle.trim(),
  amount: Math.abs(reply.Monto),
  paymentMethod: reply["Forma de Pago"].trim(),
  notes: reply.Observaciones.trim(),
})

export class ReceiptExtractor extends Context.Tag("@rescuelog/ReceiptExtractor")<
  ReceiptExtractor,
  {
    readonly extractReceipt: (
      image: ImagePayload
    ) => Effect.Effect<ReceiptFields, TransientFailure | MalformedExtraction>
  }
>() {
  static readonly Live: Layer.Layer<ReceiptExtractor, ConfigurationError, LlmClient> = Layer.effect(
    this,
    Effect.gen(function* () {
      const client = yield* LlmClient
      const config = yield* loadConfig(aiConfig)

      return {
        extractReceipt: Effect.fn("ReceiptExtractor.extractReceipt")(function* (image: ImagePayload) {
          const text = yield* completeText(client, "extractReceipt", {
            model: config.extractionModel,
            messages: [
              { role: "system", content: "Read the receipt. Return valid JSON only." },
              userMessage(receiptPrompt, [image]),
            ],
            temperature: 0,
          })
          const reply = yield* decodeModelJson(ReceiptReply, text)
          return toFields(reply)
        }),
      }
    })
  )
}
