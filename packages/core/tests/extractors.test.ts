import { describe, expect, test, vi } from "vitest"
import { Effect, Layer, Option } from "effect"
import { defaultExpenseRules } from "../src/config/rules.js"
import { ImagePayload } from "../src/domain/source.js"
import { receiptExpense } from "../src/expenses/receipt.js"
import {
  AnimalExtractor,
  LlmApiError,
  LlmClient,
  ReceiptExtractor,
  type ChatCompletionsRequest,
  type ChatCompletionsResult,
  type LlmError,
} from "../src/services/index.js"
import { parseTimestamp } from "../src/temporal/index.js"

const reply = (content: string | null): ChatCompletionsResult => ({
  id: "completion-1",
  model: "test-model",
  choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
})

const fakeClient = (result: Effect.Effect<ChatCompletionsResult, LlmError>) => {
  const chatCompletions = vi.fn((_request: ChatCompletionsRequest) => result)
  return { chatCompletions, layer: Layer.succeed(LlmClient, LlmClient.of({ chatCompletions })) }
}

const userText = (request: ChatCompletionsRequest | undefined): string => {
  const content = request?.messages[1]?.content
  if (content === undefined || typeof content === "string") throw new Error("Missing user content")
  const text = content.find((part) => part.type === "text")
  if (!text || text.type !== "text") throw new Error("Missing text content")
  return text.text
}

const publishedAt = Option.getOrThrow(parseTimestamp("09/08/2025 19:00:00"))
const photo = ImagePayload.Bytes({ data: new Uint8Array([1, 2, 3]), mimeType: "image/png" })

const runAnimal = <A, E>(effect: Effect.Effect<A, E, AnimalExtractor>, layer: Layer.Layer<LlmClient>) =>
  Effect.runPromise(Effect.provide(effect, AnimalExtractor.Live.pipe(Layer.provide(layer))))

describe("AnimalExtractor.extractAnimal", () => {
  test("sends the caption with the publish time and decodes the reply", async () => {
    const { chatCompletions, layer } = fakeClient(Effect.succeed(reply('["Luna", [[1, 1, "hace 3 días", null, 0]]]')))

    const result = await runAnimal(
      Effect.flatMap(AnimalExtractor, (extractor) =>
        extractor.extractAnimal([photo], "Soy Luna, fue encontrada en Palermo, hace 3 días", publishedAt)
      ),
      layer
    )

    expect(result._tag === "Animals" && result.names).toEqual(["luna"])
    expect(chatCompletions).toHaveBeenCalledTimes(1)
    const request = chatCompletions.mock.calls[0]?.[0]
    expect(request?.model).toBe("gpt-4o")
    expect(request?.temperature).toBe(0)
    expect(userText(request)).toContain("FECHA_PUBLICACION: 09/08/2025 19:00:00")
    expect(userText(request)).toContain("Soy Luna, fue encontrada en Palermo, hace 3 días")
    expect(request?.messages[1]?.content).toContainEqual({
      type: "image_url",
      image_url: { url: "data:image/png;base64,AQID" },
    })
  })

  test("reports an API failure as transient", async () => {
    const { layer } = fakeClient(Effect.fail(new LlmApiError({ status: 503, body: null, message: "unavailable" })))

    const error = await runAnimal(
      Effect.flip(Effect.flatMap(AnimalExtractor, (extractor) => extractor.extractAnimal([], "", publishedAt))),
      layer
    )

    expect(error._tag).toBe("TransientFailure")
    expect(error._tag === "TransientFailure" && error.operation).toBe("extractAnimal")
  })

  test("fails on an empty completion", async () => {
    const { layer } = fakeClient(Effect.succeed(reply(null)))

    const error = await runAnimal(
      Effect.flip(Effect.flatMap(AnimalExtractor, (extractor) => extractor.extractAnimal([], "", publishedAt))),
      layer
    )

    expect(error._tag).toBe("MalformedExtraction")
    expect(error.message).toBe("No text in response")
  })
})

describe("AnimalExtractor.extractProfiles", () => {
  test("skips the call when there is nobody to describe", async () => {
    const { chatCompletions, layer } = fakeClient(Effect.succeed(reply("[]")))
    const profiles = await runAnimal(
      Effect.flatMap(AnimalExtractor, (extractor) => extractor.extractProfiles([], "", [])),
      layer
    )
    expect(profiles).toEqual([])
    expect(chatCompletions).not.toHaveBeenCalled()
  })

  test("reads IGNORAR as no profiles", async () => {
    const { layer } = fakeClient(Effect.succeed(reply("IGNORAR")))
    const profiles = await runAnimal(
      Effect.flatMap(AnimalExtractor, (extractor) => extractor.extractProfiles([], "", ["luna"])),
      layer
    )
    expect(profiles).toEqual([])
  })

  test("decodes a profile list", async () => {
    const body = JSON.stringify([
      {
        name: "luna",
        species: "Perro",
        location: "Palermo",
        age: "Adulto",
        coat: [{ color: "negro", percentage: 70 }, { color: "blanco", percentage: 30 }],
        health: "Sana",
      },
    ])
    const { chatCompletions, layer } = fakeClient(Effect.succeed(reply("```json\n" + body + "\n```")))

    const profiles = await runAnimal(
      Effect.flatMap(AnimalExtractor, (extractor) => extractor.extractProfiles([], "Soy Luna", ["luna"])),
      layer
    )

    expect(profiles.map((p) => [p.name, p.species, p.coat.length])).toEqual([["luna", "Perro", 2]])
    expect(userText(chatCompletions.mock.calls[0]?.[0])).toContain("Animales a describir (en este orden): luna")
  })
})

describe("ReceiptExtractor", () => {
  test("reads the receipt fields and builds the expense", async () => {
    const { layer } = fakeClient(
      Effect.succeed(
        reply(
          JSON.stringify({
            Fecha: "09/08/2025",
            Proveedor: "Veterinaria San Roque",
            Monto: "-1500.5",
            Detalle: "Consulta",
            Observaciones: "control",
          })
        )
      )
    )

    const fields = await Effect.runPromise(
      Effect.flatMap(ReceiptExtractor, (extractor) => extractor.extractReceipt(photo)).pipe(
        Effect.provide(ReceiptExtractor.Live.pipe(Layer.provide(layer)))
      )
    )

    expect(fields.amount).toBe(1500.5)
    expect(fields.pet).toBe("")

    const expense = receiptExpense(
      fields,
      { fileId: "file-1", photoUrl: "https://drive.google.com/uc?id=file-1" },
      defaultExpenseRules
    )
    expect(expense.category).toBe("Veterinaria")
    expect(expense.responsible).toBe("TESORERIA")
    expect(expense.paymentMethod).toBe("MERCADOPAGO")
    expect(expense.detail).toBe("Consulta (control)")
    expect(expense.observation).toBe("file-1")
  })
})
