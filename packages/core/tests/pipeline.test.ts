import { describe, expect, test, vi } from "vitest"
import { readFileSync } from "node:fs"
import { Effect, Either, Layer, Option } from "effect"
import { decodeExtraction } from "../src/codec/index.js"
import { ImagePayload, type SourceRecord } from "../src/domain/source.js"
import { MalformedExtraction } from "../src/domain/errors.js"
import { Expense } from "../src/domain/expense.js"
import { runPostBatch, runReceiptBatch, runStatementBatch } from "../src/pipeline/index.js"
import {
  AnimalExtractor,
  ExpenseLedger,
  makeMemoryBackend,
  MemoryTabularStore,
  PostSource,
  ReceiptExtractor,
  ReceiptSource,
  Reconciler,
  type ReceiptFields,
  type ReceiptFile,
} from "../src/services/index.js"
import { emptyTables } from "../src/store/index.js"
import { fromIsoWallClock } from "../src/temporal/index.js"

const tables = { animal: "ANIMAL", event: "EVENTO", interaction: "INTERACCION", expense: "GASTOS" }

const post = (id: string, caption: string): SourceRecord => ({
  id,
  caption,
  publishedAt: Option.getOrThrow(fromIsoWallClock("2025-08-09T19:00:00+0000")),
  permalink: `https://example.com/p/${id}`,
  mediaUrl: `https://example.com/m/${id}.jpg`,
  children: [],
  images: [],
})

const photo = ImagePayload.Bytes({ data: new Uint8Array([1]), mimeType: "image/jpeg" })

describe("ExpenseLedger", () => {
  const expense = (observation: string, date = "02/08/2025 00:00:00", provider = "Veterinaria San Roque") =>
    new Expense({
      date,
      provider,
      category: provider === "Uber" ? "Transporte" : "Veterinaria",
      pet: "",
      responsible: "TESORERIA",
      detail: "",
      amount: 15000.5,
      paymentMethod: "MERCADOPAGO",
      observation,
      photo: "",
    })

  test("writes admissible expenses once per observation", async () => {
    const backend = makeMemoryBackend(emptyTables(tables))
    const layer = ExpenseLedger.Live.pipe(Layer.provide(MemoryTabularStore.layer(backend)))
    const record = (expenses: readonly Expense[]) =>
      Effect.runPromise(
        Effect.flatMap(ExpenseLedger, (ledger) => ledger.recordExpenses(expenses)).pipe(Effect.provide(layer))
      )

    const first = await record([expense("abc-1"), expense("ABC-1"), expense("op-2", "07/08/2025 00:00:00", "Uber")])
    const second = await record([expense("abc-1")])

    expect(first).toEqual({ written: 1, duplicates: 1, rejected: 1 })
    expect(second).toEqual({ written: 0, duplicates: 1, rejected: 0 })
    expect(backend.snapshot("GASTOS").slice(1)).toEqual([
      [
        "02/08/2025 00:00:00",
        "Veterinaria San Roque",
        "Veterinaria",
        "",
        "TESORERIA",
        "",
        "15000.50",
        "MERCADOPAGO",
        "abc-1",
        "",
      ],
    ])
  })
})

describe("runPostBatch", () => {
  test("counts each post by its outcome and skips recorded posts before extraction", async () => {
    const backend = makeMemoryBackend(emptyTables(tables))
    const replies: Record<string, string> = {
      "Soy Luna, hace 3 días": '["Luna", [[1, 1, "hace 3 días", null, 0]]]',
      "Jornada de vacunación": "0",
      "???": "not json",
    }
    const extractAnimal = vi.fn((_images: readonly ImagePayload[], caption: string, _asOf: Date) =>
      Either.match(decodeExtraction(replies[caption] ?? "0"), {
        onLeft: (error) => Effect.fail(error),
        onRight: (decoded) => Effect.succeed(decoded),
      })
    )
    const loadImages = vi.fn((record: SourceRecord) => Effect.succeed({ ...record, images: [photo] }))

    const layer = Layer.mergeAll(
      Reconciler.Live,
      Layer.succeed(PostSource, PostSource.of({ listPosts: () => Effect.succeed([]), loadImages }))
    ).pipe(
      Layer.provideMerge(
        Layer.succeed(
          AnimalExtractor,
          AnimalExtractor.of({ extractAnimal, extractProfiles: () => Effect.succeed([]) })
        )
      ),
      Layer.provide(MemoryTabularStore.layer(backend))
    )

    const luna = post("1", "Soy Luna, hace 3 días")
    const summary = await Effect.runPromise(
      runPostBatch([luna, post("2", "Jornada de vacunación"), post("3", "???"), luna]).pipe(Effect.provide(layer))
    )

    expect(summary).toEqual({ written: 1, duplicates: 1, institutional: 1, failed: 1 })
    expect(loadImages).toHaveBeenCalledTimes(3)
    expect(extractAnimal).toHaveBeenCalledTimes(3)
    expect(extractAnimal.mock.calls[0]?.[0]).toEqual([photo])
    expect(backend.snapshot("INTERACCION")).toHaveLength(2)
  })
})

describe("runReceiptBatch", () => {
  const file = (id: string): ReceiptFile => ({ id, name: `${id}.jpg`, url: `https://drive.google.com/uc?id=${id}` })

  const fields = (provider: string, date: string): ReceiptFields => ({
    date,
    provider,
    pet: "Luna",
    responsible: "",
    detail: "Consulta",
    amount: 1500,
    paymentMethod: "",
    notes: "",
  })

  test("records receipts and files each one by outcome", async () => {
    const backend = makeMemoryBackend(emptyTables(tables))
    const byFile: Record<string, ReceiptFields> = {
      vet: fields("Veterinaria San Roque", "09/08/2025"),
      taxi: fields("Uber", "07/08/2025"),
    }
    const settle = vi.fn((_file: ReceiptFile, _outcome: "ok" | "error") => Effect.void)

    const layer = Layer.mergeAll(
      ExpenseLedger.Live.pipe(Layer.provide(MemoryTabularStore.layer(backend))),
      Layer.succeed(
        ReceiptSource,
        ReceiptSource.of({
          listReceipts: () => Effect.succeed([]),
          download: (receipt) => Effect.succeed(ImagePayload.Url({ url: receipt.url })),
          settle,
        })
      ),
      Layer.succeed(
        ReceiptExtractor,
        ReceiptExtractor.of({
          extractReceipt: (image) => {
            const id = image._tag === "Url" ? image.url.split("=")[1] ?? "" : ""
            const found = byFile[id]
            return found
              ? Effect.succeed(found)
              : Effect.fail(new MalformedExtraction({ raw: "", cause: null, message: "Model output is not JSON" }))
          },
        })
      )
    )

    const summary = await Effect.runPromise(
      runReceiptBatch([file("vet"), file("blurry"), file("taxi"), file("vet")]).pipe(Effect.provide(layer))
    )

    expect(summary).toEqual({ written: 1, duplicates: 1, institutional: 0, failed: 2 })
    expect(settle.mock.calls.map(([receipt, outcome]) => [receipt.id, outcome])).toEqual([
      ["vet", "ok"],
      ["blurry", "error"],
      ["taxi", "error"],
      ["vet", "ok"],
    ])
    expect(backend.snapshot("GASTOS")[1]).toEqual([
      "09/08/2025",
      "Veterinaria San Roque",
      "Veterinaria",
      "Luna",
      "TESORERIA",
      "Consulta",
      "1500.00",
      "MERCADOPAGO",
      "vet",
      "https://drive.google.com/uc?id=vet",
    ])
  })
})

describe("runStatementBatch", () => {
  test("appends new debits and counts repeated ones as duplicates", async () => {
    const backend = makeMemoryBackend(emptyTables(tables))
    const text = readFileSync(new URL("./fixtures/statement.txt", import.meta.url), "utf8")

    const summary = await Effect.runPromise(
      runStatementBatch([
        { name: "agosto.txt", text },
        { name: "agosto-copia.txt", text },
      ]).pipe(Effect.provide(ExpenseLedger.Live.pipe(Layer.provide(MemoryTabularStore.layer(backend)))))
    )

    expect(summary).toEqual({ written: 4, duplicates: 4, institutional: 0, failed: 0 })
    expect(backend.snapshot("GASTOS")).toHaveLength(5)
  })

  test("counts a statement whose write fails", async () => {
    const backend = makeMemoryBackend(emptyTables(tables), { failWrites: true })
    const text = readFileSync(new URL("./fixtures/statement.txt", import.meta.url), "utf8")

    const summary = await Effect.runPromise(
      runStatementBatch([{ name: "agosto.txt", text }]).pipe(
        Effect.provide(ExpenseLedger.Live.pipe(Layer.provide(MemoryTabularStore.layer(backend))))
      )
    )

    expect(summary).toEqual({ written: 0, duplicates: 0, institutional: 0, failed: 1 })
  })
})
