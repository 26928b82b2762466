import { describe, expect, test } from "vitest"
import { HttpClient, HttpClientResponse } from "@effect/platform"
import { ConfigProvider, Effect, Layer, Option } from "effect"
import { formatTimestamp } from "@rescuelog/core"
import { ReceiptSource } from "@rescuelog/core/services"
import { DriveClient, DriveReceiptSource, driveUrl, photoRecord } from "../src/drive.js"

const listing: Record<string, unknown> = {
  first: {
    files: [
      { id: "r1", name: "ticket-1.jpg", mimeType: "image/jpeg", createdTime: "2025-08-09T10:00:00.000Z" },
      { id: "doc", name: "notas.pdf", mimeType: "application/pdf", createdTime: "2025-08-09T11:00:00.000Z" },
    ],
    nextPageToken: "p2",
  },
  p2: {
    files: [{ id: "r2", name: "ticket-2.png", mimeType: "image/png", createdTime: "2025-08-10T09:30:00.000Z" }],
  },
}

interface Call {
  readonly method: string
  readonly url: URL
  readonly authorization: string | undefined
}

const fakeDrive = () => {
  const calls: Call[] = []
  const client = HttpClient.make((request, url) => {
    calls.push({ method: request.method, url, authorization: request.headers["authorization"] })
    const response =
      url.searchParams.get("alt") === "media"
        ? new Response(new Uint8Array([1, 2, 3]), { headers: { "content-type": "image/png; charset=binary" } })
        : new Response(JSON.stringify(request.method === "GET" ? listing[url.searchParams.get("pageToken") ?? "first"] : {}))
    return Effect.succeed(HttpClientResponse.fromWeb(request, response))
  })
  return { calls, layer: Layer.succeed(HttpClient.HttpClient, client) }
}

const configProvider = ConfigProvider.fromMap(
  new Map([
    ["GOOGLE_ACCESS_TOKEN", "test-secret"],
    ["DRIVE_API_URL", "https://drive.test/v3"],
    ["FOLDER_RECEIPTS", "folder-in"],
    ["FOLDER_OK", "folder-ok"],
    ["FOLDER_ERROR", "folder-error"],
  ])
)

const withReceipts = <A, E>(effect: Effect.Effect<A, E, ReceiptSource>, dryRun = false) => {
  const drive = fakeDrive()
  const run = effect.pipe(
    Effect.provide(DriveReceiptSource.layer({ dryRun }).pipe(Layer.provide(DriveClient.Live), Layer.provide(drive.layer))),
    Effect.withConfigProvider(configProvider)
  )
  return Effect.runPromise(run).then((result) => ({ result, calls: drive.calls }))
}

describe("photoRecord", () => {
  test("turns a Drive photo into a captionless record", () => {
    const record = Option.getOrThrow(
      photoRecord({ id: "f1", name: "luna.jpg", mimeType: "image/jpeg", createdTime: "2025-08-09T19:00:00.000Z" })
    )
    expect(formatTimestamp(record.publishedAt)).toBe("09/08/2025 19:00:00")
    expect(record.permalink).toBe(driveUrl("f1"))
    expect(record.caption).toBe("")
  })
})

describe("DriveReceiptSource", () => {
  test("lists the images of the receipts folder across pages", async () => {
    const { result, calls } = await withReceipts(Effect.flatMap(ReceiptSource, (source) => source.listReceipts()))

    expect(result).toEqual([
      { id: "r1", name: "ticket-1.jpg", url: "https://drive.google.com/uc?id=r1" },
      { id: "r2", name: "ticket-2.png", url: "https://drive.google.com/uc?id=r2" },
    ])
    expect(calls).toHaveLength(2)
    expect(calls[0]?.url.searchParams.get("q")).toBe("'folder-in' in parents and trashed = false")
    expect(calls[0]?.authorization).toBe("Bearer test-secret")
    expect(calls[1]?.url.searchParams.get("pageToken")).toBe("p2")
  })

  test("downloads a receipt with its content type", async () => {
    const file = { id: "r2", name: "ticket-2.png", url: driveUrl("r2") }
    const { result } = await withReceipts(Effect.flatMap(ReceiptSource, (source) => source.download(file)))

    expect(result._tag).toBe("Bytes")
    expect(result._tag === "Bytes" && result.mimeType).toBe("image/png")
    expect(result._tag === "Bytes" && [...result.data]).toEqual([1, 2, 3])
  })

  test("moves a settled receipt to its outcome folder", async () => {
    const file = { id: "r1", name: "ticket-1.jpg", url: driveUrl("r1") }
    const { calls } = await withReceipts(Effect.flatMap(ReceiptSource, (source) => source.settle(file, "error")))

    expect(calls).toHaveLength(1)
    expect(calls[0]?.method).toBe("PATCH")
    expect(calls[0]?.url.pathname).toBe("/v3/files/r1")
    expect(calls[0]?.url.searchParams.get("addParents")).toBe("folder-error")
    expect(calls[0]?.url.searchParams.get("removeParents")).toBe("folder-in")
  })

  test("only logs the move in a dry run", async () => {
    const file = { id: "r1", name: "ticket-1.jpg", url: driveUrl("r1") }
    const { calls } = await withReceipts(
      Effect.flatMap(ReceiptSource, (source) => source.settle(file, "ok")),
      true
    )

    expect(calls).toEqual([])
  })
})
