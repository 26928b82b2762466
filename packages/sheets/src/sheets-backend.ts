import { HttpBody, HttpClient, HttpClientRequest } from "@effect/platform"
import { Effect, Layer, Redacted, Schema } from "effect"
import {
  loadConfig,
  StoreWriteFailure,
  TransientFailure,
  type ConfigurationError,
} from "@rescuelog/core"
import {
  makeOverlayBackend,
  makeTabularStore,
  TabularStore,
  type RowWrite,
  type TableBackend,
} from "@rescuelog/core/services"
import { REQUEST_TIMEOUT, sheetsConfig } from "./config.js"

const ValueRange = Schema.Struct({
  range: Schema.optional(Schema.String),
  values: Schema.optional(Schema.Array(Schema.Array(Schema.Union(Schema.String, Schema.Number, Schema.Boolean)))),
})

/** A1 range of a whole sheet, quoted. */
export const sheetRange = (table: string, cell = ""): string =>
  `'${table.replace(/'/g, "''")}'${cell === "" ? "" : `!${cell}`}`

// RAW keeps dates and model text as written: no locale parsing, no formulas.
export const batchUpdateBody = (writes: readonly RowWrite[]) => ({
  valueInputOption: "RAW",
  data: writes.map(({ table, rowNumber, values }) => ({
    range: sheetRange(table, `A${rowNumber}`),
    majorDimension: "ROWS",
    values: [values],
  })),
})

const describe = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause))

export const makeSheetsBackend: Effect.Effect<TableBackend, ConfigurationError, HttpClient.HttpClient> = Effect.gen(
  function* () {
    const { accessToken, spreadsheetId, baseUrl } = yield* loadConfig(sheetsConfig)
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(HttpClientRequest.bearerToken(Redacted.value(accessToken)))
    )
    const root = `${baseUrl}/spreadsheets/${spreadsheetId}`

    const backend: TableBackend = {
      readValues: (table) =>
        client.get(`${root}/values/${encodeURIComponent(sheetRange(table))}`).pipe(
          Effect.flatMap((res) => res.json),
          Effect.flatMap(Schema.decodeUnknown(ValueRange)),
          Effect.map(({ values = [] }) => values.map((row) => row.map(String))),
          Effect.timeout(REQUEST_TIMEOUT),
          Effect.scoped,
          Effect.mapError(
            (cause) => new TransientFailure({ operation: "sheets.readValues", cause, message: describe(cause) })
          )
        ),

      writeRows: (writes) =>
        writes.length === 0
          ? Effect.void
          : client
              .post(`${root}/values:batchUpdate`, { body: HttpBody.unsafeJson(batchUpdateBody(writes)) })
              .pipe(
                Effect.asVoid,
                Effect.timeout(REQUEST_TIMEOUT),
                Effect.scoped,
                Effect.mapError(
                  (cause) =>
                    new StoreWriteFailure({
                      tables: [...new Set(writes.map((w) => w.table))],
                      cause,
                      message: describe(cause),
                    })
                )
              ),
    }
    return backend
  }
)

export interface SheetsStoreOptions {
  /** Keep writes in memory; reads still come from the spreadsheet. */
  readonly dryRun?: boolean
}

export const SheetsTabularStore = {
  layer: (
    options: SheetsStoreOptions = {}
  ): Layer.Layer<TabularStore, ConfigurationError, HttpClient.HttpClient> =>
    Layer.effect(
      TabularStore,
      Effect.map(makeSheetsBackend, (backend) =>
        makeTabularStore(options.dryRun ? makeOverlayBackend(backend) : backend)
      )
    ),
}
