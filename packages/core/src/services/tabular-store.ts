import { Context, Effect } from "effect"
import { StoreWriteFailure, type TransientFailure } from "../domain/errors.js"

/** A data row keyed by its normalized (trimmed, lowercased) header. */
export type Row = Readonly<Record<string, string>>

export type Fields = Readonly<Record<string, string>>

export interface Mutation {
  readonly table: string
  readonly fields: Fields
}

export interface TabularStore {
  readonly getHeaders: (table: string) => Effect.Effect<readonly string[], TransientFailure>
  readonly findByColumn: (
    table: string,
    column: string,
    value: string
  ) => Effect.Effect<readonly Row[], TransientFailure>
  /** Largest integer in `column`; 0 when there is none. */
  readonly maxNumeric: (table: string, column: string) => Effect.Effect<number, TransientFailure>
  readonly getAll: (table: string) => Effect.Effect<readonly Row[], TransientFailure>
  readonly appendRow: (table: string, fields: Fields) => Effect.Effect<void, StoreWriteFailure>
  /** Appends every mutation or none of them. */
  readonly appendBatch: (mutations: readonly Mutation[]) => Effect.Effect<void, StoreWriteFailure>
}

export const TabularStore = Context.GenericTag<TabularStore>("@rescuelog/TabularStore")

export interface RowWrite {
  readonly table: string
  /** 1-based, header row included. */
  readonly rowNumber: number
  readonly values: readonly string[]
}

/** Raw cell access the store is built on: a spreadsheet, or memory. */
export interface TableBackend {
  readonly readValues: (table: string) => Effect.Effect<readonly (readonly string[])[], TransientFailure>
  readonly writeRows: (writes: readonly RowWrite[]) => Effect.Effect<void, StoreWriteFailure>
}

export const normalizeKey = (value: string): string => value.trim().toLowerCase()

const toRows = (values: readonly (readonly string[])[]): readonly Row[] => {
  const [header = [], ...data] = values
  const keys = header.map(normalizeKey)
  return data.map((cells) =>
    Object.fromEntries(keys.map((key, i) => [key, cells[i] ?? ""]))
  )
}

const toCells = (headers: readonly string[], fields: Fields): readonly string[] => {
  const byKey = new Map(Object.entries(fields).map(([key, value]) => [normalizeKey(key), value]))
  return headers.map((header) => byKey.get(normalizeKey(header)) ?? "")
}

export const makeTabularStore = (backend: TableBackend): TabularStore => {
  const getAll = (table: string) => Effect.map(backend.readValues(table), toRows)

  const planWrites = (mutations: readonly Mutation[]) =>
    Effect.gen(function* () {
      const tables = [...new Set(mutations.map((m) => m.table))]
      const nextRow = new Map<string, { headers: readonly string[]; rowNumber: number }>()

      for (const table of tables) {
        const values = yield* backend.readValues(table).pipe(
          Effect.mapError(
            (cause) => new StoreWriteFailure({ tables, cause, message: `Could not read ${table} before writing` })
          )
        )
        const headers = values[0] ?? []
        if (headers.length === 0) {
          return yield* new StoreWriteFailure({ tables, cause: null, message: `Table ${table} has no header row` })
        }
        nextRow.set(table, { headers, rowNumber: values.length + 1 })
      }

      const writes: RowWrite[] = []
      for (const { table, fields } of mutations) {
        const target = nextRow.get(table)
        if (!target) continue
        writes.push({ table, rowNumber: target.rowNumber, values: toCells(target.headers, fields) })
        nextRow.set(table, { ...target, rowNumber: target.rowNumber + 1 })
      }
      return writes
    })

  const appendBatch = (mutations: readonly Mutation[]) =>
    mutations.length === 0
      ? Effect.void
      : planWrites(mutations).pipe(Effect.flatMap(backend.writeRows))

  return {
    getHeaders: (table) => Effect.map(backend.readValues(table), (values) => values[0] ?? []),
    findByColumn: (table, column, value) =>
      Effect.map(getAll(table), (rows) => {
        const key = normalizeKey(column)
        const wanted = normalizeKey(value)
        return rows.filter((row) => normalizeKey(row[key] ?? "") === wanted)
      }),
    maxNumeric: (table, column) =>
      Effect.map(getAll(table), (rows) => {
        const key = normalizeKey(column)
        return rows.reduce((max, row) => {
          const cell = (row[key] ?? "").trim()
          return /^\d+$/.test(cell) ? Math.max(max, Number(cell)) : max
        }, 0)
      }),
    getAll,
    appendRow: (table, fields) => appendBatch([{ table, fields }]),
    appendBatch,
  }
}
