import { Effect, Layer } from "effect"
import { StoreWriteFailure } from "../domain/errors.js"
import { makeTabularStore, TabularStore, type TableBackend } from "./tabular-store.js"

export interface MemoryBackend extends TableBackend {
  /** Current cells of `table`, header row first. */
  readonly snapshot: (table: string) => readonly (readonly string[])[]
}

export interface MemoryBackendOptions {
  /** Makes every write fail, leaving the tables untouched. */
  readonly failWrites?: boolean
}

export const makeMemoryBackend = (
  initial: Readonly<Record<string, readonly (readonly string[])[]>>,
  options: MemoryBackendOptions = {}
): MemoryBackend => {
  const tables = new Map<string, string[][]>(
    Object.entries(initial).map(([name, rows]) => [name, rows.map((row) => [...row])])
  )

  return {
    readValues: (table) => Effect.sync(() => tables.get(table) ?? []),
    writeRows: (writes) =>
      Effect.gen(function* () {
        const names = [...new Set(writes.map((w) => w.table))]
        if (options.failWrites) {
          return yield* new StoreWriteFailure({ tables: names, cause: null, message: "Writes are disabled" })
        }
        const missing = names.filter((name) => !tables.has(name))
        if (missing.length > 0) {
          return yield* new StoreWriteFailure({ tables: names, cause: missing, message: `Unknown table ${missing.join(", ")}` })
        }
        for (const { table, rowNumber, values } of writes) {
          const rows = tables.get(table) ?? []
          while (rows.length < rowNumber - 1) rows.push([])
          rows[rowNumber - 1] = [...values]
          tables.set(table, rows)
        }
      }),
    snapshot: (table) => tables.get(table) ?? [],
  }
}

/** Store over memory-held tables, used by `--dry-run` and tests. */
export const MemoryTabularStore = {
  layer: (backend: MemoryBackend): Layer.Layer<TabularStore> =>
    Layer.succeed(TabularStore, makeTabularStore(backend)),
}

/**
 * Reads each table from `base` once and keeps writes in memory, so a dry run
 * sees its own rows without touching the real tables.
 */
export const makeOverlayBackend = (base: TableBackend): MemoryBackend => {
  const copies = new Map<string, string[][]>()

  const copyOf = (table: string) =>
    Effect.gen(function* () {
      const cached = copies.get(table)
      if (cached) return cached
      const values = yield* base.readValues(table)
      const copy = values.map((row) => [...row])
      copies.set(table, copy)
      return copy
    })

  return {
    readValues: copyOf,
    writeRows: (writes) =>
      Effect.gen(function* () {
        for (const table of new Set(writes.map((w) => w.table))) {
          yield* copyOf(table).pipe(
            Effect.mapError((cause) => new StoreWriteFailure({ tables: [table], cause, message: `Could not read ${table}` }))
          )
        }
        for (const { table, rowNumber, values } of writes) {
          const rows = copies.get(table) ?? []
          rows[rowNumber - 1] = [...values]
          copies.set(table, rows)
          yield* Effect.logInfo(`[dry-run] ${table} row ${rowNumber}: ${values.join(" | ")}`)
        }
      }),
    snapshot: (table) => copies.get(table) ?? [],
  }
}
