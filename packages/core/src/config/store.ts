import { Config } from "effect"

export interface TableNames {
  readonly animal: string
  readonly event: string
  readonly interaction: string
  readonly expense: string
}

export const tableNames: Config.Config<TableNames> = Config.all({
  animal: Config.string("SHEET_ANIMAL").pipe(Config.withDefault("ANIMAL")),
  event: Config.string("SHEET_EVENT").pipe(Config.withDefault("EVENTO")),
  interaction: Config.string("SHEET_INTERACTION").pipe(Config.withDefault("INTERACCION")),
  expense: Config.string("SHEET_EXPENSE").pipe(Config.withDefault("GASTOS")),
})
