import { formatCoat, type Animal } from "../domain/animal.js"
import type { AnimalEvent } from "../domain/event.js"
import type { Expense } from "../domain/expense.js"
import type { Interaction } from "../domain/interaction.js"
import type { TableNames } from "../config/store.js"
import type { Fields, Mutation } from "../services/tabular-store.js"

export const ANIMAL_COLUMNS = [
  "id",
  "nombre",
  "fecha",
  "tipo_animal",
  "ubicacion",
  "edad",
  "color_de_pelo",
  "condicion_de_salud_inicial",
  "activo",
  "fecha_actualizacion",
] as const

export const EVENT_COLUMNS = [
  "animal_id",
  "ubicacion_id",
  "estado_id",
  "persona_id",
  "tipo_relacion_id",
  "fecha",
] as const

export const INTERACTION_COLUMNS = ["animal_id", "fecha", "post_id", "contenido", "media_url"] as const

export const EXPENSE_COLUMNS = [
  "fecha",
  "proveedor",
  "tipo_gasto",
  "mascota",
  "responsable",
  "detalle",
  "monto",
  "forma_pago",
  "observacion",
  "foto",
] as const

type RowOf<C extends readonly string[]> = { readonly [K in C[number]]: string }

export const animalFields = (animal: Animal): RowOf<typeof ANIMAL_COLUMNS> => ({
  id: String(animal.id),
  nombre: animal.name,
  fecha: animal.registeredAt,
  tipo_animal: animal.species,
  ubicacion: animal.location,
  edad: animal.age,
  color_de_pelo: formatCoat(animal.coat),
  condicion_de_salud_inicial: animal.health,
  activo: animal.active ? "TRUE" : "FALSE",
  fecha_actualizacion: animal.updatedAt,
})

export const eventFields = (event: AnimalEvent): RowOf<typeof EVENT_COLUMNS> => ({
  animal_id: String(event.animalId),
  ubicacion_id: String(event.location),
  estado_id: String(event.status),
  persona_id: event.person ?? "",
  tipo_relacion_id: event.relation === null ? "" : String(event.relation),
  fecha: event.at,
})

export const interactionFields = (interaction: Interaction): RowOf<typeof INTERACTION_COLUMNS> => ({
  animal_id: String(interaction.animalId),
  fecha: interaction.at,
  post_id: interaction.postId,
  contenido: interaction.permalink,
  media_url: interaction.mediaUrl,
})

export const expenseFields = (expense: Expense): RowOf<typeof EXPENSE_COLUMNS> => ({
  fecha: expense.date,
  proveedor: expense.provider,
  tipo_gasto: expense.category,
  mascota: expense.pet,
  responsable: expense.responsible,
  detalle: expense.detail,
  monto: expense.amount.toFixed(2),
  forma_pago: expense.paymentMethod,
  observacion: expense.observation,
  foto: expense.photo,
})

export type StoredRecord =
  | { readonly _tag: "Animal"; readonly value: Animal }
  | { readonly _tag: "Event"; readonly value: AnimalEvent }
  | { readonly _tag: "Interaction"; readonly value: Interaction }
  | { readonly _tag: "Expense"; readonly value: Expense }

export const toMutation = (tables: TableNames, record: StoredRecord): Mutation => {
  const fields: Fields = (() => {
    switch (record._tag) {
      case "Animal":
        return animalFields(record.value)
      case "Event":
        return eventFields(record.value)
      case "Interaction":
        return interactionFields(record.value)
      case "Expense":
        return expenseFields(record.value)
    }
  })()
  const table = {
    Animal: tables.animal,
    Event: tables.event,
    Interaction: tables.interaction,
    Expense: tables.expense,
  }[record._tag]
  return { table, fields }
}

/** Header rows of an empty spreadsheet. */
export const emptyTables = (tables: TableNames): Record<string, readonly (readonly string[])[]> => ({
  [tables.animal]: [ANIMAL_COLUMNS],
  [tables.event]: [EVENT_COLUMNS],
  [tables.interaction]: [INTERACTION_COLUMNS],
  [tables.expense]: [EXPENSE_COLUMNS],
})
