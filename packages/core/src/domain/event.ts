import { Schema } from "effect"

export const LocationCode = Schema.Literal(1, 2, 3, 4)
export type LocationCode = typeof LocationCode.Type

export const LOCATION_LABELS: Record<LocationCode, string> = {
  1: "Refugio",
  2: "Transito",
  3: "Veterinaria",
  4: "Hogar adoptante",
}

export const StatusCode = Schema.Literal(1, 2, 3, 5, 6)
export type StatusCode = typeof StatusCode.Type

export const STATUS_LABELS: Record<StatusCode, string> = {
  1: "Perdido",
  2: "En tratamiento",
  3: "En adopcion",
  5: "Adoptado",
  6: "Fallecido",
}

export const RelationCode = Schema.Literal(1, 2, 3, 4, 5)
export type RelationCode = typeof RelationCode.Type

export const RELATION_LABELS: Record<RelationCode, string> = {
  1: "Adoptante",
  2: "Transitante",
  3: "Veterinario",
  4: "Voluntario",
  5: "Interesado",
}

// Deceased > Adopted > InAdoption > InTreatment > Lost
const PRECEDENCE: Record<StatusCode, number> = { 6: 5, 5: 4, 3: 3, 2: 2, 1: 1 }

export const statusRank = (status: StatusCode): number => PRECEDENCE[status]

export class AnimalEvent extends Schema.Class<AnimalEvent>("AnimalEvent")({
  animalId: Schema.Int.pipe(Schema.positive()),
  location: LocationCode,
  status: StatusCode,
  /** `DD/MM/YYYY HH:MM:SS`, or `""` when the phrase could not be resolved. */
  at: Schema.String,
  person: Schema.NullOr(Schema.String),
  relation: Schema.NullOr(RelationCode),
}) {}
