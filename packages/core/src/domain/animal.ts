import { Schema } from "effect"

export const CoatColor = Schema.Struct({
  color: Schema.String,
  percentage: Schema.Number,
})
export type CoatColor = typeof CoatColor.Type

export const UNDETERMINED = "No determinado"

export class Animal extends Schema.Class<Animal>("Animal")({
  id: Schema.Int.pipe(Schema.positive()),
  name: Schema.NonEmptyString,
  registeredAt: Schema.String,
  species: Schema.String,
  location: Schema.String,
  age: Schema.String,
  coat: Schema.Array(CoatColor),
  health: Schema.String,
  active: Schema.Boolean,
  updatedAt: Schema.String,
}) {}

/** Attributes read from photos and caption for a newly registered animal. */
export const AnimalProfile = Schema.Struct({
  name: Schema.String,
  species: Schema.String,
  location: Schema.String,
  age: Schema.String,
  coat: Schema.Array(CoatColor),
  health: Schema.String,
})
export type AnimalProfile = typeof AnimalProfile.Type

export const undeterminedProfile = (name: string): AnimalProfile => ({
  name,
  species: UNDETERMINED,
  location: UNDETERMINED,
  age: UNDETERMINED,
  coat: [],
  health: UNDETERMINED,
})

export const formatCoat = (coat: readonly CoatColor[]): string =>
  coat.map(({ color, percentage }) => `${color} ${percentage}%`).join(", ")
