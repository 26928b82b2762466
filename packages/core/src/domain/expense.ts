import { Schema } from "effect"

export const ExpenseCategory = Schema.Literal("Veterinaria", "Transporte", "Alimentos")
export type ExpenseCategory = typeof ExpenseCategory.Type

export class Expense extends Schema.Class<Expense>("Expense")({
  /** `DD/MM/YYYY HH:MM:SS`, or a day as printed on a receipt */
  date: Schema.String,
  provider: Schema.String,
  category: ExpenseCategory,
  pet: Schema.String,
  responsible: Schema.String,
  detail: Schema.String,
  amount: Schema.Number,
  paymentMethod: Schema.String,
  /** Operation id or source file id; the dedup key of an expense. */
  observation: Schema.NonEmptyString,
  photo: Schema.String,
}) {}
