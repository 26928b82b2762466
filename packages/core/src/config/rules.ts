import { Schema } from "effect"
import rulesJson from "../../data/expense-rules.json" with { type: "json" }
import aliasesJson from "../../data/name-aliases.json" with { type: "json" }
import type { NameAliases } from "../domain/names.js"

export const ExpenseRules = Schema.Struct({
  /** A statement debit is an expense when its counterpart contains one of these. */
  expenseKeywords: Schema.Array(Schema.String),
  veterinaryPatterns: Schema.Array(Schema.String),
  transportPatterns: Schema.Array(Schema.String),
  paymentMethod: Schema.String,
  responsible: Schema.String,
})
export type ExpenseRules = typeof ExpenseRules.Type

export const defaultExpenseRules: ExpenseRules = Schema.decodeUnknownSync(ExpenseRules)(rulesJson)

export const defaultNameAliases: NameAliases = new Map(
  Object.entries(Schema.decodeUnknownSync(Schema.Record({ key: Schema.String, value: Schema.String }))(aliasesJson))
)
