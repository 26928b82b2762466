import { Option } from "effect"
import type { ExpenseRules } from "../config/rules.js"
import type { Expense, ExpenseCategory } from "../domain/expense.js"
import { isWeekend, parseDayOrTimestamp } from "../temporal/timestamp.js"

const fold = (value: string): string =>
  value.normalize("NFD").replace(/\p{M}+/gu, "").toUpperCase()

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")

const startsAWord = (text: string, pattern: string): boolean =>
  new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(fold(pattern))}`, "u").test(text)

export const classifyProvider = (name: string, rules: ExpenseRules): ExpenseCategory => {
  const provider = fold(name)
  if (rules.veterinaryPatterns.some((pattern) => startsAWord(provider, pattern))) return "Veterinaria"
  if (rules.transportPatterns.some((pattern) => startsAWord(provider, pattern))) return "Transporte"
  return "Alimentos"
}

/** A statement counterpart the organisation spends money with. */
export const isExpenseCounterpart = (name: string, rules: ExpenseRules): boolean => {
  const counterpart = fold(name)
  return rules.expenseKeywords.some((keyword) => counterpart.includes(fold(keyword)))
}

/** Transport is only reimbursed on Saturdays and Sundays. */
export const isAdmissible = (expense: Expense): boolean =>
  expense.category !== "Transporte" ||
  Option.match(parseDayOrTimestamp(expense.date), { onNone: () => false, onSome: isWeekend })
