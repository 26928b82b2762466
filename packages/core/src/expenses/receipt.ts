import type { ExpenseRules } from "../config/rules.js"
import { Expense } from "../domain/expense.js"
import type { ReceiptFields } from "../services/receipt-extractor.js"
import { classifyProvider } from "./classifier.js"

export interface ReceiptOrigin {
  /** Drive file id; the dedup key. */
  readonly fileId: string
  readonly photoUrl: string
}

export const receiptExpense = (fields: ReceiptFields, origin: ReceiptOrigin, rules: ExpenseRules): Expense =>
  new Expense({
    date: fields.date,
    provider: fields.provider,
    category: classifyProvider(fields.provider, rules),
    pet: fields.pet,
    responsible: fields.responsible || rules.responsible,
    detail: fields.notes ? `${fields.detail} (${fields.notes})`.trim() : fields.detail,
    amount: fields.amount,
    paymentMethod: fields.paymentMethod || rules.paymentMethod,
    observation: origin.fileId,
    photo: origin.photoUrl,
  })
