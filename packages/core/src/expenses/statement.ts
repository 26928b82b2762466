import { Option } from "effect"
import { Expense } from "../domain/expense.js"
import type { ExpenseRules } from "../config/rules.js"
import { formatTimestamp, makeTimestamp } from "../temporal/timestamp.js"
import { classifyProvider, isAdmissible, isExpenseCounterpart } from "./classifier.js"

export interface StatementLine {
  readonly date: Date
  readonly description: string
  readonly operationId: string
  readonly amount: number
}

const DATE = String.raw`(\d{2})-(\d{2})-(\d{4})`
const AMOUNT = String.raw`\$\s*(-?[\d.,]+)`

const SINGLE_LINE = new RegExp(String.raw`${DATE}\s+((?:Transferencia|Pago)\s+.+?)\s+(\d{9,})\s+${AMOUNT}`)
const DATED_DESCRIPTION = new RegExp(String.raw`${DATE}\s+(Transferencia\s+.+?)\s*$`)
const DESCRIPTION_ONLY = /^\s*(Transferencia\s+.+?)\s*$/
const ID_AND_AMOUNT = new RegExp(String.raw`(\d{9,}).*?${AMOUNT}`)
const DATED_ID_AND_AMOUNT = new RegExp(String.raw`${DATE}\s+(\d{9,})\s+${AMOUNT}`)
const STARTS_WITH_DATE = /^\s*\d{2}-\d{2}-\d{4}/
const OPERATION_ID = /\d{9,}/

const PREFIXES = ["Transferencia recibida", "Transferencia enviada", "Transferencia", "Pago"]

/** `1.234,56` */
export const parseAmount = (raw: string): number => Number(raw.replace(/\./g, "").replace(",", "."))

export const cleanDescription = (description: string): string => {
  const prefix = PREFIXES.find((p) => description.startsWith(p))
  return prefix === undefined ? description.trim() : description.slice(prefix.length).trim()
}

const toDate = (day: string | undefined, month: string | undefined, year: string | undefined) =>
  makeTimestamp(Number(year), Number(month), Number(day))

const line = (
  date: Option.Option<Date>,
  description: string,
  operationId: string,
  amount: string
): Option.Option<StatementLine> =>
  Option.map(date, (at) => ({ date: at, description, operationId, amount: parseAmount(amount) }))

interface Match {
  readonly line: StatementLine
  readonly consumed: number
}

const matchAt = (lines: readonly string[], i: number): Option.Option<Match> => {
  const current = lines[i] ?? ""
  const next = lines[i + 1] ?? ""

  const single = current.match(SINGLE_LINE)
  if (single) {
    return line(toDate(single[1], single[2], single[3]), single[4] ?? "", single[5] ?? "", single[6] ?? "").pipe(
      Option.map((found) => ({ line: found, consumed: 1 }))
    )
  }

  const dated = current.match(DATED_DESCRIPTION)
  const idAndAmount = next.match(ID_AND_AMOUNT)
  if (dated && idAndAmount && !STARTS_WITH_DATE.test(next)) {
    return line(toDate(dated[1], dated[2], dated[3]), dated[4] ?? "", idAndAmount[1] ?? "", idAndAmount[2] ?? "").pipe(
      Option.map((found) => ({ line: found, consumed: 2 }))
    )
  }

  const description = current.match(DESCRIPTION_ONLY)
  const parts = next.match(DATED_ID_AND_AMOUNT)
  if (description && parts) {
    const third = (lines[i + 2] ?? "").trim()
    const continues = third !== "" && !STARTS_WITH_DATE.test(third) && !OPERATION_ID.test(third)
    const text = continues ? `${description[1] ?? ""} ${third}` : description[1] ?? ""
    return line(toDate(parts[1], parts[2], parts[3]), text, parts[4] ?? "", parts[5] ?? "").pipe(
      Option.map((found) => ({ line: found, consumed: continues ? 3 : 2 }))
    )
  }

  return Option.none()
}

/**
 * Transfer and payment lines of a bank statement exported as text, including
 * descriptions wrapped over two or three lines. Cancelled transfers are dropped.
 */
export const parseStatement = (text: string): readonly StatementLine[] => {
  const lines = text.split(/\r?\n/)
  const found: StatementLine[] = []
  let i = 0
  while (i < lines.length) {
    const current = lines[i] ?? ""
    const match = /Transferencia|Pago /.test(current) ? matchAt(lines, i) : Option.none()
    if (Option.isSome(match)) {
      found.push(match.value.line)
      i += match.value.consumed
    } else {
      i += 1
    }
  }
  return found.filter(({ description }) => !/transferencia cancelada/i.test(description))
}

/** Debits to known providers, as admissible expenses keyed by operation id. */
export const statementExpenses = (lines: readonly StatementLine[], rules: ExpenseRules): readonly Expense[] =>
  lines
    .filter(({ amount, description }) => amount < 0 && isExpenseCounterpart(cleanDescription(description), rules))
    .map(({ date, description, operationId, amount }) => {
      const provider = cleanDescription(description)
      return new Expense({
        date: formatTimestamp(date),
        provider,
        category: classifyProvider(provider, rules),
        pet: "",
        responsible: rules.responsible,
        detail: "",
        amount: Math.abs(amount),
        paymentMethod: rules.paymentMethod,
        observation: operationId,
        photo: "",
      })
    })
    .filter(isAdmissible)
