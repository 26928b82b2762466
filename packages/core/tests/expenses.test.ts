import { describe, expect, test } from "vitest"
import { readFileSync } from "node:fs"
import { defaultExpenseRules } from "../src/config/rules.js"
import { Expense } from "../src/domain/expense.js"
import {
  classifyProvider,
  cleanDescription,
  isAdmissible,
  isExpenseCounterpart,
  parseAmount,
  parseStatement,
  statementExpenses,
} from "../src/expenses/index.js"
import { formatTimestamp } from "../src/temporal/index.js"

const statement = readFileSync(new URL("./fixtures/statement.txt", import.meta.url), "utf8")

const expense = (overrides: Partial<ConstructorParameters<typeof Expense>[0]> = {}) =>
  new Expense({
    date: "07/08/2025 00:00:00",
    provider: "Uber",
    category: "Transporte",
    pet: "",
    responsible: "TESORERIA",
    detail: "",
    amount: 2500,
    paymentMethod: "MERCADOPAGO",
    observation: "333444555666",
    photo: "",
    ...overrides,
  })

describe("classifyProvider", () => {
  test.each([
    ["Clínica Veterinaria Norte", "Veterinaria"],
    ["HOSPITAL VET del Sur", "Veterinaria"],
    ["Remis Express", "Transporte"],
    ["Cabify", "Transporte"],
    ["Superuber", "Alimentos"],
    ["Forrajeria El Trebol", "Alimentos"],
  ])("%s is %s", (provider, category) => {
    expect(classifyProvider(provider, defaultExpenseRules)).toBe(category)
  })
})

describe("expense admission", () => {
  test("recognises provider counterparts", () => {
    expect(isExpenseCounterpart("Pet Shop Los Amigos", defaultExpenseRules)).toBe(true)
    expect(isExpenseCounterpart("Kiosco Central", defaultExpenseRules)).toBe(false)
  })

  test("admits transport on weekends only", () => {
    expect(isAdmissible(expense())).toBe(false)
    expect(isAdmissible(expense({ date: "09/08/2025 00:00:00" }))).toBe(true)
    expect(isAdmissible(expense({ date: "10/08/2025" }))).toBe(true)
    expect(isAdmissible(expense({ date: "sin fecha" }))).toBe(false)
    expect(isAdmissible(expense({ category: "Alimentos" }))).toBe(true)
  })
})

describe("parseStatement", () => {
  test("parses amounts with thousands separators", () => {
    expect(parseAmount("-15.000,50")).toBe(-15000.5)
    expect(parseAmount("10.000,00")).toBe(10000)
  })

  test("strips the transfer prefixes", () => {
    expect(cleanDescription("Transferencia enviada Pet Shop")).toBe("Pet Shop")
    expect(cleanDescription("Pago Uber")).toBe("Uber")
  })

  test("reads single, two and three line movements and drops cancelled ones", () => {
    const lines = parseStatement(statement)
    expect(lines.map((line) => [formatTimestamp(line.date), line.description, line.operationId, line.amount])).toEqual([
      ["02/08/2025 00:00:00", "Transferencia enviada Veterinaria San Roque", "123456789012", -15000.5],
      ["04/08/2025 00:00:00", "Transferencia enviada Forrajeria El Trebol", "987654321001", -8200],
      ["06/08/2025 00:00:00", "Transferencia recibida Donante Uno", "222333444555", 10000],
      ["07/08/2025 00:00:00", "Pago Uber", "333444555666", -2500],
      ["09/08/2025 00:00:00", "Transferencia enviada Pet Shop Los Amigos", "555666777888", -3000],
      ["10/08/2025 00:00:00", "Pago Cabify", "444555666777", -1800],
    ])
  })

  test("keeps provider debits as admissible expenses", () => {
    const expenses = statementExpenses(parseStatement(statement), defaultExpenseRules)
    expect(expenses.map((e) => [e.date, e.provider, e.category, e.amount, e.observation])).toEqual([
      ["02/08/2025 00:00:00", "Veterinaria San Roque", "Veterinaria", 15000.5, "123456789012"],
      ["04/08/2025 00:00:00", "Forrajeria El Trebol", "Alimentos", 8200, "987654321001"],
      ["09/08/2025 00:00:00", "Pet Shop Los Amigos", "Alimentos", 3000, "555666777888"],
      ["10/08/2025 00:00:00", "Cabify", "Transporte", 1800, "444555666777"],
    ])
    expect(expenses[0]?.responsible).toBe("TESORERIA")
    expect(expenses[0]?.paymentMethod).toBe("MERCADOPAGO")
  })
})
