export * from "./llm/client.js"
export * from "./llm/errors.js"
export * from "./llm/types.js"
export * from "./llm/completion.js"
export * from "./animal-extractor.js"
export * from "./receipt-extractor.js"
export * from "./tabular-store.js"
export * from "./memory-store.js"
export * from "./reconciler.js"
export * from "./expense-ledger.js"
export * from "./record-sources.js"
