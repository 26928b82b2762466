export * from "./classifier.js"
export * from "./statement.js"
export * from "./receipt.js"
