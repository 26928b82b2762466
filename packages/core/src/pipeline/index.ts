export * from "./summary.js"
export * from "./posts.js"
export * from "./receipts.js"
export * from "./statements.js"
