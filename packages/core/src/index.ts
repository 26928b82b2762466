export * from "./domain/index.js"
export * from "./temporal/index.js"
export * from "./codec/index.js"
export * from "./config/index.js"
export * from "./reconcile/index.js"
export * from "./store/index.js"
export * from "./expenses/index.js"
export * from "./prompts.js"
