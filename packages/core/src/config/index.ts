export * from "./ai.js"
export * from "./store.js"
export * from "./rules.js"
export * from "./load.js"
