export * from "./config.js"
export * from "./sheets-backend.js"
