export * from "./rows.js"
