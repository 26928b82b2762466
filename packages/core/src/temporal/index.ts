export * from "./timestamp.js"
export * from "./resolver.js"
