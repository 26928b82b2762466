export * from "./events.js"
export * from "./plan.js"
