export * from "./animal.js"
export * from "./event.js"
export * from "./interaction.js"
export * from "./expense.js"
export * from "./names.js"
export * from "./source.js"
export * from "./errors.js"
