export * from "./event-codec.js"
export * from "./model-output.js"
