export * from "./instagram.js"
export * from "./drive.js"
