export * from "./facts/index.js";
export * from "./rules/index.js";
export * from "./report/index.js";
