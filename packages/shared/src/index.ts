export * from "./protocol/index.js";
export * from "./utils/index.js";
