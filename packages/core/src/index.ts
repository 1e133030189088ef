export * from "./config/index.js";
export * from "./services/index.js";
export * from "./tools/index.js";
