export * from "./constants.js";
export * from "./delta/index.js";
export * from "./encoding/index.js";
export * from "./errors.js";
export * from "./io/index.js";
