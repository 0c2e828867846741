export * from "./var-uint.js";
