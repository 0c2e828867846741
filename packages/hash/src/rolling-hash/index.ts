export * from "./rolling-hash.js";
