// Re-export all hash algorithms

export * from "./rolling-hash/index.js";
