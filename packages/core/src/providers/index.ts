export * from "./provider.js";
export * from "./memory.js";
export * from "./file.js";
