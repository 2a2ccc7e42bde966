export * from "./container.js";
export * from "./structure.js";
export * from "./sequence.js";
export * from "./array.js";
