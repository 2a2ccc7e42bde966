export * from "./pointer.js";
export * from "./structurePointer.js";
export * from "./sequencePointer.js";
export * from "./streamPointer.js";
