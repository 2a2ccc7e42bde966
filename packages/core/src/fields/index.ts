export * from "./field.js";
export * from "./decimal.js";
export * from "./bits.js";
export * from "./enum.js";
export * from "./scaled.js";
export * from "./fraction.js";
export * from "./datetime.js";
export * from "./ipv4Address.js";
export * from "./float.js";
export * from "./stream.js";
