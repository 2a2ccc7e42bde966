export * from "./buffer.js";
export * from "./byteOrder.js";
export * from "./constants.js";
export * from "./cursor.js";
export * from "./errors.js";
export * from "./interface.js";
export * from "./options.js";
export {getDefaultLogger} from "./logger.js";
export * from "./fields/index.js";
export * from "./containers/index.js";
export * from "./pointers/index.js";
export * from "./providers/index.js";
