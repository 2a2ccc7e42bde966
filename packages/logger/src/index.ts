export * from "./interface.js";
export {createWinstonLogger, WinstonLogger} from "./winston.js";
export {ConsoleTransport} from "./utils/consoleTransport.js";
export {getEnvLogger, getEnvLogLevel} from "./env.js";
export {getEmptyLogger} from "./empty.js";
