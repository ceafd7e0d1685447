export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { Logger } from "./logger.js";
export type { ConsoleTransportOptions, JsonTransportOptions } from "./transports/index.js";
export { ConsoleTransport, JsonTransport } from "./transports/index.js";
export type { LogEntry, LogFields, LoggerOptions, LogLevel, LogTransport } from "./types.js";
export { levelRank, LOG_LEVELS } from "./types.js";
