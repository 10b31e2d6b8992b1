export * from "./config/index.js";
export * from "./context/index.js";
export * from "./ingest/index.js";
export * from "./tree/index.js";
export { ConfigurationError } from "./errors.js";
export { createLogger, silentLogger } from "./logging/logger.js";
export type { LogLevel, Logger, LoggerOptions } from "./logging/logger.js";
