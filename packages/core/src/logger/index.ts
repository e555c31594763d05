export { createLogger, resolveLogLevel, isLogLevel, logger } from "./logger";
export type { Logger, LogLevel } from "./logger";
