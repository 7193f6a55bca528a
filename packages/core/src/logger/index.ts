export { ConsoleLogger, createLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
