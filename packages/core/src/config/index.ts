export { loadConfig, isLogLevel, LOG_LEVELS } from "./config";
export type { RequestKitConfig, LogLevel } from "./config";
