/**
 * Runtime configuration for the request kit.
 *
 * The builders are pure transformations, so the only tunable is how loudly they
 * report. Values come from the process environment:
 *
 * - `LOG_LEVEL`: one of {@link LOG_LEVELS}; unknown values fall back to "info".
 * - `NODE_ENV=test`: silences logging unless `LOG_LEVEL` is set explicitly.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface RequestKitConfig {
  logLevel: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RequestKitConfig {
  const requested = env['LOG_LEVEL']?.trim().toLowerCase();

  if (requested && isLogLevel(requested)) {
    return { logLevel: requested };
  }

  return {
    logLevel: env['NODE_ENV'] === "test" ? "silent" : "info"
  };
}
