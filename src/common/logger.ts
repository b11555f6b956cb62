export type LogLevel = "debug" | "info" | "warn" | "error";

/** The subset of `console` the library writes to. */
export type Logger = Pick<Console, LogLevel>;

let currentLogger: Logger = console;

/** Replaces the logger used by `LogTracer` defaults and tracer failures. */
export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function getLogger(): Logger {
  return currentLogger;
}
