/**
 * pino logger shared by the CLI and the library.
 *
 * Logs go to stderr so that stdout carries only command output.
 */
import pino, { type Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger } from "pino";

export function createLogger(level: LogLevel = "warn"): Logger {
  return pino(
    { name: "dbee", level },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** A logger that drops everything; the library default. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
