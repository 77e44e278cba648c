import pino from "pino";

/**
 * Creates the CLI logger. JSON lines go to stderr so that stdout stays free
 * for command output.
 */
export function createLogger(level: pino.LevelWithSilent = "info"): pino.Logger {
  return pino({ name: "tagpress", level, base: null }, pino.destination(2));
}

export type Logger = pino.Logger;
