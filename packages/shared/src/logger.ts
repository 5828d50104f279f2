import pino from "pino";

export type Logger = pino.Logger;

/**
 * Root logger. Writes to stderr so log lines never interleave with the
 * activity prompt on stdout.
 */
export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({ name: "tcx-bridge", level }, pino.destination({ dest: 2, sync: true }));
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
