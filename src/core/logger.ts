import pino, { type Logger, type LoggerOptions } from "pino";

export interface GroundworkLoggerOptions extends LoggerOptions {
  pretty?: boolean;
  verbose?: boolean;
}

// Manifest entries and command errors may carry these
const REDACTED_PATHS = ["passphrase", "password", "*.passphrase", "*.password"];

/**
 * Run logger. `verbose` lowers the level to debug; `pretty` switches from JSON
 * lines to pino-pretty on stderr, keeping stdout for the ink view.
 */
export function createLogger(options: GroundworkLoggerOptions = {}): Logger {
  const { pretty = true, verbose = false, ...pinoOptions } = options;
  const transport = pretty
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: true,
          ignore: "pid,hostname",
          destination: 2,
        },
      }
    : undefined;
  return pino({
    name: "groundwork",
    level: verbose ? "debug" : "info",
    redact: REDACTED_PATHS,
    transport,
    ...pinoOptions,
  });
}
