import pino from "pino";

/**
 * Builds the harvest logger: JSON lines with string level labels and ISO
 * timestamps. `LOG_LEVEL` overrides the default `info`; output goes to
 * stdout unless a destination is given.
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "paper-harvest",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
