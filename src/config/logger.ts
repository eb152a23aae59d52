import winston from "winston";

let logger: winston.Logger | null = null;

type LevelName = "debug" | "info" | "warn" | "error";

function getLogLevel(): LevelName {
  const logLevel = process.env.LOG_LEVEL?.toLowerCase() || "info";

  switch (logLevel) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return logLevel;
    default:
      return "info";
  }
}

function initializeLogger(): winston.Logger {
  return winston.createLogger({
    level: getLogLevel(),
    format: winston.format.printf((record) =>
      `[${record.level.toUpperCase()}] ${String(record.message)}`
    ),
    transports: [
      // All levels to stderr
      new winston.transports.Console({
        stderrLevels: ["debug", "info", "warn", "error"],
      }),
    ],
  });
}

function getLoggerSafe(): winston.Logger {
  if (!logger) {
    logger = initializeLogger();
  }
  return logger;
}

export function debug(message: string): void {
  getLoggerSafe().debug(message);
}

export function warn(message: string): void {
  getLoggerSafe().warn(message);
}
