import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  const options: pino.LoggerOptions = {
    level,
    base: { service: "amicus" },
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    // A transport and a destination cannot be combined; files get JSON lines.
    return pino({ level, base: { service: "amicus" } }, pino.destination(config.file));
  }

  return pino(options);
}

/** Logger that drops everything; used where no sink is configured. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
