import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  // pretty output goes through a worker thread; skip it when nothing is logged
  const transport = isJson || level === "silent" || config?.file
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
      };

  const options: pino.LoggerOptions = {
    name: "credence",
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  return pino(options);
}

/** Child logger tagged with the component that owns it. */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
