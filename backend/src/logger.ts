import pino, { type Logger } from "pino";
import { getConfig } from "./config/env.js";

const config = getConfig();

export const logger = pino({
  name: "order-status-assistant",
  level: config.logLevel,
  redact: ["config.openaiApiKey", "req.headers.authorization"],
  transport:
    config.nodeEnv === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname",
          },
        }
      : undefined,
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
