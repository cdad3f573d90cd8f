import pino, { type LoggerOptions } from "pino";

const nodeEnv = process.env.NODE_ENV ?? "development";

const defaultLevel = (): string => {
  if (nodeEnv === "test") return "silent";
  return nodeEnv === "production" ? "info" : "debug";
};

const options: LoggerOptions = { level: process.env.LOG_LEVEL ?? defaultLevel() };

if (nodeEnv !== "production" && nodeEnv !== "test") {
  options.transport = {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
    },
  };
}

export const logger = pino(options);

export type Logger = typeof logger;

export default logger;
