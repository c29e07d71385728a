import { pino, type Logger as PinoLogger } from "pino";
import type { StepshellConfig } from "./config.js";

export type Logger = PinoLogger;

// Reports go to stdout, so log lines are written to stderr (fd 2).
export function createLogger(config: Pick<StepshellConfig, "logLevel">): Logger {
  return pino({
    level: config.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
        destination: 2,
      },
    },
  });
}
