import pino from "pino";
import { config } from "./config.js";
import { isLogLevel } from "./config-validator.js";

// stdout carries the report, so every log record goes to stderr
const transport = pino.transport({
  target: "pino-pretty",
  options: {
    destination: 2,
    colorize: true,
    translateTime: "HH:MM:ss.l",
    ignore: "pid,hostname",
  },
});

export const logger = pino(
  {
    // an unknown LOG_LEVEL is reported by validateConfig, not thrown here
    level: isLogLevel(config.log.level) ? config.log.level : "info",
    base: { service: "readiness" },
  },
  transport,
);

// Typed child loggers for subsystems
export const logSettings = logger.child({ subsystem: "settings" });
export const logReadiness = logger.child({ subsystem: "readiness" });
