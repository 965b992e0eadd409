import { createLogger, format, transports } from "winston";
import { LOG_LEVEL, NODE_ENV } from "../config/env.js";

// No log files while the test runner is driving the code.
const sinks =
  NODE_ENV === "test"
    ? [new transports.Console()]
    : [
        new transports.Console(),
        new transports.File({ filename: "logs/error.log", level: "error" }),
        new transports.File({ filename: "logs/combined.log" }),
      ];

const logger = createLogger({
  level: LOG_LEVEL,
  format: format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.colorize(),
    format.printf(({ timestamp, level, message, ...meta }) => {
      const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
      return `[${String(timestamp)}] ${level}: ${String(message)}${extra}`;
    })
  ),
  transports: sinks,
});

export default logger;
