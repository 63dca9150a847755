/**
 * @arbor/cli — Structured logging.
 *
 * pino, JSON lines on stderr so stdout carries only command results.
 * Development runs go through pino-pretty.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export function createLogger(config: AppConfig): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }

  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}
