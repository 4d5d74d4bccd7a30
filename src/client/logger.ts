import { pino, type Logger } from "pino";
import type { ClientLogLevel } from "./config.js";

export type ClientLogger = Logger;

/**
 * Browser build of pino writes structured objects to the console
 */
export function createClientLogger(level: ClientLogLevel = "info"): ClientLogger {
  return pino({
    name: "classroom-client",
    level,
    browser: { asObject: true },
  });
}
