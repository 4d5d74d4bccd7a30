import { pino } from "pino";
import { config, isDev } from "../config/index.js";

const devTransport = {
  target: "pino-pretty",
  options: {
    translateTime: "HH:MM:ss Z",
    ignore: "pid,hostname",
    colorize: true,
  },
};

export const logger = pino({
  name: "classroom-relay",
  level: config.LOG_LEVEL,
  ...(isDev && { transport: devTransport }),
});

export type Logger = typeof logger;
