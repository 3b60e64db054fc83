import pino from "pino";
import { ENV } from "./env";

const isDev = ENV.NODE_ENV === "development";
const defaultLevel = ENV.NODE_ENV === "test" ? "silent" : "info";

export const logger = pino({
  name: "disclosure-relay",
  level: ENV.LOG_LEVEL || defaultLevel,
  ...(isDev
    ? {
        transport: {
          target: "pino-pretty",
          options: { translateTime: "SYS:standard" },
        },
      }
    : {}),
});

export type Logger = pino.Logger;

export type Component =
  | "fetcher"
  | "detector"
  | "store"
  | "notifier"
  | "cycle"
  | "scheduler"
  | "server";

export function componentLogger(component: Component): Logger {
  return logger.child({ component });
}
