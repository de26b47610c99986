import pino from "pino";

import { env } from "../config/env.js";

function defaultLevel() {
  if (env.NODE_ENV === "test") {
    return "silent";
  }

  return env.NODE_ENV === "production" ? "info" : "debug";
}

export const logger =
  env.NODE_ENV === "production" || env.NODE_ENV === "test"
    ? pino({
        level: env.LOG_LEVEL ?? defaultLevel()
      })
    : pino({
        level: env.LOG_LEVEL ?? defaultLevel(),
        transport: {
          target: "pino/file",
          options: {
            destination: 1
          }
        }
      });
