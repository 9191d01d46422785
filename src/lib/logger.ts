import { destination, pino, type Logger } from "pino";

import type { LogLevel } from "./env.ts";

// The dashboard owns stdout; logs go to stderr.
export function createLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      name: "hostwatch",
    },
    destination(2),
  );
}
