// oxlint-disable no-process-env

import { z } from "zod";

import { optionalNonBlank, optionalNonBlankString, positiveMilliseconds } from "./zod.ts";

export const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof logLevels)[number];

export const portRangeModes = ["any", "all", "each"] as const;

export type PortRangeMode = (typeof portRangeModes)[number];

type EnvStatusServer = {
  host: string;
  port: number;
};

export type Env = {
  configPath: string | undefined;
  intervalMs: number;
  /** Unset means the caller derives it from the interval and the probe timeouts. */
  cycleDeadlineMs: number | undefined;
  historyLength: number;
  slowThresholdMs: number;
  concurrency: number;
  icmpTimeoutMs: number;
  tcpTimeoutMs: number;
  portRangeMode: PortRangeMode;
  logLevel: LogLevel;
  color: boolean;
  statusServer: EnvStatusServer | undefined;
};

const envSchema = z.object({
  HOSTWATCH_CONFIG: optionalNonBlankString,
  INTERVAL_MS: positiveMilliseconds.default(1000),
  CYCLE_DEADLINE_MS: optionalNonBlank(positiveMilliseconds),
  HISTORY_LENGTH: z.coerce.number().int().min(1).max(1000).default(35),
  SLOW_THRESHOLD_MS: positiveMilliseconds.default(200),
  CONCURRENCY: z.coerce.number().int().min(1).max(1024).default(20),
  ICMP_TIMEOUT_MS: positiveMilliseconds.default(1000),
  TCP_TIMEOUT_MS: positiveMilliseconds.default(500),
  PORT_RANGE_POLICY: z.enum(portRangeModes).default("any"),
  LOG_LEVEL: z.enum(logLevels).default("warn"),
  NO_COLOR: optionalNonBlankString,
  STATUS_HOST: z.string().trim().min(1).default("127.0.0.1"),
  STATUS_PORT: optionalNonBlank(z.coerce.number().int().min(0).max(65_535)),
});

export function parseEnv(env: typeof process.env = process.env): Env {
  const parsedEnv = envSchema.safeParse(env);

  if (!parsedEnv.success) {
    throw new Error(
      parsedEnv.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    );
  }

  const statusServer =
    parsedEnv.data.STATUS_PORT === undefined
      ? undefined
      : {
          host: parsedEnv.data.STATUS_HOST,
          port: parsedEnv.data.STATUS_PORT,
        };

  return {
    color: parsedEnv.data.NO_COLOR === undefined,
    concurrency: parsedEnv.data.CONCURRENCY,
    configPath: parsedEnv.data.HOSTWATCH_CONFIG,
    cycleDeadlineMs: parsedEnv.data.CYCLE_DEADLINE_MS,
    historyLength: parsedEnv.data.HISTORY_LENGTH,
    icmpTimeoutMs: parsedEnv.data.ICMP_TIMEOUT_MS,
    intervalMs: parsedEnv.data.INTERVAL_MS,
    logLevel: parsedEnv.data.LOG_LEVEL,
    portRangeMode: parsedEnv.data.PORT_RANGE_POLICY,
    slowThresholdMs: parsedEnv.data.SLOW_THRESHOLD_MS,
    statusServer,
    tcpTimeoutMs: parsedEnv.data.TCP_TIMEOUT_MS,
  };
}
