import { parseArgs } from "node:util";

import type { FastifyInstance } from "fastify";

import { loadHostsFile } from "./domain/config.ts";
import { ConfigurationError } from "./domain/errors.ts";
import {
  createProbeExecutor,
  longestProbeMs,
  type ProbeExecutorOptions,
} from "./domain/probe/executor.ts";
import { Scheduler } from "./domain/scheduler.ts";
import { createProcessSignalAbortController } from "./lib/abort.ts";
import { parseEnv, type Env } from "./lib/env.ts";
import { createWorkerPool } from "./lib/pool.ts";
import { createLogger } from "./lib/logger.ts";
import { createTerminalRenderer } from "./lib/terminal/dashboard.ts";
import { createFastifyServer } from "./server.ts";

const usage = "usage: hostwatch [--once] <hosts.yaml>  (or set HOSTWATCH_CONFIG)";

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readCommandLine(): { once: boolean; configPath: string | undefined } {
  try {
    const { values, positionals } = parseArgs({
      allowPositionals: true,
      options: {
        once: { type: "boolean", default: false },
      },
    });
    if (positionals.length > 1) {
      throw new Error(`expected one host file, got ${positionals.length}`);
    }
    return { once: values.once === true, configPath: positionals[0] };
  } catch (error) {
    throw new ConfigurationError(usage, [describeError(error)]);
  }
}

function readEnv(): Env {
  try {
    return parseEnv();
  } catch (error) {
    throw new ConfigurationError("Invalid environment", [describeError(error)]);
  }
}

async function main(): Promise<number> {
  const commandLine = readCommandLine();
  const env = readEnv();
  const logger = createLogger(env.logLevel);

  const configPath = commandLine.configPath ?? env.configPath;
  if (configPath === undefined) {
    throw new ConfigurationError(usage);
  }

  const hosts = await loadHostsFile(configPath, { portRangeMode: env.portRangeMode });

  const probeOptions: ProbeExecutorOptions = {
    icmp: { timeoutMs: env.icmpTimeoutMs },
    tcp: { timeoutMs: env.tcpTimeoutMs, pool: createWorkerPool(env.concurrency) },
  };

  const scheduler = new Scheduler({
    hosts,
    execute: createProbeExecutor(probeOptions),
    logger,
    intervalMs: env.intervalMs,
    cycleDeadlineMs: env.cycleDeadlineMs ?? Math.max(env.intervalMs, longestProbeMs(probeOptions)),
    historyLength: env.historyLength,
    slowThresholdMs: env.slowThresholdMs,
    concurrency: env.concurrency,
  });

  scheduler.subscribe(
    createTerminalRenderer(process.stdout, {
      color: env.color && process.stdout.isTTY,
      clearScreen: !commandLine.once,
    }),
  );

  logger.info(
    { hosts: hosts.length, tests: scheduler.testCount, configPath },
    "loaded host configuration",
  );

  if (commandLine.once) {
    const snapshot = await scheduler.runCycle();
    return snapshot.summary.down > 0 ? 1 : 0;
  }

  const abortController = createProcessSignalAbortController(logger);

  let server: FastifyInstance | undefined;
  if (env.statusServer) {
    server = createFastifyServer({
      getSnapshot: () => scheduler.snapshot(),
      logLevel: env.logLevel,
    });

    const listeningAddress = await server.listen({
      host: env.statusServer.host,
      port: env.statusServer.port,
    });

    logger.info({}, "status server started: %s", listeningAddress);
  }

  try {
    await scheduler.run(abortController.signal);
  } finally {
    await server?.close();
  }

  return 0;
}

try {
  process.exitCode = await main();
} catch (error) {
  if (!(error instanceof ConfigurationError)) {
    throw error;
  }
  process.stderr.write(`hostwatch: ${error.message}\n`);
  process.exitCode = 1;
}
