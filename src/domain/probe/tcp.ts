import { createConnection, type Socket } from "node:net";
import { performance } from "node:perf_hooks";

import {
  createWorkerPool,
  DEFAULT_CONCURRENCY,
  TaskCancelledError,
  type WorkerPool,
} from "../../lib/pool.ts";
import type { PortRange, PortRangePolicy } from "../host.ts";
import { probeFailed, probeSucceeded, roundLatency, type ProbeResult } from "./types.ts";

export const DEFAULT_TCP_TIMEOUT_MS = 500;

export type ConnectSocket = (options: { host: string; port: number }) => Socket;

export type TcpProbeOptions = {
  timeoutMs?: number;
  connect?: ConnectSocket;
  /** Bounds how many sockets are open at once. Share one pool to bound them across ranges. */
  pool?: WorkerPool;
};

type PortOutcome = {
  port: number;
  result: ProbeResult;
};

function describeSocketError(error: NodeJS.ErrnoException): string {
  return error.code ?? error.message;
}

export async function probeTcpPort(
  address: string,
  port: number,
  { timeoutMs = DEFAULT_TCP_TIMEOUT_MS, connect = createConnection }: TcpProbeOptions = {},
): Promise<ProbeResult> {
  const startedAt = performance.now();

  return await new Promise<ProbeResult>((resolve) => {
    const socket = connect({ host: address, port });
    let settled = false;

    const settle = (result: ProbeResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeout);
      socket.destroy();
      resolve(result);
    };

    const timeout = setTimeout(() => {
      settle(probeFailed("ETIMEDOUT"));
    }, timeoutMs);

    socket.once("connect", () => {
      settle(probeSucceeded(roundLatency(performance.now() - startedAt)));
    });

    socket.once("error", (error: NodeJS.ErrnoException) => {
      settle(probeFailed(describeSocketError(error)));
    });
  });
}

/**
 * Probes the ports of an inclusive range through the worker pool. Under `any`
 * the range is up when one port connects and reports the fastest connect;
 * under `all` every port must connect and the slowest connect is reported.
 * Ports still queued once the outcome is known are never dialled.
 */
export async function probeTcpRange(
  address: string,
  { low, high }: PortRange,
  policy: PortRangePolicy,
  { pool = createWorkerPool(DEFAULT_CONCURRENCY), ...portOptions }: TcpProbeOptions = {},
): Promise<ProbeResult> {
  const ports = Array.from({ length: high - low + 1 }, (_, offset) => low + offset);
  const decided = new AbortController();

  const outcomes = await Promise.all(
    ports.map(async (port): Promise<PortOutcome | undefined> => {
      try {
        const result = await pool.run(() => probeTcpPort(address, port, portOptions), {
          signal: decided.signal,
        });
        if (result.ok === (policy === "any")) {
          decided.abort();
        }
        return { port, result };
      } catch (error) {
        if (error instanceof TaskCancelledError) {
          return undefined;
        }
        throw error;
      }
    }),
  );
  const results = outcomes.filter((outcome): outcome is PortOutcome => outcome !== undefined);

  const latencies: number[] = [];
  const failures: string[] = [];
  for (const { port, result } of results) {
    if (result.ok) {
      if (result.latencyMs !== undefined) {
        latencies.push(result.latencyMs);
      }
    } else {
      failures.push(`${port} ${result.reason}`);
    }
  }

  const connected = results.length - failures.length;

  if (policy === "any") {
    if (connected === 0) {
      return probeFailed(`no port connected (${failures.join(", ")})`);
    }
    return probeSucceeded(latencies.length > 0 ? Math.min(...latencies) : undefined);
  }

  if (failures.length > 0) {
    return probeFailed(`ports not connected: ${failures.join(", ")}`);
  }
  return probeSucceeded(latencies.length > 0 ? Math.max(...latencies) : undefined);
}
