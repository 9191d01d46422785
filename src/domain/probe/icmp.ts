import { spawn } from "node:child_process";
import { isIPv6 } from "node:net";
import { performance } from "node:perf_hooks";

import { probeFailed, probeSucceeded, roundLatency, type ProbeResult } from "./types.ts";

export const DEFAULT_ICMP_TIMEOUT_MS = 1000;

// Extra time granted to the ping binary beyond its own -W wait before it is killed.
export const PING_KILL_GRACE_MS = 250;

type PingOutput = {
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
};

export type PingProcess = {
  readonly stdout: PingOutput | null;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close", listener: (code: number | null) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
};

export type SpawnPing = (command: string, args: readonly string[]) => PingProcess;

export type IcmpProbeOptions = {
  timeoutMs?: number;
  command?: string;
  spawnPing?: SpawnPing;
};

const spawnPingProcess: SpawnPing = (command, args) =>
  spawn(command, args, {
    stdio: ["ignore", "pipe", "ignore"],
  });

export function buildPingArgs(address: string, timeoutMs: number): string[] {
  const waitSeconds = String(Math.max(1, Math.ceil(timeoutMs / 1000)));
  const args = ["-n", "-c", "1", "-W", waitSeconds];
  if (isIPv6(address)) {
    args.unshift("-6");
  }
  return [...args, address];
}

/**
 * Reads the round-trip time from ping output, preferring the per-reply
 * `time=` figure and falling back to the average of the summary line.
 */
export function parsePingLatency(output: string): number | undefined {
  const replyMatch = output.match(/time[=<]\s*([0-9]+(?:\.[0-9]+)?)\s*ms/i);
  if (replyMatch?.[1] !== undefined) {
    return Number(replyMatch[1]);
  }

  const summaryMatch = output.match(
    /=\s*[0-9.]+\/([0-9]+(?:\.[0-9]+)?|nan)\/[0-9.]+\/(?:[0-9.]+|nan)\s*ms/i,
  );
  const average = summaryMatch?.[1];
  if (average === undefined || average.toLowerCase() === "nan") {
    return undefined;
  }

  const value = Number(average);
  return Number.isFinite(value) ? value : undefined;
}

export async function probeIcmp(
  address: string,
  {
    timeoutMs = DEFAULT_ICMP_TIMEOUT_MS,
    command = "ping",
    spawnPing = spawnPingProcess,
  }: IcmpProbeOptions = {},
): Promise<ProbeResult> {
  const startedAt = performance.now();

  return await new Promise<ProbeResult>((resolve) => {
    let child: PingProcess;
    try {
      child = spawnPing(command, buildPingArgs(address, timeoutMs));
    } catch (error) {
      resolve(probeFailed(error instanceof Error ? error.message : String(error)));
      return;
    }

    let stdout = "";
    let settled = false;

    const settle = (result: ProbeResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeout);
      resolve(result);
    };

    const timeout = setTimeout(() => {
      child.kill("SIGKILL");
      settle(probeFailed(`no reply within ${timeoutMs}ms`));
    }, timeoutMs + PING_KILL_GRACE_MS);

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf8");
    });

    child.on("error", (error: Error) => {
      settle(probeFailed(error.message));
    });

    child.on("close", (code: number | null) => {
      if (code !== 0) {
        settle(probeFailed(code === null ? "ping was terminated" : `ping exited with code ${code}`));
        return;
      }

      const latencyMs = parsePingLatency(stdout) ?? performance.now() - startedAt;
      settle(probeSucceeded(roundLatency(latencyMs)));
    });
  });
}
