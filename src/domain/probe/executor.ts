import type { Host, TestDefinition } from "../host.ts";
import {
  DEFAULT_ICMP_TIMEOUT_MS,
  PING_KILL_GRACE_MS,
  probeIcmp,
  type IcmpProbeOptions,
} from "./icmp.ts";
import { DEFAULT_TCP_TIMEOUT_MS, probeTcpRange, type TcpProbeOptions } from "./tcp.ts";
import { probeFailed, type ProbeResult } from "./types.ts";

export type ProbeExecutor = (host: Host, test: TestDefinition) => Promise<ProbeResult>;

export type ProbeExecutorOptions = {
  icmp?: IcmpProbeOptions;
  tcp?: TcpProbeOptions;
};

export function createProbeExecutor({ icmp = {}, tcp = {} }: ProbeExecutorOptions = {}): ProbeExecutor {
  return async (host, test) => {
    try {
      switch (test.protocol) {
        case "icmp":
          return await probeIcmp(host.address, icmp);
        case "tcp":
          return await probeTcpRange(host.address, test.ports, test.policy, tcp);
      }
    } catch (error) {
      return probeFailed(
        `unexpected probe error: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  };
}

/** Longest a single ICMP probe or TCP connect can run before it gives up. */
export function longestProbeMs({ icmp = {}, tcp = {} }: ProbeExecutorOptions = {}): number {
  return Math.max(
    (icmp.timeoutMs ?? DEFAULT_ICMP_TIMEOUT_MS) + PING_KILL_GRACE_MS,
    tcp.timeoutMs ?? DEFAULT_TCP_TIMEOUT_MS,
  );
}
