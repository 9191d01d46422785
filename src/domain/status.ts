import type { ProbeResult } from "./probe/types.ts";

export const testStatuses = ["up", "slow", "down"] as const;

export type TestStatus = (typeof testStatuses)[number];

export const DEFAULT_SLOW_THRESHOLD_MS = 200;

export function classifyProbeResult(result: ProbeResult, slowThresholdMs: number): TestStatus {
  if (!result.ok) {
    return "down";
  }

  if (result.latencyMs === undefined || result.latencyMs < slowThresholdMs) {
    return "up";
  }

  return "slow";
}
