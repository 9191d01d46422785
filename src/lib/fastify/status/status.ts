import type { Snapshot } from "../../../domain/snapshot.ts";
import type { TestStatus } from "../../../domain/status.ts";
import type { CheckStatus, SnapshotResponse } from "./types.ts";

export function maximumCheckStatus(a: CheckStatus, b: CheckStatus): CheckStatus {
  if (a === "error" || b === "error") {
    return "error";
  }
  if (a === "warn" || b === "warn") {
    return "warn";
  }
  return "ok";
}

export function checkStatusForTest(status: TestStatus | null): CheckStatus {
  switch (status) {
    case "up":
      return "ok";
    case "down":
      return "error";
    case "slow":
    case null:
      return "warn";
  }
}

export function collectChecks(snapshot: Snapshot): Record<string, CheckStatus> {
  const checks: Record<string, CheckStatus> = {};
  for (const host of snapshot.hosts) {
    for (const test of host.tests) {
      checks[test.key] = checkStatusForTest(test.status);
    }
  }
  return checks;
}

export function determineOverallStatus(checkStatuses: Record<string, CheckStatus>): CheckStatus {
  let status: CheckStatus = "ok";

  for (const checkStatus of Object.values(checkStatuses)) {
    status = maximumCheckStatus(status, checkStatus);
  }

  return status;
}

export function toSnapshotResponse(snapshot: Snapshot): SnapshotResponse {
  return {
    cycle: snapshot.cycle,
    startedAt: snapshot.startedAt.toISOString(),
    completedAt: snapshot.completedAt.toISOString(),
    summary: { ...snapshot.summary },
    hosts: snapshot.hosts.map((host) => ({
      address: host.address,
      description: host.description,
      tests: host.tests.map((test) => ({
        key: test.key,
        label: test.label,
        protocol: test.protocol,
        status: test.status,
        latencyMs: test.latencyMs ?? null,
        lastUpAt: test.lastUpAt?.toISOString() ?? null,
        lastChangeAt: test.lastChangeAt?.toISOString() ?? null,
        failureReason: test.failureReason ?? null,
        history: [...test.history],
      })),
    })),
  };
}
