import type { HistorySlot } from "./history.ts";
import { testKey, testLabel, type Host, type Protocol } from "./host.ts";
import type { TestStatus } from "./status.ts";
import type { TestState } from "./test-state.ts";

export type TestSnapshot = {
  readonly key: string;
  readonly label: string;
  readonly protocol: Protocol;
  readonly status: TestStatus | null;
  readonly latencyMs: number | undefined;
  readonly lastUpAt: Date | undefined;
  readonly lastChangeAt: Date | undefined;
  readonly failureReason: string | undefined;
  readonly history: readonly HistorySlot[];
};

export type HostSnapshot = {
  readonly address: string;
  readonly description: string;
  readonly tests: readonly TestSnapshot[];
};

export type SnapshotSummary = {
  readonly total: number;
  readonly up: number;
  readonly slow: number;
  readonly down: number;
  readonly pending: number;
};

export type Snapshot = {
  readonly cycle: number;
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly hosts: readonly HostSnapshot[];
  readonly summary: SnapshotSummary;
};

type CreateSnapshotOptions = {
  cycle: number;
  startedAt: Date;
  completedAt: Date;
  hosts: readonly Host[];
  states: ReadonlyMap<string, TestState>;
};

function summarize(hosts: readonly HostSnapshot[]): SnapshotSummary {
  const summary = { total: 0, up: 0, slow: 0, down: 0, pending: 0 };

  for (const host of hosts) {
    for (const test of host.tests) {
      summary.total += 1;
      summary[test.status ?? "pending"] += 1;
    }
  }

  return Object.freeze(summary);
}

/**
 * Copies the current state of every test into a frozen structure. Dates are
 * copied too, so nothing in a published snapshot aliases scheduler state.
 */
export function createSnapshot({
  cycle,
  startedAt,
  completedAt,
  hosts,
  states,
}: CreateSnapshotOptions): Snapshot {
  const hostSnapshots = hosts.map((host) =>
    Object.freeze({
      address: host.address,
      description: host.description,
      tests: Object.freeze(
        host.tests.map((test) => {
          const key = testKey(host, test);
          const state = states.get(key);
          if (!state) {
            throw new Error(`No state tracked for test ${key}`);
          }

          const view = state.view();
          return Object.freeze({
            key,
            label: testLabel(test),
            protocol: test.protocol,
            status: view.status,
            latencyMs: view.latencyMs,
            lastUpAt: view.lastUpAt && new Date(view.lastUpAt),
            lastChangeAt: view.lastChangeAt && new Date(view.lastChangeAt),
            failureReason: view.failureReason,
            history: Object.freeze(view.history),
          });
        }),
      ),
    }),
  );

  return Object.freeze({
    cycle,
    startedAt: new Date(startedAt),
    completedAt: new Date(completedAt),
    hosts: Object.freeze(hostSnapshots),
    summary: summarize(hostSnapshots),
  });
}

export function findTest(snapshot: Snapshot, key: string): TestSnapshot | undefined {
  for (const host of snapshot.hosts) {
    const test = host.tests.find((candidate) => candidate.key === key);
    if (test) {
      return test;
    }
  }
  return undefined;
}
