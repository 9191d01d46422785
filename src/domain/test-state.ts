import { HistoryBuffer, type HistorySlot } from "./history.ts";
import type { ProbeResult } from "./probe/types.ts";
import { classifyProbeResult, type TestStatus } from "./status.ts";

export type CycleResult = {
  cycle: number;
  result: ProbeResult;
  completedAt: Date;
};

export type TestStateView = {
  status: TestStatus | null;
  latencyMs: number | undefined;
  lastUpAt: Date | undefined;
  lastChangeAt: Date | undefined;
  failureReason: string | undefined;
  lastMergedCycle: number;
  history: HistorySlot[];
};

/**
 * Mutable per-test record. Only the scheduler's merge step writes to it, and
 * each merge updates every field from the same probe outcome in one go.
 */
export class TestState {
  readonly key: string;
  readonly history: HistoryBuffer;
  #latencyMs: number | undefined;
  #lastUpAt: Date | undefined;
  #lastChangeAt: Date | undefined;
  #failureReason: string | undefined;
  #lastMergedCycle = 0;

  constructor(key: string, historyLength: number) {
    this.key = key;
    this.history = new HistoryBuffer(historyLength);
  }

  get currentLatencyMs(): number | undefined {
    return this.#latencyMs;
  }

  get lastUpAt(): Date | undefined {
    return this.#lastUpAt;
  }

  get lastMergedCycle(): number {
    return this.#lastMergedCycle;
  }

  get status(): TestStatus | null {
    return this.history.latest();
  }

  /**
   * Applies a result unless it belongs to a cycle that is not newer than the
   * last merged one. Returns whether the result was applied.
   */
  merge({ cycle, result, completedAt }: CycleResult, slowThresholdMs: number): boolean {
    if (cycle <= this.#lastMergedCycle) {
      return false;
    }

    const previousStatus = this.history.latest();
    const status = classifyProbeResult(result, slowThresholdMs);

    this.history.record(status);
    this.#lastMergedCycle = cycle;

    if (result.ok) {
      this.#latencyMs = result.latencyMs;
      this.#lastUpAt = completedAt;
      this.#failureReason = undefined;
    } else {
      this.#latencyMs = undefined;
      this.#failureReason = result.reason;
    }

    if (previousStatus !== status) {
      this.#lastChangeAt = completedAt;
    }

    return true;
  }

  view(): TestStateView {
    return {
      status: this.status,
      latencyMs: this.#latencyMs,
      lastUpAt: this.#lastUpAt,
      lastChangeAt: this.#lastChangeAt,
      failureReason: this.#failureReason,
      lastMergedCycle: this.#lastMergedCycle,
      history: this.history.chronological(),
    };
  }
}
