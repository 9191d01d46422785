import { performance } from "node:perf_hooks";
import { setTimeout as sleep } from "node:timers/promises";

import type { Logger } from "pino";

import {
  createWorkerPool,
  DEFAULT_CONCURRENCY,
  TaskCancelledError,
  type WorkerPool,
} from "../lib/pool.ts";
import { ConfigurationError } from "./errors.ts";
import { DEFAULT_HISTORY_LENGTH } from "./history.ts";
import { testKey, type Host, type TestDefinition } from "./host.ts";
import type { ProbeExecutor } from "./probe/executor.ts";
import { probeFailed, type ProbeResult } from "./probe/types.ts";
import { createSnapshot, type Snapshot } from "./snapshot.ts";
import { DEFAULT_SLOW_THRESHOLD_MS } from "./status.ts";
import { TestState, type CycleResult } from "./test-state.ts";

export const DEFAULT_INTERVAL_MS = 1000;

export type SchedulerPhase = "idle" | "dispatching" | "awaiting-results" | "merging" | "published";

export type SnapshotListener = (snapshot: Snapshot) => void;

export type SchedulerOptions = {
  hosts: readonly Host[];
  execute: ProbeExecutor;
  logger: Logger;
  intervalMs?: number;
  cycleDeadlineMs?: number;
  historyLength?: number;
  slowThresholdMs?: number;
  concurrency?: number;
  now?: () => Date;
};

type ScheduledTest = {
  key: string;
  host: Host;
  test: TestDefinition;
  state: TestState;
};

type Delivery = CycleResult & {
  key: string;
};

type CycleDispatch = {
  cycle: number;
  queueClosed: AbortSignal;
  notStarted: Set<string>;
};

async function waitForNextCycle(delayMs: number, signal: AbortSignal): Promise<void> {
  try {
    await sleep(delayMs, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
}

/**
 * Drives probe cycles. Workers only hand results back; every write to a
 * TestState happens in the merge phase of `runCycle`, one cycle at a time.
 */
export class Scheduler {
  readonly intervalMs: number;
  readonly cycleDeadlineMs: number;
  readonly slowThresholdMs: number;

  readonly #hosts: readonly Host[];
  readonly #tests: readonly ScheduledTest[];
  readonly #states = new Map<string, TestState>();
  readonly #execute: ProbeExecutor;
  readonly #logger: Logger;
  readonly #now: () => Date;
  readonly #pool: WorkerPool;
  readonly #inFlight = new Set<string>();
  readonly #listeners = new Set<SnapshotListener>();
  #inbox: Delivery[] = [];
  #cycle = 0;
  #phase: SchedulerPhase = "idle";
  #latest: Snapshot | undefined;

  constructor({
    hosts,
    execute,
    logger,
    intervalMs = DEFAULT_INTERVAL_MS,
    cycleDeadlineMs = intervalMs,
    historyLength = DEFAULT_HISTORY_LENGTH,
    slowThresholdMs = DEFAULT_SLOW_THRESHOLD_MS,
    concurrency = DEFAULT_CONCURRENCY,
    now = () => new Date(),
  }: SchedulerOptions) {
    const tests: ScheduledTest[] = [];
    for (const host of hosts) {
      for (const test of host.tests) {
        const key = testKey(host, test);
        if (this.#states.has(key)) {
          throw new ConfigurationError(`Test ${key} is configured more than once`);
        }

        const state = new TestState(key, historyLength);
        this.#states.set(key, state);
        tests.push({ key, host, test, state });
      }
    }

    if (tests.length === 0) {
      throw new ConfigurationError("No tests configured");
    }

    this.intervalMs = intervalMs;
    this.cycleDeadlineMs = cycleDeadlineMs;
    this.slowThresholdMs = slowThresholdMs;
    this.#hosts = hosts;
    this.#tests = tests;
    this.#execute = execute;
    this.#logger = logger;
    this.#now = now;
    this.#pool = createWorkerPool(concurrency);
  }

  get phase(): SchedulerPhase {
    return this.#phase;
  }

  get cycle(): number {
    return this.#cycle;
  }

  get testCount(): number {
    return this.#tests.length;
  }

  snapshot(): Snapshot | undefined {
    return this.#latest;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  async runCycle(): Promise<Snapshot> {
    if (this.#phase !== "idle") {
      throw new Error(`Cannot start a cycle while the scheduler is ${this.#phase}`);
    }

    try {
      this.#cycle += 1;
      const cycle = this.#cycle;
      const startedAt = this.#now();

      this.#phase = "dispatching";
      const queueCutoff = new AbortController();
      const dispatch: CycleDispatch = {
        cycle,
        queueClosed: queueCutoff.signal,
        notStarted: new Set<string>(),
      };
      const dispatched: Promise<void>[] = [];
      const skipped = new Set<string>();
      for (const scheduled of this.#tests) {
        if (this.#inFlight.has(scheduled.key)) {
          skipped.add(scheduled.key);
          continue;
        }
        dispatched.push(this.#dispatch(scheduled, dispatch));
      }

      this.#phase = "awaiting-results";
      await this.#awaitResults(dispatched, queueCutoff);

      this.#phase = "merging";
      this.#mergeDeliveries();
      const completedAt = this.#now();
      for (const { key, state } of this.#tests) {
        if (state.lastMergedCycle >= cycle) {
          continue;
        }
        const reason = skipped.has(key)
          ? "previous probe still running"
          : dispatch.notStarted.has(key)
            ? "not started before cycle deadline"
            : "no result before cycle deadline";
        state.merge({ cycle, result: probeFailed(reason), completedAt }, this.slowThresholdMs);
      }

      this.#phase = "published";
      const snapshot = createSnapshot({
        cycle,
        startedAt,
        completedAt,
        hosts: this.#hosts,
        states: this.#states,
      });
      this.#latest = snapshot;
      this.#publish(snapshot);

      return snapshot;
    } finally {
      this.#phase = "idle";
    }
  }

  /** Runs cycles on a fixed cadence until `signal` aborts. */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const cycleStartedAt = performance.now();

      try {
        await this.runCycle();
      } catch (error) {
        this.#logger.error({ error, cycle: this.#cycle }, "probe cycle failed");
      }

      const remainingMs = this.intervalMs - (performance.now() - cycleStartedAt);
      if (remainingMs > 0) {
        await waitForNextCycle(remainingMs, signal);
      } else {
        this.#logger.debug(
          { cycle: this.#cycle, overrunMs: Math.round(-remainingMs) },
          "cycle overran the interval, starting the next one immediately",
        );
      }
    }
  }

  /**
   * Queues one probe. The returned promise settles once the probe delivered,
   * ran for `cycleDeadlineMs` since the pool started it, or was dropped from
   * the queue at the cycle cutoff. A probe past its deadline keeps running and
   * stays in flight until it returns.
   */
  #dispatch(
    { key, host, test }: ScheduledTest,
    { cycle, queueClosed, notStarted }: CycleDispatch,
  ): Promise<void> {
    this.#inFlight.add(key);

    return new Promise<void>((settle) => {
      let deadline: NodeJS.Timeout | undefined;

      void this.#pool
        .run(
          () => {
            deadline = setTimeout(() => {
              settle();
            }, this.cycleDeadlineMs);
            return this.#execute(host, test);
          },
          { signal: queueClosed },
        )
        .then(
          (result) => {
            this.#deliver(key, cycle, result);
          },
          (error: unknown) => {
            if (error instanceof TaskCancelledError) {
              notStarted.add(key);
              return;
            }
            this.#logger.warn({ error, test: key }, "probe threw unexpectedly");
            const reason = error instanceof Error ? error.message : String(error);
            this.#deliver(key, cycle, probeFailed(reason));
          },
        )
        .finally(() => {
          clearTimeout(deadline);
          this.#inFlight.delete(key);
          settle();
        });
    });
  }

  #deliver(key: string, cycle: number, result: ProbeResult): void {
    this.#inbox.push({ key, cycle, result, completedAt: this.#now() });
  }

  /** Waits for every dispatched probe, closing the queue once the cycle deadline passes. */
  async #awaitResults(
    dispatched: readonly Promise<void>[],
    queueCutoff: AbortController,
  ): Promise<void> {
    const cutoff = setTimeout(() => {
      queueCutoff.abort();
    }, this.cycleDeadlineMs);

    try {
      await Promise.all(dispatched);
    } finally {
      clearTimeout(cutoff);
    }
  }

  #mergeDeliveries(): void {
    const deliveries = this.#inbox;
    this.#inbox = [];

    for (const delivery of deliveries) {
      const state = this.#states.get(delivery.key);
      if (!state) {
        continue;
      }

      if (!state.merge(delivery, this.slowThresholdMs)) {
        this.#logger.debug(
          { test: delivery.key, cycle: delivery.cycle, lastMergedCycle: state.lastMergedCycle },
          "discarding stale probe result",
        );
      }
    }
  }

  #publish(snapshot: Snapshot): void {
    for (const listener of this.#listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.#logger.warn({ error, cycle: snapshot.cycle }, "snapshot listener failed");
      }
    }
  }
}
