import type { TestStatus } from "./status.ts";

export const DEFAULT_HISTORY_LENGTH = 35;

export type HistorySlot = TestStatus | null;

/**
 * Fixed-capacity ring of per-cycle statuses. Slots start out `null` (not yet
 * observed) and are overwritten in order, wrapping after `capacity` writes.
 */
export class HistoryBuffer {
  readonly capacity: number;
  #slots: HistorySlot[];
  #writeIndex = 0;
  #writes = 0;

  constructor(capacity: number = DEFAULT_HISTORY_LENGTH) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }

    this.capacity = capacity;
    this.#slots = Array.from({ length: capacity }, (): HistorySlot => null);
  }

  get writeIndex(): number {
    return this.#writeIndex;
  }

  get writes(): number {
    return this.#writes;
  }

  /** Writes `status` at the current index and returns the slot it went into. */
  record(status: TestStatus): number {
    const index = this.#writeIndex;
    this.#slots[index] = status;
    this.#writeIndex = (index + 1) % this.capacity;
    this.#writes += 1;
    return index;
  }

  slot(index: number): HistorySlot {
    return this.#slots[index] ?? null;
  }

  latest(): HistorySlot {
    if (this.#writes === 0) {
      return null;
    }
    return this.slot((this.#writeIndex - 1 + this.capacity) % this.capacity);
  }

  /** Oldest to newest; unwritten slots come first as `null`. */
  chronological(): HistorySlot[] {
    const ordered: HistorySlot[] = [];
    for (let offset = 0; offset < this.capacity; offset += 1) {
      ordered.push(this.slot((this.#writeIndex + offset) % this.capacity));
    }
    return ordered;
  }
}
