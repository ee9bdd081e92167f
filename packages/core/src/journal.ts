import type { Expr } from "./expr.js";

export type Snapshot = readonly Expr[];

/**
 * Fixed-capacity ring buffer of stack snapshots. Once full, each push
 * overwrites the oldest entry.
 */
export class Journal {
  readonly capacity: number;
  private readonly slots: Array<Snapshot | undefined>;
  private head = 0;
  private size = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Journal capacity must be a positive integer, got ${capacity}.`);
    }
    this.capacity = capacity;
    this.slots = new Array<Snapshot | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.size;
  }

  push(stack: readonly Expr[]): void {
    this.slots[(this.head + this.size) % this.capacity] = [...stack];
    if (this.size < this.capacity) {
      this.size++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /** Snapshots, oldest first. */
  entries(): Snapshot[] {
    const out: Snapshot[] = [];
    for (let i = 0; i < this.size; i++) {
      const snapshot = this.slots[(this.head + i) % this.capacity];
      if (snapshot) out.push(snapshot);
    }
    return out;
  }

  /** The snapshot `stepsBack` entries before the newest (0 is the newest). */
  at(stepsBack: number): Snapshot | undefined {
    if (stepsBack < 0 || stepsBack >= this.size) return undefined;
    return this.slots[(this.head + this.size - 1 - stepsBack) % this.capacity];
  }
}
