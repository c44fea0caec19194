// ---------------------------------------------------------------------------
// M1: Fixed-capacity timestamp window (ring buffer)
// ---------------------------------------------------------------------------

import type { TimestampWindow } from "./types.js";
import { assertCount } from "./validate.js";

/**
 * Create an empty window that keeps the `capacity` most recent timestamps.
 *
 * A capacity of 0 is allowed and yields a window that drops every insert.
 *
 * ```ts
 * const win = createTimestampWindow(3);
 * for (const t of [10, 20, 30, 40]) win.insert(t);
 * win.items(); // [20, 30, 40]
 * ```
 */
export function createTimestampWindow(capacity: number): TimestampWindow {
  assertCount("capacity", capacity);

  // Grows on demand up to `capacity`, then is overwritten in place.
  const slots: number[] = [];
  // Index of the oldest element once the window is full.
  let head = 0;
  let count = 0;

  function insert(timestamp: number): void {
    if (capacity === 0) return;

    if (count < capacity) {
      slots.push(timestamp);
      count++;
      return;
    }

    slots[head] = timestamp;
    head = (head + 1) % capacity;
  }

  function len(): number {
    return count;
  }

  function items(): readonly number[] {
    const out: number[] = [];
    for (let i = 0; i < count; i++) {
      const value = slots[(head + i) % capacity];
      if (value !== undefined) out.push(value);
    }
    return out;
  }

  return {
    capacity,
    insert,
    len,
    items,
  };
}
