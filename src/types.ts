// ---------------------------------------------------------------------------
// Shared type definitions
// ---------------------------------------------------------------------------

/** A millisecond timestamp source. Must not go backwards. */
export type Clock = () => number;

// ---------------------------------------------------------------------------
// Timestamp window
// ---------------------------------------------------------------------------

/** Fixed-capacity FIFO of completion timestamps (oldest first). */
export interface TimestampWindow {
  /** Maximum number of timestamps kept. */
  readonly capacity: number;
  /** Append a timestamp, evicting the oldest one when full. */
  insert(timestamp: number): void;
  /** Number of timestamps currently held (`0..=capacity`). */
  len(): number;
  /** Timestamps from oldest to newest, as a fresh array. */
  items(): readonly number[];
}

// ---------------------------------------------------------------------------
// Estimator
// ---------------------------------------------------------------------------

/** Observable phases of an estimator over its lifetime. */
export type EstimatorRegime = "warming" | "estimating" | "complete" | "overrun";

/**
 * Why `eta()` does or does not have a value.
 *
 * `eta()` collapses every variant except `estimating` into `null`.
 */
export type EstimatorStatus =
  | { kind: "warming" }
  | { kind: "overrun" }
  | { kind: "complete" }
  | { kind: "estimating"; etaMs: number };

/** Options accepted by `createProgressEstimator()`. */
export interface EstimatorOptions {
  /**
   * Monotonic clock in milliseconds, read once per `tick()`.
   * @default performance.now
   */
  now?: Clock;
}

/** Immutable view of an estimator, safe to hand to a renderer. */
export interface EstimatorSnapshot {
  completed: number;
  total: number;
  remaining: number;
  /** Timestamps currently in the window. */
  samples: number;
  status: EstimatorStatus;
}

/** Events emitted by a `ProgressEstimator`. */
export interface EstimatorEventMap {
  /** After every `tick()`. */
  tick: EstimatorSnapshot;
  /** When a tick moves the estimator into a different regime. */
  regimechange: { from: EstimatorRegime; to: EstimatorRegime };
}

/** Tracks completed units and projects the time left. */
export interface ProgressEstimator {
  /** Record that one unit of work has finished now. */
  tick(): void;
  /** Estimated milliseconds remaining, or `null` when there is no estimate. */
  eta(): number | null;
  /** Like `eta()`, but says why there is no estimate. */
  status(): EstimatorStatus;
  getCompleted(): number;
  getTotal(): number;
  /** `total - completed`, never below 0. */
  getRemaining(): number;
  getSnapshot(): EstimatorSnapshot;
  on<K extends keyof EstimatorEventMap>(
    event: K,
    handler: (data: EstimatorEventMap[K]) => void,
  ): () => void;
  off<K extends keyof EstimatorEventMap>(
    event: K,
    handler: (data: EstimatorEventMap[K]) => void,
  ): void;
}
