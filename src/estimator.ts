// ---------------------------------------------------------------------------
// M2: Progress estimator
// ---------------------------------------------------------------------------

import { DEFAULT_WINDOW_CAPACITY, MIN_SAMPLES } from "./constants.js";
import { createEmitter } from "./emitter.js";
import type {
  EstimatorEventMap,
  EstimatorOptions,
  EstimatorRegime,
  EstimatorSnapshot,
  EstimatorStatus,
  ProgressEstimator,
} from "./types.js";
import { assertCount } from "./validate.js";
import { createTimestampWindow } from "./window.js";

/**
 * Mean gap between consecutive timestamps, in whole milliseconds.
 *
 * Each gap is truncated to milliseconds before summing, and the sum is divided
 * by the number of timestamps rather than the number of gaps. Existing callers
 * rely on the resulting numbers, so the divisor stays as it is. Fewer than two
 * timestamps have no gap and give 0.
 */
export function meanInterval(stamps: readonly number[]): number {
  if (stamps.length < MIN_SAMPLES) return 0;

  let sum = 0;
  let prev: number | undefined;
  for (const t of stamps) {
    if (prev !== undefined) {
      sum += Math.max(Math.trunc(t - prev), 0);
    }
    prev = t;
  }
  return Math.trunc(sum / stamps.length);
}

/**
 * Create an estimator for `total` units that averages the spacing of the last
 * `windowCapacity` ticks.
 *
 * ```ts
 * const est = createProgressEstimator(10, files.length);
 * for (const file of files) {
 *   await importFile(file);
 *   est.tick();
 *   console.log(est.eta() ?? "unknown");
 * }
 * ```
 */
export function createProgressEstimator(
  windowCapacity: number = DEFAULT_WINDOW_CAPACITY,
  total: number,
  options?: EstimatorOptions,
): ProgressEstimator {
  assertCount("windowCapacity", windowCapacity);
  assertCount("total", total);
  if (options?.now !== undefined && typeof options.now !== "function") {
    throw new TypeError("options.now must be a function");
  }

  const now = options?.now ?? (() => performance.now());
  const recent = createTimestampWindow(windowCapacity);
  const emitter = createEmitter<EstimatorEventMap>();
  let completed = 0;

  function status(): EstimatorStatus {
    if (recent.len() < MIN_SAMPLES) return { kind: "warming" };

    const mean = meanInterval(recent.items());

    if (completed > total) return { kind: "overrun" };

    const remaining = total - completed;
    if (remaining === 0) return { kind: "complete" };

    return {
      kind: "estimating",
      etaMs: Math.min(mean * remaining, Number.MAX_SAFE_INTEGER),
    };
  }

  function eta(): number | null {
    const s = status();
    return s.kind === "estimating" ? s.etaMs : null;
  }

  function getRemaining(): number {
    return Math.max(total - completed, 0);
  }

  function getSnapshot(): EstimatorSnapshot {
    return {
      completed,
      total,
      remaining: getRemaining(),
      samples: recent.len(),
      status: status(),
    };
  }

  function tick(): void {
    const before: EstimatorRegime | null = emitter.has("regimechange") ? status().kind : null;

    recent.insert(now());
    completed++;

    let failure: { error: unknown } | null = null;
    if (before !== null) {
      const after = status().kind;
      if (after !== before) {
        try {
          emitter.emit("regimechange", { from: before, to: after });
        } catch (error) {
          failure = { error };
        }
      }
    }
    if (emitter.has("tick")) {
      try {
        emitter.emit("tick", getSnapshot());
      } catch (error) {
        failure ??= { error };
      }
    }
    if (failure !== null) throw failure.error;
  }

  return {
    tick,
    eta,
    status,
    getCompleted: () => completed,
    getTotal: () => total,
    getRemaining,
    getSnapshot,
    on: emitter.on,
    off: emitter.off,
  };
}
