// ---------------------------------------------------------------------------
// M4: Adapters for presentation layers
// ---------------------------------------------------------------------------

import type { EstimatorSnapshot, ProgressEstimator } from "./types.js";

function isFinished(snap: EstimatorSnapshot): boolean {
  return snap.completed >= snap.total;
}

/**
 * Call `callback` with a fresh snapshot after every tick.
 *
 * Returns an unsubscribe function.
 *
 * ```ts
 * const stop = subscribeSnapshot(est, (snap) => {
 *   bar.update(snap.completed, { eta: snap.status });
 * });
 * ```
 */
export function subscribeSnapshot(
  estimator: ProgressEstimator,
  callback: (snapshot: EstimatorSnapshot) => void,
): () => void {
  return estimator.on("tick", callback);
}

/**
 * Return a `Promise` that resolves with the first snapshot in which `completed`
 * has reached `total`. Resolves right away if that is already the case.
 */
export function whenFinished(estimator: ProgressEstimator): Promise<EstimatorSnapshot> {
  const current = estimator.getSnapshot();
  if (isFinished(current)) {
    return Promise.resolve(current);
  }
  return new Promise<EstimatorSnapshot>((resolve) => {
    const unsub = estimator.on("tick", (snap) => {
      if (isFinished(snap)) {
        unsub();
        resolve(snap);
      }
    });
  });
}
