// ---------------------------------------------------------------------------
// tally-eta — time-remaining estimates for unit-counted work
// ---------------------------------------------------------------------------

// Types
export type {
  Clock,
  EstimatorEventMap,
  EstimatorOptions,
  EstimatorRegime,
  EstimatorSnapshot,
  EstimatorStatus,
  ProgressEstimator,
  TimestampWindow,
} from "./types.js";

export { DEFAULT_WINDOW_CAPACITY } from "./constants.js";

// M1: Timestamp window
export { createTimestampWindow } from "./window.js";

// M2: Estimator
export { createProgressEstimator, meanInterval } from "./estimator.js";

// M3: Emitter
export { createEmitter } from "./emitter.js";
export type { Emitter } from "./emitter.js";

// M4: Adapters
export { subscribeSnapshot, whenFinished } from "./adapters.js";
