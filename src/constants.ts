// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Number of recent completion timestamps averaged by default. */
export const DEFAULT_WINDOW_CAPACITY = 10;

/** Fewest timestamps that yield an interval. */
export const MIN_SAMPLES = 2;
