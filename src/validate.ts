// ---------------------------------------------------------------------------
// Argument checks for constructors
// ---------------------------------------------------------------------------

/**
 * Throw a `RangeError` unless `value` is a non-negative safe integer.
 */
export function assertCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${String(value)}`);
  }
}
