/**
 * Voice Reshaper - Shared Utilities
 * Common utility functions used across the codebase
 */

/**
 * Resolve on the next turn of the event loop, after pending I/O callbacks
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Clamp a number between min and max values
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Clamp a number between 0 and 1 (inclusive).
 * Common for blend factors and normalized values.
 *
 * @example
 * clamp01(-0.5)  // 0
 * clamp01(0.5)   // 0.5
 * clamp01(1.5)   // 1
 */
export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Clamp a number between 0 and 100 (for percentages).
 */
export function clamp100(value: number): number {
  return Math.min(100, Math.max(0, value));
}

/**
 * Format milliseconds to human readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
  return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`;
}

// ============================================================================
// Error Handling Utilities
// ============================================================================

/**
 * Extract error message from unknown error type
 * Replaces the common pattern: error instanceof Error ? error.message : 'fallback'
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return fallback ?? String(error);
}

/**
 * Convert unknown error to Error instance
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(getErrorMessage(error));
}

// ============================================================================
// Statistics
// ============================================================================

/**
 * Sum of an array of numbers
 */
export function sum(array: ArrayLike<number>): number {
  let total = 0;
  for (let i = 0; i < array.length; i++) {
    total += array[i];
  }
  return total;
}

/**
 * Arithmetic mean. Returns 0 for empty arrays.
 */
export function average(array: ArrayLike<number>): number {
  return array.length === 0 ? 0 : sum(array) / array.length;
}

/**
 * Calculate the median of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * median([1, 2, 3, 4, 5])  // 3
 * median([1, 2, 3, 4])     // 2.5
 */
export function median(arr: readonly number[]): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 !== 0 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Calculate standard deviation of an array of numbers.
 * Uses population standard deviation formula.
 *
 * @example
 * standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])  // 2
 */
export function standardDeviation(arr: readonly number[]): number {
  if (arr.length === 0) return 0;
  const avg = average(arr);
  let squares = 0;
  for (const value of arr) {
    squares += (value - avg) * (value - avg);
  }
  return Math.sqrt(squares / arr.length);
}

/**
 * Get min and max values in a single pass.
 * Returns zeros for empty arrays.
 */
export function minMax(arr: readonly number[]): { min: number; max: number } {
  if (arr.length === 0) {
    return { min: 0, max: 0 };
  }
  let lo = arr[0];
  let hi = arr[0];
  for (const value of arr) {
    if (value < lo) lo = value;
    if (value > hi) hi = value;
  }
  return { min: lo, max: hi };
}

/**
 * Root mean square of a sample array. Returns 0 for empty input.
 */
export function rms(samples: ArrayLike<number>): number {
  if (samples.length === 0) return 0;
  let total = 0;
  for (let i = 0; i < samples.length; i++) {
    total += samples[i] * samples[i];
  }
  return Math.sqrt(total / samples.length);
}

/**
 * Largest absolute sample value. Returns 0 for empty input.
 */
export function peakAmplitude(samples: ArrayLike<number>): number {
  let peak = 0;
  for (let i = 0; i < samples.length; i++) {
    const value = Math.abs(samples[i]);
    if (value > peak) peak = value;
  }
  return peak;
}
