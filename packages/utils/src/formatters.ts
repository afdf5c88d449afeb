/**
 * Utility functions for formatting and timing
 */

/**
 * Format a duration in milliseconds to a short human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);

  return remainingSeconds > 0
    ? `${minutes}m ${remainingSeconds}s`
    : `${minutes}m`;
}

/**
 * Format a frame count, showing "unbounded" for open-ended films
 */
export function formatFrameCount(frames: number | null): string {
  if (frames === null) return 'unbounded';
  return frames === 1 ? '1 frame' : `${frames} frames`;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
