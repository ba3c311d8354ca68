/**
 * Utility functions for formatting data
 */

/**
 * Format an error for the trace half of an exception report.
 * Causes are appended the way Node prints them.
 */
export function formatErrorTrace(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  let trace = error.stack ?? `${error.name}: ${error.message}`;
  if (error.cause !== undefined) {
    trace += `\nCaused by: ${formatErrorTrace(error.cause)}`;
  }
  return trace;
}

/**
 * Format duration in milliseconds as a short human-readable string
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
  const remaining = Math.round(seconds % 60);
  return `${minutes}m ${remaining}s`;
}
