/**
 * Node.js-specific configuration constants
 * These require Node.js environment (process.env access)
 */

// ============================================================================
// Paths Configuration
// ============================================================================

export const PATHS = {
  /** Log files */
  LOGS: process.env.ISOCAM_LOG_PATH ?? "./logs",
} as const;

// ============================================================================
// Environment Detection
// ============================================================================

export function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}
