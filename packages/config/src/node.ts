/**
 * Node.js-specific configuration constants
 * These require Node.js environment (process.env access)
 */

// ============================================================================
// Paths Configuration
// ============================================================================

export const PATHS = {
  /** Camera configuration file */
  CAMERA_CONFIG: process.env.CAMERA_CONFIG_PATH ?? "./config/cameras.json",
  /** Log files */
  LOGS: "./logs",
} as const;

// ============================================================================
// Environment Detection
// ============================================================================

export function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

export function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}
