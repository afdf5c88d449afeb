/**
 * Shared configuration constants for the Filmbus acquisition bus
 */

export * from "./node";

// ============================================================================
// Application Constants
// ============================================================================

export const APP_CONFIG = {
  // Application name
  APP_NAME: "Filmbus",

  // Source name used for messages sent from outside any module
  BUS_SOURCE: "bus",
  FILM_SOURCE: "film",

  // Scoped task runner
  TASK_QUEUE_MODE: "queue",
  TASK_TIMEOUT_MS: 0,

  // Mock driver
  MOCK_DELAY_MS: 0,
} as const;

// ============================================================================
// Environment Variable Keys
// ============================================================================

export const ENV_KEYS = {
  // Node environment
  NODE_ENV: "NODE_ENV",

  // Logging
  LOG_LEVEL: "LOG_LEVEL",
  LOG_SILENT: "LOG_SILENT",

  // Cameras
  CAMERA_CONFIG_PATH: "CAMERA_CONFIG_PATH",
  TASK_QUEUE_MODE: "TASK_QUEUE_MODE",
  TASK_TIMEOUT_MS: "TASK_TIMEOUT_MS",

  // Mock driver
  MOCK_FAILURE_MODE: "MOCK_FAILURE_MODE",
  MOCK_DELAY_MS: "MOCK_DELAY_MS",
} as const;

// ============================================================================
// Error Messages
// ============================================================================

export const ERROR_MESSAGES = {
  UNKNOWN_MESSAGE_TYPE: "Unknown message type",
  INVALID_PAYLOAD: "Message payload does not match its registered shape",
  INVALID_RESPONSE: "Message response does not match its registered shape",
  CONTROLLER_BUSY: "Camera controller is busy with another task",
  TASK_CONFLICT: "A task is already running for this message",
  FILM_ABORTED: "Film aborted",
} as const;
