import dotenv from "dotenv";
import { APP_CONFIG, ENV_KEYS, PATHS } from "@filmbus/config";
import type { TaskQueueMode } from "@filmbus/types";

// Load environment variables
dotenv.config();

const TASK_QUEUE_MODES: readonly TaskQueueMode[] = ["queue", "reject"];

function parseQueueMode(value: string | undefined): TaskQueueMode {
  const mode = TASK_QUEUE_MODES.find((m) => m === value);
  return mode ?? APP_CONFIG.TASK_QUEUE_MODE;
}

function parseMillis(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || String(fallback), 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export const env: {
  nodeEnv: string;
  logLevel: string | undefined;
  cameraConfigPath: string;
  taskQueueMode: TaskQueueMode;
  taskTimeoutMs: number;
  mockFailureMode: string;
  mockDelayMs: number;
  isDevelopment: boolean;
  isProduction: boolean;
} = {
  nodeEnv: process.env[ENV_KEYS.NODE_ENV] || "development",
  logLevel: process.env[ENV_KEYS.LOG_LEVEL],

  // Camera configuration file
  cameraConfigPath: process.env[ENV_KEYS.CAMERA_CONFIG_PATH] || PATHS.CAMERA_CONFIG,

  // Scoped task runner: 'queue' waits for the running task, 'reject' fails fast.
  // A timeout of 0 disables the task timeout.
  taskQueueMode: parseQueueMode(process.env[ENV_KEYS.TASK_QUEUE_MODE]),
  taskTimeoutMs: parseMillis(
    process.env[ENV_KEYS.TASK_TIMEOUT_MS],
    APP_CONFIG.TASK_TIMEOUT_MS,
  ),

  // Mock driver simulation
  mockFailureMode: process.env[ENV_KEYS.MOCK_FAILURE_MODE] || "none",
  mockDelayMs: parseMillis(
    process.env[ENV_KEYS.MOCK_DELAY_MS],
    APP_CONFIG.MOCK_DELAY_MS,
  ),

  isDevelopment: process.env[ENV_KEYS.NODE_ENV] === "development",
  isProduction: process.env[ENV_KEYS.NODE_ENV] === "production",
};

/**
 * Validate environment variables, returning the list of warnings
 */
export function validateEnv(): string[] {
  const warnings: string[] = [];

  const rawMode = process.env[ENV_KEYS.TASK_QUEUE_MODE];
  if (rawMode && rawMode !== env.taskQueueMode) {
    warnings.push(
      `Unknown ${ENV_KEYS.TASK_QUEUE_MODE}="${rawMode}", using "${env.taskQueueMode}"`,
    );
  }

  // Warn if simulating failures in production
  if (env.isProduction && env.mockFailureMode !== "none") {
    warnings.push(
      `${ENV_KEYS.MOCK_FAILURE_MODE} is set in production - mock cameras will fail on purpose`,
    );
  }

  if (env.isProduction && env.taskTimeoutMs === 0) {
    warnings.push("Task timeout disabled - a hung camera call will hold its controller");
  }

  return warnings;
}
