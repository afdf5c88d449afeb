/**
 * Camera Error Types
 *
 * Typed error hierarchy for camera controllers and their drivers.
 * All errors include structured context for logging.
 */

import { ERROR_MESSAGES } from "@filmbus/config";

// ============================================================================
// Error Context Types
// ============================================================================

export interface CameraErrorContext {
  /** Operation being performed when error occurred */
  operation: string;
  /** Camera (module) name if applicable */
  cameraName?: string;
  /** Type of the bus message being handled */
  messageType?: string;
  /** Id of the bus message being handled */
  messageId?: string;
  /** Error timestamp (ISO string) */
  timestamp: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

export type CameraErrorDetails = Partial<Omit<CameraErrorContext, "timestamp">>;

// ============================================================================
// Base Camera Error
// ============================================================================

export class CameraError extends Error {
  public readonly context: CameraErrorContext;
  public readonly timestamp: string;

  constructor(
    message: string,
    context: CameraErrorDetails & { operation: string },
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CameraError";
    this.timestamp = new Date().toISOString();
    this.context = { ...context, timestamp: this.timestamp };

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, CameraError.prototype);
  }

  /**
   * Get formatted error details for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

// ============================================================================
// Device Errors
// ============================================================================

/**
 * The driver failed an operation (I/O fault, invalid state, hardware timeout)
 */
export class DeviceError extends CameraError {
  constructor(
    message: string,
    context?: CameraErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(
      message,
      { ...context, operation: context?.operation || "device" },
      options,
    );
    this.name = "DeviceError";
    Object.setPrototypeOf(this, DeviceError.prototype);
  }
}

export class CameraRunningError extends DeviceError {
  constructor(context?: CameraErrorDetails) {
    super("Camera is running", {
      ...context,
      operation: context?.operation || "newParameters",
    });
    this.name = "CameraRunningError";
    Object.setPrototypeOf(this, CameraRunningError.prototype);
  }
}

export class ShutterUnavailableError extends DeviceError {
  constructor(context?: CameraErrorDetails) {
    super("Camera has no shutter", {
      ...context,
      operation: context?.operation || "toggleShutter",
    });
    this.name = "ShutterUnavailableError";
    Object.setPrototypeOf(this, ShutterUnavailableError.prototype);
  }
}

// ============================================================================
// Task Errors
// ============================================================================

export class ControllerBusyError extends CameraError {
  constructor(context?: CameraErrorDetails) {
    super(ERROR_MESSAGES.CONTROLLER_BUSY, {
      ...context,
      operation: context?.operation || "task",
    });
    this.name = "ControllerBusyError";
    Object.setPrototypeOf(this, ControllerBusyError.prototype);
  }
}

export class TaskConflictError extends CameraError {
  constructor(context?: CameraErrorDetails) {
    super(ERROR_MESSAGES.TASK_CONFLICT, {
      ...context,
      operation: context?.operation || "task",
    });
    this.name = "TaskConflictError";
    Object.setPrototypeOf(this, TaskConflictError.prototype);
  }
}

export class TaskTimeoutError extends CameraError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: CameraErrorDetails) {
    super(`Task timed out after ${timeoutMs}ms`, {
      ...context,
      operation: context?.operation || "task",
    });
    this.name = "TaskTimeoutError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, TaskTimeoutError.prototype);
  }
}

// ============================================================================
// Normalisation
// ============================================================================

/**
 * Wrap anything a driver throws into a CameraError carrying the context
 * of the operation. CameraErrors pass through unchanged.
 */
export function toDeviceError(
  error: unknown,
  context: CameraErrorDetails & { operation: string },
): CameraError {
  if (error instanceof CameraError) {
    return error;
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new DeviceError(`${context.operation} failed: ${reason}`, context, {
    cause: error,
  });
}
