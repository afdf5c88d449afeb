import { describe, it, expect } from "vitest";
import {
  CameraError,
  CameraRunningError,
  DeviceError,
  TaskTimeoutError,
  toDeviceError,
} from "../errors";
import { ProtocolViolationError } from "../../bus/errors";

describe("camera errors", () => {
  it("keep their class across the hierarchy", () => {
    const error = new CameraRunningError({ cameraName: "camera1" });

    expect(error).toBeInstanceOf(CameraRunningError);
    expect(error).toBeInstanceOf(DeviceError);
    expect(error).toBeInstanceOf(CameraError);
    expect(error.name).toBe("CameraRunningError");
    expect(error.context.operation).toBe("newParameters");
  });

  it("serialise with their context", () => {
    const error = new TaskTimeoutError(250, {
      operation: "startCamera",
      cameraName: "camera1",
      messageType: "start-camera",
    });

    expect(error.toJSON()).toEqual({
      name: "TaskTimeoutError",
      message: "Task timed out after 250ms",
      timestamp: error.timestamp,
      context: {
        operation: "startCamera",
        cameraName: "camera1",
        messageType: "start-camera",
        timestamp: error.timestamp,
      },
    });
  });

  describe("toDeviceError()", () => {
    it("passes camera errors through", () => {
      const original = new CameraRunningError();
      expect(toDeviceError(original, { operation: "newParameters" })).toBe(original);
    });

    it("wraps anything else with the operation and cause", () => {
      const cause = new Error("usb reset");
      const error = toDeviceError(cause, { operation: "stopCamera", cameraName: "camera2" });

      expect(error).toBeInstanceOf(DeviceError);
      expect(error.message).toBe("stopCamera failed: usb reset");
      expect(error.context.cameraName).toBe("camera2");
      expect(error.cause).toBe(cause);
    });

    it("wraps non-Error values", () => {
      expect(toDeviceError("timeout", { operation: "toggleShutter" }).message).toBe(
        "toggleShutter failed: timeout",
      );
    });
  });
});

describe("ProtocolViolationError", () => {
  it("serialises the issues", () => {
    const error = new ProtocolViolationError("stop-film", "response", ["parameters: Required"]);

    expect(error.toJSON()).toEqual({
      name: "ProtocolViolationError",
      message:
        'Message response does not match its registered shape ("stop-film"): parameters: Required',
      messageType: "stop-film",
      part: "response",
      issues: ["parameters: Required"],
    });
  });
});
