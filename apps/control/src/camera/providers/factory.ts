/**
 * Camera Driver Factory
 * Creates the driver named by the camera configuration. Drivers are
 * registered by type; the controller receives the instance ready-made.
 */

import type { CameraDriver, CameraDriverFactory, CameraDriverOptions } from "../types";
import { MockCameraDriver } from "./mock";
import { cameraLogger } from "../logger";

export class UnknownDriverError extends Error {
  public readonly driverType: string;

  constructor(driverType: string) {
    super(`No camera driver registered for type "${driverType}"`);
    this.name = "UnknownDriverError";
    this.driverType = driverType;
    Object.setPrototypeOf(this, UnknownDriverError.prototype);
  }
}

const drivers = new Map<string, CameraDriverFactory>([
  ["mock", (options) => new MockCameraDriver(options)],
]);

/**
 * Register (or replace) the factory for a driver type
 */
export function registerDriver(type: string, factory: CameraDriverFactory): void {
  cameraLogger.info("CameraDriverFactory: Registering driver", { type });
  drivers.set(type, factory);
}

/**
 * Create a camera driver instance
 */
export function createDriver(
  type: string,
  options: CameraDriverOptions,
): CameraDriver {
  const factory = drivers.get(type);
  if (!factory) {
    throw new UnknownDriverError(type);
  }

  cameraLogger.info("CameraDriverFactory: Creating driver", {
    type,
    camera: options.cameraName,
    master: options.isMaster,
  });
  return factory(options);
}

/**
 * Get registered driver types
 */
export function getAvailableDrivers(): string[] {
  return [...drivers.keys()];
}
