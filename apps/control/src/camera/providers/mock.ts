/**
 * Mock Camera Driver
 * Simulates camera behavior for development and testing
 * Supports failure simulation modes via MOCK_FAILURE_MODE env var
 */

import { sleep } from "@filmbus/utils";
import type { CameraDriver, CameraDriverOptions } from "../types";
import { CameraFunctionality } from "../functionality";
import {
  CameraRunningError,
  DeviceError,
  ShutterUnavailableError,
} from "../errors";
import { cameraLogger } from "../logger";
import type { ParameterSet } from "../../parameters/parameter-set";
import { env } from "../../config/env";

export type FailureMode =
  | "none"
  | "start_fails"
  | "stop_fails"
  | "reject_parameters"
  | "no_shutter";

const FAILURE_MODES: readonly FailureMode[] = [
  "none",
  "start_fails",
  "stop_fails",
  "reject_parameters",
  "no_shutter",
];

export function parseFailureMode(value: string | undefined): FailureMode {
  return FAILURE_MODES.find((mode) => mode === value) ?? "none";
}

export interface MockCameraDriverOptions extends CameraDriverOptions {
  failureMode?: FailureMode;
  /** Simulated latency of every device call */
  delayMs?: number;
}

function numberOr(parameters: ParameterSet, name: string, fallback: number): number {
  if (!parameters.has(name)) return fallback;
  const value = parameters.getValue(name);
  return typeof value === "number" ? value : fallback;
}

export class MockCameraDriver implements CameraDriver {
  private readonly cameraName: string;
  private readonly isMaster: boolean;
  private readonly parameters: ParameterSet;
  private readonly failureMode: FailureMode;
  private readonly delayMs: number;

  private running = false;
  private shutterOpen = false;
  private filmLength: number | null = null;
  private cleanedUp = false;

  constructor(options: MockCameraDriverOptions) {
    this.cameraName = options.cameraName;
    this.isMaster = options.isMaster;
    this.parameters = options.parameters.copy();
    this.failureMode = options.failureMode ?? parseFailureMode(env.mockFailureMode);
    this.delayMs = options.delayMs ?? env.mockDelayMs;

    cameraLogger.info(`MockCameraDriver(${this.cameraName}): Initialized`, {
      master: this.isMaster,
      failureMode: this.failureMode,
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  isShutterOpen(): boolean {
    return this.shutterOpen;
  }

  getConfiguredFilmLength(): number | null {
    return this.filmLength;
  }

  isCleanedUp(): boolean {
    return this.cleanedUp;
  }

  getParameters(): ParameterSet {
    return this.parameters;
  }

  getCameraFunctionality(): CameraFunctionality {
    return new CameraFunctionality({
      cameraName: this.cameraName,
      timeBase: this.cameraName,
      isMaster: this.isMaster,
      hasShutter: this.failureMode !== "no_shutter",
      maxIntensity: numberOr(this.parameters, "max_intensity", 65535),
      frameRate: numberOr(this.parameters, "fps", 10),
    });
  }

  async newParameters(parameters: ParameterSet): Promise<void> {
    await this.delay();

    if (this.running) {
      throw new CameraRunningError({ cameraName: this.cameraName });
    }
    if (this.failureMode === "reject_parameters") {
      throw new DeviceError("Camera rejected the new parameters", {
        operation: "newParameters",
        cameraName: this.cameraName,
      });
    }

    // Nested sets (e.g. roi) are applied leaf by leaf; nothing is applied
    // unless every leaf names an existing camera value
    const paths = parameters.leafPaths();
    for (const path of paths) {
      if (!this.parameters.hasValue(path)) {
        throw new DeviceError(`Unknown camera parameter "${path}"`, {
          operation: "newParameters",
          cameraName: this.cameraName,
        });
      }
    }
    for (const path of paths) {
      this.parameters.set(path, parameters.getValue(path));
    }

    cameraLogger.info(`MockCameraDriver(${this.cameraName}): Parameters updated`, {
      parameters: parameters.toObject(),
    });
  }

  async setFilmLength(frames: number): Promise<void> {
    await this.delay();
    this.filmLength = frames;
    cameraLogger.info(`MockCameraDriver(${this.cameraName}): Film length set`, { frames });
  }

  async startCamera(): Promise<void> {
    await this.delay();
    if (this.failureMode === "start_fails") {
      throw new DeviceError("Camera failed to start", {
        operation: "startCamera",
        cameraName: this.cameraName,
      });
    }
    this.running = true;
    cameraLogger.info(`MockCameraDriver(${this.cameraName}): Started`);
  }

  async stopCamera(): Promise<void> {
    await this.delay();
    if (this.failureMode === "stop_fails") {
      throw new DeviceError("Camera failed to stop", {
        operation: "stopCamera",
        cameraName: this.cameraName,
      });
    }
    this.running = false;
    cameraLogger.info(`MockCameraDriver(${this.cameraName}): Stopped`);
  }

  async stopFilm(): Promise<void> {
    await this.delay();
    this.filmLength = null;
    cameraLogger.info(`MockCameraDriver(${this.cameraName}): Film stopped`);
  }

  async toggleShutter(): Promise<void> {
    await this.delay();
    if (this.failureMode === "no_shutter") {
      throw new ShutterUnavailableError({ cameraName: this.cameraName });
    }
    this.shutterOpen = !this.shutterOpen;
    cameraLogger.info(`MockCameraDriver(${this.cameraName}): Shutter toggled`, {
      open: this.shutterOpen,
    });
  }

  async cleanUp(): Promise<void> {
    if (this.running) {
      await this.stopCamera();
    }
    this.cleanedUp = true;
    cameraLogger.info(`MockCameraDriver(${this.cameraName}): Cleaned up`);
  }

  private async delay(): Promise<void> {
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
  }
}
