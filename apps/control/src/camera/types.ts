/**
 * Camera module type definitions
 */

import type { ParameterSet } from "../parameters/parameter-set";
import type { CameraFunctionality } from "./functionality";

/**
 * Camera driver interface
 * All camera implementations must implement this interface. A driver is
 * owned by exactly one controller; nothing else calls into it.
 */
export interface CameraDriver {
  // State reads

  /**
   * Current camera parameters (the driver's live set, not a copy)
   */
  getParameters(): ParameterSet;

  getCameraFunctionality(): CameraFunctionality;

  // Configuration

  /**
   * Apply this camera's sub-tree of the parameters
   */
  newParameters(parameters: ParameterSet): Promise<void>;

  /**
   * Configure a fixed length film of `frames` frames
   */
  setFilmLength(frames: number): Promise<void>;

  // Acquisition

  startCamera(): Promise<void>;

  stopCamera(): Promise<void>;

  /**
   * Finish the current film, whether or not the camera is still running
   */
  stopFilm(): Promise<void>;

  toggleShutter(): Promise<void>;

  // Lifecycle

  cleanUp(): Promise<void>;
}

export interface CameraDriverOptions {
  cameraName: string;
  /** Initial parameters for this camera */
  parameters: ParameterSet;
  isMaster: boolean;
}

/**
 * Camera driver factory function type
 */
export type CameraDriverFactory = (options: CameraDriverOptions) => CameraDriver;
