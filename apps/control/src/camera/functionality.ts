/**
 * Capability handles passed between modules.
 *
 * Other modules use these to learn about a camera (or the film timing)
 * without holding a reference to the controller or its driver.
 */

import type { CameraFunctionalityInit } from "@filmbus/types";

export class CameraFunctionality {
  readonly cameraName: string;
  /** Module whose clock/trigger governs this feed */
  readonly timeBase: string;
  readonly isMaster: boolean;
  readonly hasShutter: boolean;
  readonly maxIntensity: number;
  readonly frameRate: number;

  constructor(init: CameraFunctionalityInit) {
    this.cameraName = init.cameraName;
    this.timeBase = init.timeBase;
    this.isMaster = init.isMaster;
    this.hasShutter = init.hasShutter;
    this.maxIntensity = init.maxIntensity;
    this.frameRate = init.frameRate;
    Object.freeze(this);
  }
}

export class TimingFunctionality {
  readonly timeBase: string;
  readonly framesPerSecond: number;

  constructor(timeBase: string, framesPerSecond: number) {
    this.timeBase = timeBase;
    this.framesPerSecond = framesPerSecond;
    Object.freeze(this);
  }
}
