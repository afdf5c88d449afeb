/**
 * Camera Controller
 *
 * Controller for a single camera; there is one per camera and the camera
 * name is the module name. Operates the camera on behalf of the other
 * modules and hands out its configuration (functionality) on request.
 *
 * The only state carried from one message to the next is the film length
 * of a pending fixed length film.
 */

import { formatFrameCount } from "@filmbus/utils";
import { HalModule } from "../bus/hal-module";
import type { HalMessage } from "../bus/message";
import {
  isCameraMessage,
  type CameraMessageOf,
} from "../bus/message-types";
import type { ScopedTaskRunnerOptions } from "./task-runner";
import type { CameraDriver } from "./types";
import { toDeviceError } from "./errors";
import { cameraLogger } from "./logger";

export type FilmLengthState =
  | { readonly kind: "idle" }
  | { readonly kind: "pendingFixedLength"; readonly frames: number };

export interface CameraControllerOptions {
  cameraName: string;
  driver: CameraDriver;
  task?: ScopedTaskRunnerOptions;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled camera message: ${JSON.stringify(value)}`);
}

export class CameraController extends HalModule {
  private readonly driver: CameraDriver;
  private filmLength: FilmLengthState = { kind: "idle" };

  constructor(options: CameraControllerOptions) {
    super({ moduleName: options.cameraName, task: options.task });
    this.driver = options.driver;
  }

  getFilmLengthState(): FilmLengthState {
    return { ...this.filmLength };
  }

  /**
   * Pending fixed film length, null when none is pending
   */
  getFilmLength(): number | null {
    return this.filmLength.kind === "pendingFixedLength" ? this.filmLength.frames : null;
  }

  async cleanUp(): Promise<void> {
    await this.driver.cleanUp();
  }

  async processMessage(message: HalMessage): Promise<void> {
    // Message types registered by other modules are none of our business
    if (!isCameraMessage(message)) {
      return;
    }

    switch (message.type) {
      case "configure-initial":
        // Broadcast initial parameters.
        this.newMessage("initial-parameters", {
          parameters: this.driver.getParameters(),
        });
        return;

      case "film-timing-notice":
        // Only the time base camera of a fixed length film configures the length.
        if (message.data.functionality.timeBase !== this.moduleName) {
          return;
        }
        if (this.filmLength.kind === "pendingFixedLength") {
          const frames = this.filmLength.frames;
          await this.device(message, "setFilmLength", () => this.driver.setFilmLength(frames));
        }
        return;

      case "get-functionality":
        if (message.data.camera === this.moduleName) {
          message.addResponse({
            source: this.moduleName,
            data: { functionality: this.driver.getCameraFunctionality() },
          });
        }
        return;

      case "new-parameters":
        await this.updateParameters(message);
        return;

      case "shutter-toggle":
        if (message.data.camera === this.moduleName) {
          await this.device(message, "toggleShutter", () => this.driver.toggleShutter());
        }
        return;

      case "start-camera":
        // Camera specific, slave cameras have to be started before master(s).
        if (message.data.camera === this.moduleName) {
          await this.device(message, "startCamera", () => this.driver.startCamera());
        }
        return;

      case "start-film": {
        const settings = message.data.filmSettings;
        this.filmLength = settings.isFixedLength()
          ? { kind: "pendingFixedLength", frames: settings.getFilmLength() }
          : { kind: "idle" };
        cameraLogger.debug("CameraController: Film starting", {
          camera: this.moduleName,
          filmLength: formatFrameCount(this.getFilmLength()),
        });
        return;
      }

      case "stop-camera":
        if (message.data.camera === this.moduleName) {
          await this.device(message, "stopCamera", () => this.driver.stopCamera());
        }
        return;

      case "stop-film":
        await this.stopFilm(message);
        return;

      case "initial-parameters":
        return;

      default:
        return assertNever(message);
    }
  }

  /**
   * Old parameters are captured before the change, new parameters are read
   * back after the apply task has finished.
   */
  private async updateParameters(message: CameraMessageOf<"new-parameters">): Promise<void> {
    message.addResponse({
      source: this.moduleName,
      data: { oldParameters: this.driver.getParameters().copy() },
    });

    const parameters = message.data.parameters.get(this.moduleName);
    await this.device(message, "newParameters", () => this.driver.newParameters(parameters));

    message.addResponse({
      source: this.moduleName,
      data: { newParameters: this.driver.getParameters() },
    });
  }

  /**
   * Goes to every camera at once, so the driver is stopped directly rather
   * than through the task runner.
   */
  private async stopFilm(message: CameraMessageOf<"stop-film">): Promise<void> {
    if (this.filmLength.kind === "pendingFixedLength") {
      cameraLogger.debug("CameraController: Discarding pending film length", {
        camera: this.moduleName,
        frames: this.filmLength.frames,
      });
    }
    this.filmLength = { kind: "idle" };

    try {
      await this.driver.stopFilm();
    } catch (error) {
      throw toDeviceError(error, {
        operation: "stopFilm",
        cameraName: this.moduleName,
        messageId: message.id,
        messageType: message.type,
      });
    }

    message.addResponse({
      source: this.moduleName,
      data: { parameters: this.driver.getParameters() },
    });
  }

  private async device(
    message: HalMessage,
    operation: string,
    work: () => Promise<void>,
  ): Promise<void> {
    try {
      await this.runWorkerTask(message, operation, work);
    } catch (error) {
      throw toDeviceError(error, {
        operation,
        cameraName: this.moduleName,
        messageId: message.id,
        messageType: message.type,
      });
    }
  }
}
