/**
 * Film Sequencer
 *
 * Drives the camera message contract from the acquisition side: starts
 * and stops a film across every configured camera. Slaves are started
 * before masters and stopped after them, so no master triggers a slave
 * that is not yet listening.
 */

import { APP_CONFIG } from "@filmbus/config";
import { formatDuration, formatFrameCount } from "@filmbus/utils";
import type { MessageBus } from "../bus/message-bus";
import type { HalMessageError } from "../bus/message";
import {
  createMessage,
  type CameraMessageData,
  type CameraMessageOf,
  type CameraMessageType,
} from "../bus/message-types";
import { TimingFunctionality, type CameraFunctionality } from "../camera/functionality";
import type { ParameterSet } from "../parameters/parameter-set";
import type { FilmSettings } from "./film-settings";
import { FilmAbortedError } from "./errors";
import { filmLogger } from "./logger";

export interface FilmCamera {
  name: string;
  master: boolean;
}

export interface FilmSequencerOptions {
  bus: MessageBus;
  cameras: FilmCamera[];
  /** Camera whose clock drives the film, defaults to the first master */
  timeBase?: string;
  /** Source name on the messages the sequencer sends */
  source?: string;
}

export interface FilmStart {
  timing: TimingFunctionality;
  functionality: Map<string, CameraFunctionality>;
}

export class FilmSequencer {
  private readonly bus: MessageBus;
  private readonly cameras: FilmCamera[];
  private readonly timeBase: string;
  private readonly source: string;
  private started: string[] = [];

  constructor(options: FilmSequencerOptions) {
    if (options.cameras.length === 0) {
      throw new Error("FilmSequencer needs at least one camera");
    }

    this.bus = options.bus;
    this.cameras = [...options.cameras];
    this.source = options.source ?? APP_CONFIG.FILM_SOURCE;

    const firstMaster = this.cameras.find((c) => c.master) ?? this.cameras[0];
    this.timeBase = options.timeBase ?? firstMaster.name;
    if (!this.cameras.some((c) => c.name === this.timeBase)) {
      throw new Error(`Time base "${this.timeBase}" is not a configured camera`);
    }
  }

  getTimeBase(): string {
    return this.timeBase;
  }

  /**
   * Cameras started by the current film, in start order
   */
  getStartedCameras(): string[] {
    return [...this.started];
  }

  async startFilm(settings: FilmSettings): Promise<FilmStart> {
    const startedAt = Date.now();
    this.started = [];

    filmLogger.info("FilmSequencer: Starting film", {
      mode: settings.acquisitionMode,
      frames: formatFrameCount(settings.isFixedLength() ? settings.getFilmLength() : null),
      timeBase: this.timeBase,
    });

    const startFilm = await this.send("start-film", { filmSettings: settings });
    await this.abortOnErrors("start-film", startFilm.getErrors());

    const functionality = new Map<string, CameraFunctionality>();
    for (const camera of this.cameras) {
      const message = await this.send("get-functionality", { camera: camera.name });
      await this.abortOnErrors("get-functionality", message.getErrors());

      const response = message.getResponses().find((r) => r.source === camera.name);
      if (!response) {
        await this.abortOnErrors("get-functionality", [
          { source: camera.name, error: new Error("No functionality reported") },
        ]);
        continue;
      }
      functionality.set(camera.name, response.data.functionality);
    }

    const timeBaseFunctionality = functionality.get(this.timeBase);
    const timing = new TimingFunctionality(
      this.timeBase,
      timeBaseFunctionality ? timeBaseFunctionality.frameRate : 0,
    );
    const notice = await this.send("film-timing-notice", { functionality: timing });
    await this.abortOnErrors("film-timing-notice", notice.getErrors());

    for (const camera of this.startOrder()) {
      const message = await this.send("start-camera", { camera: camera.name });
      await this.abortOnErrors("start-camera", message.getErrors());
      this.started.push(camera.name);
    }

    filmLogger.info("FilmSequencer: Film started", {
      cameras: this.started,
      took: formatDuration(Date.now() - startedAt),
    });
    return { timing, functionality };
  }

  /**
   * Stop every camera (masters first), then finish the film. Failures are
   * logged and do not stop the sequence.
   *
   * @returns post-stop parameters per camera
   */
  async stopFilm(): Promise<Map<string, ParameterSet>> {
    for (const camera of [...this.startOrder()].reverse()) {
      const message = await this.send("stop-camera", { camera: camera.name });
      this.logFailures("stop-camera", message.getErrors());
    }
    this.started = [];

    const message = await this.send("stop-film", {});
    this.logFailures("stop-film", message.getErrors());

    const parameters = new Map<string, ParameterSet>();
    for (const response of message.getResponses()) {
      parameters.set(response.source, response.data.parameters);
    }

    filmLogger.info("FilmSequencer: Film stopped", { cameras: [...parameters.keys()] });
    return parameters;
  }

  private startOrder(): FilmCamera[] {
    return [
      ...this.cameras.filter((c) => !c.master),
      ...this.cameras.filter((c) => c.master),
    ];
  }

  private async send<K extends CameraMessageType>(
    type: K,
    data: CameraMessageData<K>,
  ): Promise<CameraMessageOf<K>> {
    const message = createMessage(type, this.source, data);
    await this.bus.send(message);
    return message;
  }

  /**
   * Stop whatever was started, finish the film and throw
   */
  private async abortOnErrors(
    stage: string,
    failures: ReadonlyArray<HalMessageError>,
  ): Promise<void> {
    if (failures.length === 0) {
      return;
    }

    filmLogger.error("FilmSequencer: Aborting film", {
      stage,
      failures: failures.map((f) => ({ source: f.source, error: f.error.message })),
      started: this.started,
    });

    const started = [...this.started].reverse();
    this.started = [];
    for (const name of started) {
      const message = await this.send("stop-camera", { camera: name });
      this.logFailures("stop-camera", message.getErrors());
    }
    const stopFilm = await this.send("stop-film", {});
    this.logFailures("stop-film", stopFilm.getErrors());

    throw new FilmAbortedError(stage, failures);
  }

  private logFailures(stage: string, failures: ReadonlyArray<HalMessageError>): void {
    for (const failure of failures) {
      filmLogger.warn(`FilmSequencer: ${stage} failed`, {
        source: failure.source,
        error: failure.error.message,
      });
    }
  }
}
