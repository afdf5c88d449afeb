import type { CameraConfig } from "@filmbus/types";
import { createLogger } from "@filmbus/utils";
import { env } from "./config/env";
import { MessageBus } from "./bus/message-bus";
import { MessageRegistry } from "./bus/registry";
import { CAMERA_MESSAGES } from "./bus/message-types";
import { CameraController } from "./camera/camera-controller";
import { createDriver } from "./camera/providers/factory";
import type { ScopedTaskRunnerOptions } from "./camera/task-runner";
import { FilmSequencer } from "./film/film-sequencer";
import { ParameterSet } from "./parameters/parameter-set";

const logger = createLogger("app");

export interface ControlAppOptions {
  cameras: CameraConfig[];
  /** Defaults to TASK_QUEUE_MODE / TASK_TIMEOUT_MS from the environment */
  task?: ScopedTaskRunnerOptions;
  /** Camera driving the film timing, defaults to the first master */
  timeBase?: string;
}

export interface ControlApp {
  registry: MessageRegistry;
  bus: MessageBus;
  controllers: Map<string, CameraController>;
  sequencer: FilmSequencer;
  shutdown(): Promise<void>;
}

/**
 * Wire the bus, one controller per configured camera and the film sequencer
 */
export function createControlApp(options: ControlAppOptions): ControlApp {
  const registry = new MessageRegistry();
  registry.registerAll(CAMERA_MESSAGES);

  const bus = new MessageBus(registry);
  const task: ScopedTaskRunnerOptions = options.task ?? {
    mode: env.taskQueueMode,
    timeoutMs: env.taskTimeoutMs,
  };

  const controllers = new Map<string, CameraController>();
  for (const camera of options.cameras) {
    const driver = createDriver(camera.driver, {
      cameraName: camera.name,
      parameters: ParameterSet.fromObject(camera.name, camera.parameters),
      isMaster: camera.master,
    });
    const controller = new CameraController({ cameraName: camera.name, driver, task });
    bus.addModule(controller);
    controllers.set(camera.name, controller);
  }

  const sequencer = new FilmSequencer({
    bus,
    cameras: options.cameras.map((c) => ({ name: c.name, master: c.master })),
    timeBase: options.timeBase,
  });

  logger.info("Control app created", {
    cameras: [...controllers.keys()],
    timeBase: sequencer.getTimeBase(),
    taskMode: task.mode,
  });

  return {
    registry,
    bus,
    controllers,
    sequencer,
    shutdown: () => bus.shutdown(),
  };
}
