/**
 * Camera Controller Tests
 *
 * Critical Invariants:
 * - Addressed messages are handled only by the named camera, others ignore them
 * - "old parameters" is a snapshot taken before the apply task runs
 * - "stop-film" always clears the pending film length and answers once
 * - Driver failures surface as CameraErrors carrying the message context
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { sleep } from "@filmbus/utils";
import { CameraController } from "../camera-controller";
import { TimingFunctionality } from "../functionality";
import { ControllerBusyError, DeviceError } from "../errors";
import { CAMERA_MESSAGES, createMessage } from "../../bus/message-types";
import { HalMessage } from "../../bus/message";
import { MessageBus } from "../../bus/message-bus";
import { MessageRegistry } from "../../bus/registry";
import { FilmSettings } from "../../film/film-settings";
import { ParameterSet } from "../../parameters/parameter-set";
import { FakeDriver } from "../../__tests__/fake-driver";

function fixedLength(frames: number) {
  return createMessage("start-film", "test", {
    filmSettings: new FilmSettings({ acquisitionMode: "fixed_length", filmLength: frames }),
  });
}

function timingNotice(timeBase: string) {
  return createMessage("film-timing-notice", "test", {
    functionality: new TimingFunctionality(timeBase, 10),
  });
}

describe("CameraController", () => {
  let driver: FakeDriver;
  let controller: CameraController;

  beforeEach(() => {
    driver = new FakeDriver("cam1");
    controller = new CameraController({ cameraName: "cam1", driver });
  });

  it("uses the camera name as module name", () => {
    expect(controller.moduleName).toBe("cam1");
  });

  describe("fixed length films", () => {
    it("configures the film length on the time base camera", async () => {
      await controller.processMessage(fixedLength(500));
      expect(controller.getFilmLength()).toBe(500);
      expect(controller.getFilmLengthState()).toEqual({
        kind: "pendingFixedLength",
        frames: 500,
      });

      await controller.processMessage(timingNotice("cam1"));
      expect(driver.setFilmLength).toHaveBeenCalledTimes(1);
      expect(driver.setFilmLength).toHaveBeenCalledWith(500);

      const stop = createMessage("stop-film", "test", {});
      await controller.processMessage(stop);
      expect(controller.getFilmLength()).toBeNull();
      expect(stop.getResponses()).toEqual([
        { source: "cam1", data: { parameters: driver.parameters } },
      ]);
    });

    it("hands out a copy of the film length state", async () => {
      await controller.processMessage(fixedLength(500));

      const state = controller.getFilmLengthState();
      Object.assign(state, { frames: 1 });

      expect(controller.getFilmLength()).toBe(500);
    });

    it("leaves the film length to the time base camera", async () => {
      await controller.processMessage(fixedLength(500));
      await controller.processMessage(timingNotice("cam2"));

      expect(driver.setFilmLength).not.toHaveBeenCalled();
      expect(controller.getFilmLength()).toBe(500);
    });

    it("does nothing on the timing notice of a run_till_abort film", async () => {
      await controller.processMessage(
        createMessage("start-film", "test", {
          filmSettings: new FilmSettings({ acquisitionMode: "run_till_abort" }),
        }),
      );
      expect(controller.getFilmLength()).toBeNull();

      await controller.processMessage(timingNotice("cam1"));
      expect(driver.setFilmLength).not.toHaveBeenCalled();
    });

    it("discards a pending length when the film stops before the timing notice", async () => {
      await controller.processMessage(fixedLength(20));
      await controller.processMessage(createMessage("stop-film", "test", {}));
      await controller.processMessage(timingNotice("cam1"));

      expect(controller.getFilmLengthState()).toEqual({ kind: "idle" });
      expect(driver.setFilmLength).not.toHaveBeenCalled();
    });
  });

  describe("stop-film", () => {
    it("answers once even when no film is running", async () => {
      const stop = createMessage("stop-film", "test", {});
      await controller.processMessage(stop);

      expect(stop.getResponses()).toHaveLength(1);
      expect(driver.stopFilm).toHaveBeenCalledTimes(1);
    });

    it("calls the driver directly, bypassing the task runner", async () => {
      const reject = new CameraController({
        cameraName: "cam1",
        driver,
        task: { mode: "reject" },
      });
      driver.startCamera.mockImplementation(() => sleep(20));

      const start = reject.processMessage(createMessage("start-camera", "test", { camera: "cam1" }));
      await expect(
        reject.processMessage(createMessage("stop-film", "test", {})),
      ).resolves.toBeUndefined();
      await start;
    });

    it("wraps a driver failure without answering", async () => {
      driver.stopFilm.mockRejectedValue(new Error("disk full"));
      const stop = createMessage("stop-film", "test", {});

      await expect(controller.processMessage(stop)).rejects.toThrow("stopFilm failed: disk full");
      expect(stop.getResponses()).toHaveLength(0);
      expect(controller.getFilmLength()).toBeNull();
    });
  });

  describe("get-functionality", () => {
    it("answers for its own camera", async () => {
      const message = createMessage("get-functionality", "test", { camera: "cam1" });
      await controller.processMessage(message);

      expect(message.getResponses()).toHaveLength(1);
      expect(message.getResponses()[0].source).toBe("cam1");
      expect(message.getResponses()[0].data.functionality.cameraName).toBe("cam1");
    });

    it("ignores requests for other cameras", async () => {
      const message = createMessage("get-functionality", "test", { camera: "cam2" });
      await controller.processMessage(message);

      expect(message.getResponses()).toHaveLength(0);
      expect(driver.getCameraFunctionality).not.toHaveBeenCalled();
    });
  });

  describe("new-parameters", () => {
    let parameters: ParameterSet;

    beforeEach(() => {
      parameters = ParameterSet.fromObject("root", {
        cam1: { exposure_time: 0.5 },
        cam2: { exposure_time: 0.9 },
      });
    });

    it("answers with the old, then the new parameters", async () => {
      const message = createMessage("new-parameters", "test", { parameters });
      await controller.processMessage(message);

      expect(driver.newParameters).toHaveBeenCalledTimes(1);
      expect(driver.newParameters).toHaveBeenCalledWith(parameters.get("cam1"));

      const responses = message.getResponses();
      expect(responses).toHaveLength(2);
      expect(responses[0].data.oldParameters?.toObject()).toEqual({
        exposure_time: 0.1,
        fps: 10,
      });
      expect(responses[1].data.newParameters?.toObject()).toEqual({
        exposure_time: 0.5,
        fps: 10,
      });
    });

    it("keeps the old snapshot independent of later changes", async () => {
      const message = createMessage("new-parameters", "test", { parameters });
      await controller.processMessage(message);

      driver.parameters.set("fps", 99);

      expect(message.getResponses()[0].data.oldParameters?.getValue("fps")).toBe(10);
    });

    it("takes the snapshot before the apply task runs", async () => {
      const seen: unknown[] = [];
      driver.newParameters.mockImplementation((p: ParameterSet) => {
        seen.push(message.getResponses().length);
        driver.parameters.set("exposure_time", p.getValue("exposure_time"));
        return Promise.resolve();
      });
      const message = createMessage("new-parameters", "test", { parameters });

      await controller.processMessage(message);

      expect(seen).toEqual([1]);
      expect(message.getResponses()[0].data.oldParameters?.getValue("exposure_time")).toBe(0.1);
    });

    it("fails when the set has no sub-tree for this camera", async () => {
      const message = createMessage("new-parameters", "test", {
        parameters: ParameterSet.fromObject("root", { cam2: { fps: 1 } }),
      });

      await expect(controller.processMessage(message)).rejects.toThrow(
        'Parameter "cam1" does not exist in "root"',
      );
      expect(message.getResponses()).toHaveLength(1);
      expect(driver.newParameters).not.toHaveBeenCalled();
    });

    it("wraps a driver failure in a DeviceError with the message context", async () => {
      driver.newParameters.mockRejectedValue(new Error("camera busy"));
      const message = createMessage("new-parameters", "test", { parameters });

      const error = await controller.processMessage(message).then(
        () => null,
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(DeviceError);
      if (error instanceof DeviceError) {
        expect(error.message).toBe("newParameters failed: camera busy");
        expect(error.context.cameraName).toBe("cam1");
        expect(error.context.messageType).toBe("new-parameters");
        expect(error.context.messageId).toBe(message.id);
      }
      expect(message.getResponses()).toHaveLength(1);
    });
  });

  describe("addressed device calls", () => {
    it.each([
      ["start-camera", "startCamera"],
      ["stop-camera", "stopCamera"],
      ["shutter-toggle", "toggleShutter"],
    ] as const)("%s calls %s on the named camera only", async (type, method) => {
      await controller.processMessage(createMessage(type, "test", { camera: "cam2" }));
      expect(driver[method]).not.toHaveBeenCalled();

      await controller.processMessage(createMessage(type, "test", { camera: "cam1" }));
      expect(driver[method]).toHaveBeenCalledTimes(1);
    });

    it("reports a busy controller in 'reject' mode", async () => {
      const reject = new CameraController({
        cameraName: "cam1",
        driver,
        task: { mode: "reject" },
      });
      driver.startCamera.mockImplementation(() => sleep(20));

      const start = reject.processMessage(createMessage("start-camera", "test", { camera: "cam1" }));
      await expect(
        reject.processMessage(createMessage("stop-camera", "test", { camera: "cam1" })),
      ).rejects.toThrow(ControllerBusyError);
      await start;
      expect(driver.stopCamera).not.toHaveBeenCalled();
    });
  });

  describe("other messages", () => {
    it("ignores initial-parameters and foreign message types", async () => {
      await controller.processMessage(
        createMessage("initial-parameters", "cam2", { parameters: new ParameterSet("cam2") }),
      );
      await controller.processMessage(
        new HalMessage({ type: "laser-on", source: "laser", data: { power: 1 } }),
      );

      expect(driver.getParameters).not.toHaveBeenCalled();
    });

    it("cleans up the driver", async () => {
      await controller.cleanUp();
      expect(driver.cleanUp).toHaveBeenCalledTimes(1);
    });
  });

  describe("on the bus", () => {
    let bus: MessageBus;

    beforeEach(() => {
      const registry = new MessageRegistry();
      registry.registerAll(CAMERA_MESSAGES);
      bus = new MessageBus(registry);
      bus.addModule(controller);
    });

    it("broadcasts its parameters on configure-initial", async () => {
      const handled = vi.fn<(message: HalMessage) => void>();
      bus.on("message:handled", handled);

      await bus.send(createMessage("configure-initial", "bus", {}));
      await bus.idle();

      expect(handled).toHaveBeenCalledTimes(2);
      const broadcast = handled.mock.calls[1][0];
      expect(broadcast.type).toBe("initial-parameters");
      expect(broadcast.source).toBe("cam1");
      expect(broadcast.data).toEqual({ parameters: driver.parameters });
    });

    it("records driver failures on the message", async () => {
      driver.startCamera.mockRejectedValue(new Error("no power"));

      const message = await bus.send(createMessage("start-camera", "test", { camera: "cam1" }));

      expect(message.getErrors()).toHaveLength(1);
      expect(message.getErrors()[0].source).toBe("cam1");
      expect(message.getErrors()[0].error.message).toBe("startCamera failed: no power");
    });

    it("passes the response contract", async () => {
      const message = await bus.send(
        createMessage("new-parameters", "test", {
          parameters: ParameterSet.fromObject("root", { cam1: { fps: 25 } }),
        }),
      );

      expect(message.hasErrors()).toBe(false);
      expect(message.getResponses()).toHaveLength(2);
      expect(driver.parameters.getValue("fps")).toBe(25);
    });
  });
});
