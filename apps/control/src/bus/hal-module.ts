/**
 * HAL Module
 *
 * Base class for everything that sits on the bus. A module only talks to
 * the rest of the application through messages: it handles the ones the
 * bus delivers and emits new ones with newMessage().
 */

import { EventEmitter } from "events";
import { ScopedTaskRunner, type ScopedTaskRunnerOptions } from "../camera/task-runner";
import {
  createMessage,
  type CameraMessageData,
  type CameraMessageType,
} from "./message-types";
import type { HalMessage } from "./message";

export interface HalModuleOptions {
  moduleName: string;
  task?: ScopedTaskRunnerOptions;
}

export type NewMessageListener = (message: HalMessage) => void;

export abstract class HalModule extends EventEmitter {
  readonly moduleName: string;
  protected readonly taskRunner: ScopedTaskRunner;

  constructor(options: HalModuleOptions) {
    super();
    this.moduleName = options.moduleName;
    this.taskRunner = new ScopedTaskRunner(options.moduleName, options.task);
  }

  /**
   * Handle one message. Rejections are recorded on the message by the bus.
   */
  abstract processMessage(message: HalMessage): Promise<void>;

  /**
   * Release anything the module holds. Called once by the bus on shutdown.
   */
  async cleanUp(): Promise<void> {}

  onNewMessage(listener: NewMessageListener): () => void {
    this.on("newMessage", listener);
    return () => this.off("newMessage", listener);
  }

  /**
   * Emit a message sourced from this module onto the bus
   */
  protected newMessage<K extends CameraMessageType>(
    type: K,
    data: CameraMessageData<K>,
  ): void {
    this.emit("newMessage", createMessage(type, this.moduleName, data));
  }

  /**
   * Run device work for `message` on this module's task runner and wait
   * for it to complete.
   */
  protected runWorkerTask<T>(
    message: HalMessage,
    operation: string,
    work: () => T | Promise<T>,
  ): Promise<T> {
    return this.taskRunner.run(message, operation, work);
  }
}
