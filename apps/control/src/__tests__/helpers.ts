/**
 * Shared test doubles for bus tests
 */

import { HalModule } from "../bus/hal-module";
import type { HalMessage } from "../bus/message";
import type { CameraMessageData, CameraMessageType } from "../bus/message-types";

export type MessageHandler = (message: HalMessage) => void | Promise<void>;

/**
 * Module that appends "<module>:<type>" to a shared log for every message
 */
export class RecordingModule extends HalModule {
  public cleanedUp = false;

  constructor(
    moduleName: string,
    private readonly log: string[],
    private readonly handler?: MessageHandler,
  ) {
    super({ moduleName });
  }

  async processMessage(message: HalMessage): Promise<void> {
    this.log.push(`${this.moduleName}:${message.type}`);
    if (this.handler) {
      await this.handler(message);
    }
  }

  async cleanUp(): Promise<void> {
    this.cleanedUp = true;
  }

  emitMessage<K extends CameraMessageType>(type: K, data: CameraMessageData<K>): void {
    this.newMessage(type, data);
  }
}
