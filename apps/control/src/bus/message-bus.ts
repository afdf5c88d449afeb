/**
 * Message Bus
 *
 * In-process bus connecting HAL modules. Messages are handled one at a
 * time, in the order they were sent; each message goes to every module in
 * registration order and the next module only sees it once the previous
 * one has finished with it (including any scoped task it ran).
 *
 * send() must not be awaited from inside processMessage(): the awaited
 * message would queue behind the one being handled. Modules emit with
 * newMessage() instead.
 */

import { EventEmitter } from "events";
import { busLogger } from "./logger";
import { DuplicateModuleError } from "./errors";
import type { HalModule } from "./hal-module";
import type { HalMessage } from "./message";
import type { MessageRegistry } from "./registry";

interface QueuedMessage {
  message: HalMessage;
  resolve: (message: HalMessage) => void;
}

export interface MessageFailedEvent {
  message: HalMessage;
  source: string;
  error: Error;
}

export class MessageBus extends EventEmitter {
  private readonly modules: HalModule[] = [];
  private readonly detach = new Map<string, () => void>();
  private readonly queue: QueuedMessage[] = [];
  private draining: Promise<void> | null = null;
  private drainActive = false;

  constructor(private readonly registry: MessageRegistry) {
    super();
  }

  getRegistry(): MessageRegistry {
    return this.registry;
  }

  addModule(module: HalModule): void {
    if (this.modules.some((m) => m.moduleName === module.moduleName)) {
      throw new DuplicateModuleError(module.moduleName);
    }

    this.modules.push(module);
    this.detach.set(
      module.moduleName,
      module.onNewMessage((message) => this.forward(message)),
    );
    busLogger.info("MessageBus: Module added", { module: module.moduleName });
  }

  getModuleNames(): string[] {
    return this.modules.map((m) => m.moduleName);
  }

  /**
   * Validate and enqueue a message. Resolves with the same message once
   * every module has handled it; failures are on message.getErrors().
   */
  send(message: HalMessage): Promise<HalMessage> {
    try {
      this.registry.validateData(message.type, message.data);
    } catch (error) {
      busLogger.error("MessageBus: Rejected message", {
        type: message.type,
        source: message.source,
        error,
      });
      return Promise.reject(error);
    }

    const registry = this.registry;
    message.bindResponseCheck((data) => registry.validateResponse(message.type, data));

    return new Promise<HalMessage>((resolve) => {
      this.queue.push({ message, resolve });
      this.scheduleDrain();
    });
  }

  /**
   * Resolves once every queued message has been handled
   */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /**
   * Drain the queue, then clean up every module
   */
  async shutdown(): Promise<void> {
    await this.idle();

    for (const module of this.modules) {
      try {
        await module.cleanUp();
        busLogger.info("MessageBus: Module cleaned up", { module: module.moduleName });
      } catch (error) {
        busLogger.error("MessageBus: Module clean up failed", {
          module: module.moduleName,
          error,
        });
      }
    }

    for (const detach of this.detach.values()) {
      detach();
    }
    this.detach.clear();
  }

  private forward(message: HalMessage): void {
    this.send(message).catch((error: unknown) => {
      busLogger.error("MessageBus: Dropped message emitted by module", {
        type: message.type,
        source: message.source,
        error,
      });
    });
  }

  private scheduleDrain(): void {
    // A module may emit while drain() is still starting up, before
    // `draining` is assigned; the flag covers that window
    if (this.drainActive) {
      return;
    }
    this.drainActive = true;
    this.draining = this.drain();
  }

  private async drain(): Promise<void> {
    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        try {
          await this.dispatch(next.message);
        } catch (error) {
          busLogger.error("MessageBus: Dispatch failed", {
            type: next.message.type,
            id: next.message.id,
            error,
          });
        } finally {
          next.resolve(next.message);
        }
      }
    } finally {
      // Cleared in the same tick the queue was seen empty, so a send()
      // arriving afterwards always starts a new drain
      this.drainActive = false;
      this.draining = null;
    }
  }

  private async dispatch(message: HalMessage): Promise<void> {
    busLogger.debug("MessageBus: Dispatching", {
      type: message.type,
      id: message.id,
      source: message.source,
    });

    for (const module of this.modules) {
      try {
        await module.processMessage(message);
      } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(String(caught));
        message.addError({ source: module.moduleName, error });
        busLogger.error("MessageBus: Handler failed", {
          type: message.type,
          id: message.id,
          module: module.moduleName,
          error,
        });
        const event: MessageFailedEvent = { message, source: module.moduleName, error };
        this.emit("message:failed", event);
      }
    }

    this.emit("message:handled", message);
  }
}
