/**
 * Bus Error Types
 *
 * Raised by the bus itself, before a message reaches any module.
 */

import { ERROR_MESSAGES } from "@filmbus/config";

export class BusError extends Error {
  public readonly messageType: string;

  constructor(message: string, messageType: string) {
    super(message);
    this.name = "BusError";
    this.messageType = messageType;
    Object.setPrototypeOf(this, BusError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      messageType: this.messageType,
    };
  }
}

export class UnknownMessageTypeError extends BusError {
  constructor(messageType: string) {
    super(`${ERROR_MESSAGES.UNKNOWN_MESSAGE_TYPE}: "${messageType}"`, messageType);
    this.name = "UnknownMessageTypeError";
    Object.setPrototypeOf(this, UnknownMessageTypeError.prototype);
  }
}

export class DuplicateMessageTypeError extends BusError {
  constructor(messageType: string) {
    super(`Message type "${messageType}" is already registered`, messageType);
    this.name = "DuplicateMessageTypeError";
    Object.setPrototypeOf(this, DuplicateMessageTypeError.prototype);
  }
}

/**
 * Payload or response does not match the shape registered for its type
 */
export class ProtocolViolationError extends BusError {
  public readonly issues: string[];
  public readonly part: "data" | "response";

  constructor(messageType: string, part: "data" | "response", issues: string[]) {
    const base =
      part === "data" ? ERROR_MESSAGES.INVALID_PAYLOAD : ERROR_MESSAGES.INVALID_RESPONSE;
    super(`${base} ("${messageType}"): ${issues.join("; ")}`, messageType);
    this.name = "ProtocolViolationError";
    this.issues = issues;
    this.part = part;
    Object.setPrototypeOf(this, ProtocolViolationError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), part: this.part, issues: this.issues };
  }
}

export class DuplicateModuleError extends Error {
  public readonly moduleName: string;

  constructor(moduleName: string) {
    super(`A module named "${moduleName}" is already on the bus`);
    this.name = "DuplicateModuleError";
    this.moduleName = moduleName;
    Object.setPrototypeOf(this, DuplicateModuleError.prototype);
  }
}
