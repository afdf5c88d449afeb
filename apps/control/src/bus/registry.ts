/**
 * Message Registry
 *
 * Open registry of message types. Each type has a fixed payload shape
 * and, optionally, a response shape; both are zod schemas. Any module
 * may register types of its own.
 */

import type { z } from "zod";
import { busLogger } from "./logger";
import {
  DuplicateMessageTypeError,
  ProtocolViolationError,
  UnknownMessageTypeError,
} from "./errors";

export interface MessageContract {
  data: z.ZodTypeAny;
  resp?: z.ZodTypeAny;
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
}

export class MessageRegistry {
  private readonly contracts = new Map<string, MessageContract>();

  /**
   * Register a message type. With `allowExisting` a second registration
   * of the same type is ignored, the first contract stays in force.
   */
  register(
    type: string,
    contract: MessageContract,
    options: { allowExisting?: boolean } = {},
  ): void {
    if (this.contracts.has(type)) {
      if (options.allowExisting) {
        return;
      }
      throw new DuplicateMessageTypeError(type);
    }

    this.contracts.set(type, contract);
    busLogger.debug("MessageRegistry: Registered message type", { type });
  }

  registerAll(
    contracts: Record<string, MessageContract>,
    options: { allowExisting?: boolean } = {},
  ): void {
    for (const [type, contract] of Object.entries(contracts)) {
      this.register(type, contract, options);
    }
  }

  has(type: string): boolean {
    return this.contracts.has(type);
  }

  types(): string[] {
    return [...this.contracts.keys()];
  }

  validateData(type: string, data: unknown): void {
    const parsed = this.contractFor(type).data.safeParse(data);
    if (!parsed.success) {
      throw new ProtocolViolationError(type, "data", describeIssues(parsed.error));
    }
  }

  validateResponse(type: string, data: unknown): void {
    const schema = this.contractFor(type).resp;
    if (!schema) {
      throw new ProtocolViolationError(type, "response", [
        "this message type takes no responses",
      ]);
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ProtocolViolationError(type, "response", describeIssues(parsed.error));
    }
  }

  private contractFor(type: string): MessageContract {
    const contract = this.contracts.get(type);
    if (!contract) {
      throw new UnknownMessageTypeError(type);
    }
    return contract;
  }
}
