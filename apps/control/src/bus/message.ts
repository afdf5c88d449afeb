/**
 * Bus Message
 *
 * A typed request travelling over the bus. Every module that handles it
 * may append responses (and the bus appends errors); nothing is ever
 * removed or reordered once appended.
 */

import { nanoid } from "nanoid";

export interface HalMessageResponse<R = unknown> {
  /** Module that produced the response */
  source: string;
  data: R;
}

export interface HalMessageError {
  /** Module whose handler failed */
  source: string;
  error: Error;
}

export type ResponseCheck = (data: unknown) => void;

export class HalMessage<T extends string = string, D = unknown, R = unknown> {
  readonly id: string;
  readonly type: T;
  readonly source: string;
  readonly data: D;
  readonly createdAt: string;

  private readonly responses: HalMessageResponse<R>[] = [];
  private readonly errors: HalMessageError[] = [];
  private responseCheck: ResponseCheck | null = null;

  constructor(options: { type: T; source: string; data: D }) {
    this.id = nanoid();
    this.type = options.type;
    this.source = options.source;
    this.data = options.data;
    this.createdAt = new Date().toISOString();
  }

  /**
   * Set by the bus when it accepts the message
   */
  bindResponseCheck(check: ResponseCheck): void {
    this.responseCheck = check;
  }

  addResponse(response: HalMessageResponse<R>): void {
    if (this.responseCheck) {
      this.responseCheck(response.data);
    }
    this.responses.push(response);
  }

  getResponses(): ReadonlyArray<HalMessageResponse<R>> {
    return this.responses;
  }

  addError(error: HalMessageError): void {
    this.errors.push(error);
  }

  getErrors(): ReadonlyArray<HalMessageError> {
    return this.errors;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  toString(): string {
    return `${this.type} (${this.id}) from ${this.source}`;
  }
}
