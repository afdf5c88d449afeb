import { ERROR_MESSAGES } from "@filmbus/config";
import type { HalMessageError } from "../bus/message";

/**
 * A film could not be started (or stopped) because a message failed
 */
export class FilmAbortedError extends Error {
  public readonly stage: string;
  public readonly failures: ReadonlyArray<HalMessageError>;

  constructor(stage: string, failures: ReadonlyArray<HalMessageError>) {
    const detail = failures.map((f) => `${f.source}: ${f.error.message}`).join("; ");
    super(`${ERROR_MESSAGES.FILM_ABORTED} during ${stage}: ${detail}`);
    this.name = "FilmAbortedError";
    this.stage = stage;
    this.failures = failures;
    Object.setPrototypeOf(this, FilmAbortedError.prototype);
  }
}
