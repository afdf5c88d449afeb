/**
 * Film Settings
 *
 * What the acquisition side asks for when a film starts.
 */

import { z } from "zod";
import type { AcquisitionMode, FilmSettingsInit } from "@filmbus/types";

export class InvalidFilmSettingsError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid film settings: ${issues.join("; ")}`);
    this.name = "InvalidFilmSettingsError";
    this.issues = issues;
    Object.setPrototypeOf(this, InvalidFilmSettingsError.prototype);
  }
}

export const FilmSettingsSchema = z
  .object({
    acquisitionMode: z.enum(["fixed_length", "run_till_abort"]),
    filmLength: z.number().int().min(0).optional(),
    basename: z.string().min(1).default("movie"),
  })
  .strict()
  .refine(
    (s) => s.acquisitionMode !== "fixed_length" || s.filmLength !== undefined,
    { message: "filmLength is required for fixed_length films", path: ["filmLength"] },
  );

export class FilmSettings {
  readonly acquisitionMode: AcquisitionMode;
  readonly basename: string;
  private readonly filmLength: number | null;

  constructor(init: FilmSettingsInit) {
    const parsed = FilmSettingsSchema.safeParse(init);
    if (!parsed.success) {
      throw new InvalidFilmSettingsError(
        parsed.error.issues.map((i) => `${i.path.join(".") || "settings"}: ${i.message}`),
      );
    }

    this.acquisitionMode = parsed.data.acquisitionMode;
    this.basename = parsed.data.basename;
    this.filmLength =
      parsed.data.acquisitionMode === "fixed_length"
        ? parsed.data.filmLength ?? null
        : null;
    Object.freeze(this);
  }

  isFixedLength(): boolean {
    return this.acquisitionMode === "fixed_length";
  }

  /**
   * Number of frames to acquire. Only defined for fixed length films.
   */
  getFilmLength(): number {
    if (this.filmLength === null) {
      throw new InvalidFilmSettingsError([
        `${this.acquisitionMode} films have no film length`,
      ]);
    }
    return this.filmLength;
  }
}
