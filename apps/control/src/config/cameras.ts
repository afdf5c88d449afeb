/**
 * Camera configuration file loading
 */

import fs from "fs";
import { z } from "zod";
import type { CameraConfig, ParameterTree } from "@filmbus/types";

const ParameterValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const ParameterTreeSchema: z.ZodType<ParameterTree> = z.lazy(() =>
  z.record(z.union([ParameterValueSchema, ParameterTreeSchema])),
);

export const CameraConfigSchema = z
  .object({
    // Camera names double as parameter paths, where "." descends
    name: z
      .string()
      .min(1)
      .regex(/^[^.]+$/, 'camera names cannot contain "."'),
    driver: z.string().min(1),
    master: z.boolean().default(false),
    parameters: ParameterTreeSchema.default({}),
  })
  .strict();

export const CamerasFileSchema = z
  .object({
    cameras: z.array(CameraConfigSchema).min(1),
  })
  .strict()
  .refine(
    (file) => new Set(file.cameras.map((c) => c.name)).size === file.cameras.length,
    { message: "camera names must be unique", path: ["cameras"] },
  );

export class CameraConfigError extends Error {
  public readonly configPath: string;

  constructor(configPath: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid camera configuration ${configPath}: ${reason}`, options);
    this.name = "CameraConfigError";
    this.configPath = configPath;
    Object.setPrototypeOf(this, CameraConfigError.prototype);
  }
}

/**
 * Validate an already parsed camera configuration
 */
export function parseCameraConfig(raw: unknown, configPath = "<inline>"): CameraConfig[] {
  const parsed = CamerasFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "root"}: ${i.message}`)
      .join("; ");
    throw new CameraConfigError(configPath, issues);
  }
  return parsed.data.cameras;
}

/**
 * Read and validate the camera configuration JSON file
 */
export function loadCameraConfig(configPath: string): CameraConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CameraConfigError(configPath, reason, { cause: error });
  }
  return parseCameraConfig(raw, configPath);
}
