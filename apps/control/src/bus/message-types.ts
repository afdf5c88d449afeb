/**
 * Camera Message Contract
 *
 * The closed set of message kinds a camera controller understands.
 * Payload and response types are inferred from the schemas, so the
 * registry check and the compile-time check cannot drift apart.
 */

import { z } from "zod";
import { ParameterSet } from "../parameters/parameter-set";
import { CameraFunctionality, TimingFunctionality } from "../camera/functionality";
import { FilmSettings } from "../film/film-settings";
import { HalMessage } from "./message";
import type { MessageContract } from "./registry";

const EmptyDataSchema = z.object({}).strict();

const CameraTargetSchema = z
  .object({
    camera: z.string().min(1),
  })
  .strict();

const ParametersSchema = z
  .object({
    parameters: z.instanceof(ParameterSet),
  })
  .strict();

export const CAMERA_MESSAGES = {
  // Sent once at start up, each camera answers with "initial-parameters"
  "configure-initial": {
    data: EmptyDataSchema,
  },
  "initial-parameters": {
    data: ParametersSchema,
  },
  // Sent by the timing module once it knows which module drives the film
  "film-timing-notice": {
    data: z
      .object({
        functionality: z.instanceof(TimingFunctionality),
      })
      .strict(),
  },
  "get-functionality": {
    data: CameraTargetSchema.extend({
      extraData: z.string().optional(),
    }).strict(),
    resp: z
      .object({
        functionality: z.instanceof(CameraFunctionality),
      })
      .strict(),
  },
  "new-parameters": {
    data: ParametersSchema,
    resp: z
      .object({
        oldParameters: z.instanceof(ParameterSet).optional(),
        newParameters: z.instanceof(ParameterSet).optional(),
      })
      .strict(),
  },
  "shutter-toggle": {
    data: CameraTargetSchema,
  },
  // Camera specific, slave cameras have to be started before the master(s)
  "start-camera": {
    data: CameraTargetSchema,
  },
  "start-film": {
    data: z
      .object({
        filmSettings: z.instanceof(FilmSettings),
      })
      .strict(),
  },
  "stop-camera": {
    data: CameraTargetSchema,
  },
  // Goes to every camera at once
  "stop-film": {
    data: EmptyDataSchema,
    resp: ParametersSchema,
  },
} as const satisfies Record<string, MessageContract>;

type CameraMessages = typeof CAMERA_MESSAGES;

export type CameraMessageType = keyof CameraMessages;

export type CameraMessageData<K extends CameraMessageType> = z.infer<
  CameraMessages[K]["data"]
>;

export type CameraMessageResponse<K extends CameraMessageType> =
  CameraMessages[K] extends { resp: infer S extends z.ZodTypeAny }
    ? z.infer<S>
    : never;

export type CameraMessageOf<K extends CameraMessageType> = HalMessage<
  K,
  CameraMessageData<K>,
  CameraMessageResponse<K>
>;

/**
 * Discriminated union over every camera message kind
 */
export type CameraMessage = {
  [K in CameraMessageType]: CameraMessageOf<K>;
}[CameraMessageType];

const CAMERA_MESSAGE_TYPES = new Set<string>(Object.keys(CAMERA_MESSAGES));

export function isCameraMessage(message: HalMessage): message is CameraMessage {
  return CAMERA_MESSAGE_TYPES.has(message.type);
}

export function createMessage<K extends CameraMessageType>(
  type: K,
  source: string,
  data: CameraMessageData<K>,
): CameraMessageOf<K> {
  return new HalMessage<K, CameraMessageData<K>, CameraMessageResponse<K>>({
    type,
    source,
    data,
  });
}
