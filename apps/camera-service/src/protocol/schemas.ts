import { z } from "zod";
import { PIXEL_FORMATS, TRIGGER_TYPES } from "@isocam/config";
import type {
  CameraSettings,
  ClientMessage,
  RawMessage,
  ServerMessage,
  SettingChanges,
} from "@isocam/types";
import { InvalidRequestError } from "../camera/errors";

// ============================================================================
// Settings
// ============================================================================

const rangeSchema = z.object({
  min: z.number(),
  max: z.number(),
});

const colorGainSchema = z.tuple([z.number(), z.number(), z.number()]);

export const cameraSettingsSchema: z.ZodType<CameraSettings> = z.object({
  exposure_ms: z.number(),
  exposure_range: rangeSchema,
  binning_x: z.number().int(),
  binning_x_range: rangeSchema,
  binning_y: z.number().int(),
  binning_y_range: rangeSchema,
  sensor_size: z.tuple([z.number().int(), z.number().int()]),
  roi_x: z.number().int(),
  roi_y: z.number().int(),
  roi_width: z.number().int(),
  roi_height: z.number().int(),
  trigger_type: z.enum(TRIGGER_TYPES),
  supported_triggers: z.array(z.enum(TRIGGER_TYPES)),
  trigger_count: z.number().int(),
  frame_queue_size: z.number().int(),
  gain: z.number(),
  gain_range: rangeSchema,
  black_level: z.number(),
  black_level_range: rangeSchema,
  freq: z.string(),
  supported_freqs: z.array(z.string()),
  taps: z.string(),
  supported_taps: z.array(z.string()),
  supports_color: z.boolean(),
  color_gain: colorGainSchema,
});

export const settingChangesSchema: z.ZodType<SettingChanges> = z
  .object({
    exposure_ms: z.number(),
    binning_x: z.number().int(),
    binning_y: z.number().int(),
    roi_x: z.number().int(),
    roi_y: z.number().int(),
    roi_width: z.number().int(),
    roi_height: z.number().int(),
    trigger_type: z.enum(TRIGGER_TYPES),
    trigger_count: z.number().int(),
    frame_queue_size: z.number().int(),
    gain: z.number(),
    black_level: z.number(),
    freq: z.string(),
    taps: z.string(),
    color_gain: colorGainSchema,
  })
  .partial();

// ============================================================================
// Messages
// ============================================================================

const settingValueSchema = z.union([z.number(), z.string(), colorGainSchema]);

export const clientMessageSchema: z.ZodType<ClientMessage> = z.discriminatedUnion("tag", [
  z.object({ tag: z.literal("open_cam"), value: z.string().min(1) }),
  z.object({ tag: z.literal("close_cam"), value: z.null() }),
  z.object({ tag: z.literal("play"), value: z.null() }),
  z.object({ tag: z.literal("stop"), value: z.null() }),
  z.object({ tag: z.literal("setting"), value: z.tuple([z.string(), settingValueSchema]) }),
  z.object({ tag: z.literal("serials"), value: z.null() }),
  z.object({ tag: z.literal("eof"), value: z.null() }),
]);

const imageValueSchema = z.tuple([
  z.instanceof(Uint8Array),
  z.enum(PIXEL_FORMATS),
  z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
  z.number().int().nonnegative(),
  z.number().int().nonnegative(),
  z.number(),
]);

export const serverMessageSchema: z.ZodType<ServerMessage> = z.discriminatedUnion("tag", [
  z.object({ tag: z.literal("cam_open"), value: z.null() }),
  z.object({ tag: z.literal("cam_closed"), value: z.null() }),
  z.object({ tag: z.literal("playing"), value: z.boolean() }),
  z.object({ tag: z.literal("settings"), value: cameraSettingsSchema }),
  z.object({ tag: z.literal("setting"), value: settingChangesSchema }),
  z.object({ tag: z.literal("serials"), value: z.array(z.string()) }),
  z.object({ tag: z.literal("image"), value: imageValueSchema }),
  z.object({ tag: z.literal("exception"), value: z.tuple([z.string(), z.string()]) }),
]);

// ============================================================================
// Parsing
// ============================================================================

export type ParseResult<T> =
  | { ok: true; message: T }
  | { ok: false; error: InvalidRequestError };

function parseWith<T>(schema: z.ZodType<T>, raw: RawMessage, direction: string): ParseResult<T> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, message: parsed.data };
  }

  const detail = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "message"}: ${issue.message}`)
    .join("; ");
  return {
    ok: false,
    error: new InvalidRequestError(`Invalid ${direction} message "${raw.tag}": ${detail}`, {
      metadata: { tag: raw.tag },
    }),
  };
}

export function parseClientMessage(raw: RawMessage): ParseResult<ClientMessage> {
  return parseWith(clientMessageSchema, raw, "client");
}

export function parseServerMessage(raw: RawMessage): ParseResult<ServerMessage> {
  return parseWith(serverMessageSchema, raw, "server");
}
