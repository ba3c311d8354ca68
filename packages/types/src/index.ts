// ============================================================================
// Settings
// ============================================================================

/** Inclusive bounds advertised for a numeric setting */
export interface SettingRange {
  min: number;
  max: number;
}

export type TriggerType = "SW Trigger" | "HW Trigger";

/**
 * Pixel layouts a frame can carry
 * - gray16le: one little-endian 16-bit sample per pixel (mono16)
 * - bgr48le: three little-endian 16-bit samples per pixel, B then G then R (bgr48)
 */
export type PixelFormat = "gray16le" | "bgr48le";

export type ColorGain = [r: number, g: number, b: number];

/**
 * Full settings snapshot of an open camera.
 * Field names are the names used on the wire.
 */
export interface CameraSettings {
  exposure_ms: number;
  exposure_range: SettingRange;
  binning_x: number;
  binning_x_range: SettingRange;
  binning_y: number;
  binning_y_range: SettingRange;
  /** Sensor [width, height] in pixels */
  sensor_size: [width: number, height: number];
  roi_x: number;
  roi_y: number;
  roi_width: number;
  roi_height: number;
  trigger_type: TriggerType;
  supported_triggers: TriggerType[];
  /** Frames released per software trigger, 0 for unlimited */
  trigger_count: number;
  frame_queue_size: number;
  gain: number;
  gain_range: SettingRange;
  black_level: number;
  black_level_range: SettingRange;
  freq: string;
  supported_freqs: string[];
  taps: string;
  supported_taps: string[];
  supports_color: boolean;
  color_gain: ColorGain;
}

export type WritableSetting =
  | "exposure_ms"
  | "binning_x"
  | "binning_y"
  | "roi_x"
  | "roi_y"
  | "roi_width"
  | "roi_height"
  | "trigger_type"
  | "trigger_count"
  | "frame_queue_size"
  | "gain"
  | "black_level"
  | "freq"
  | "taps"
  | "color_gain";

export type SettingChanges = Partial<Pick<CameraSettings, WritableSetting>>;

/** Raw value accepted in a setting request, checked against the named field */
export type SettingValue = number | string | ColorGain;

// ============================================================================
// Frames
// ============================================================================

export interface FrameEnvelope {
  pixels: Uint8Array;
  pixelFormat: PixelFormat;
  width: number;
  height: number;
  /** Monotonic per session, starting at 0 */
  frameIndex: number;
  /** Frames still queued in the driver after this one */
  queuedCount: number;
  /** Monotonic capture time in seconds */
  captureTime: number;
}

/** Wire form of a frame: [pixels, format, [w, h], index, queued, time] */
export type ImageMessageValue = [
  pixels: Uint8Array,
  pixelFormat: PixelFormat,
  size: [width: number, height: number],
  frameIndex: number,
  queuedCount: number,
  captureTime: number,
];

// ============================================================================
// Messages
// ============================================================================

/** Requests sent by the supervisor to the worker */
export type ClientMessage =
  | { tag: "open_cam"; value: string }
  | { tag: "close_cam"; value: null }
  | { tag: "play"; value: null }
  | { tag: "stop"; value: null }
  | { tag: "setting"; value: [name: string, value: SettingValue] }
  | { tag: "serials"; value: null }
  | { tag: "eof"; value: null };

/** Events sent by the worker to the supervisor */
export type ServerMessage =
  | { tag: "cam_open"; value: null }
  | { tag: "cam_closed"; value: null }
  | { tag: "playing"; value: boolean }
  | { tag: "settings"; value: CameraSettings }
  | { tag: "setting"; value: SettingChanges }
  | { tag: "serials"; value: string[] }
  | { tag: "image"; value: ImageMessageValue }
  | { tag: "exception"; value: [message: string, trace: string] };

/** Requests the worker forwards to an open camera session */
export type SessionRequest = Extract<
  ClientMessage,
  { tag: "close_cam" | "play" | "stop" | "setting" }
>;

/** A decoded frame before its value has been checked */
export interface RawMessage {
  tag: string;
  value: unknown;
}
