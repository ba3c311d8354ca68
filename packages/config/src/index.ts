/**
 * Shared configuration constants for the isocam camera service
 */

import type { WritableSetting } from "@isocam/types";

// ============================================================================
// Protocol
// ============================================================================

export const PROTOCOL = {
  /** Two big-endian u32 values: text length, binary length */
  HEADER_SIZE: 8,
  /** Largest text part a peer may announce */
  MAX_TEXT_LENGTH: 16 * 1024 * 1024,
} as const;

// ============================================================================
// Service Defaults
// ============================================================================

export const SERVICE_DEFAULTS = {
  HOST: "127.0.0.1",
  /** Seconds a pump waits on the socket before draining its queue */
  RECV_TIMEOUT_S: 0.01,
  CONNECT_TIMEOUT_MS: 5000,
  CONNECT_RETRY_DELAY_MS: 50,
  KILL_DELAY_MS: 5000,
  /** Sleep between frame polls while playing and the driver has nothing queued */
  FRAME_POLL_INTERVAL_MS: 1,
  /** Bytes of worker stderr kept for error reports */
  STDERR_CAPTURE_BYTES: 64 * 1024,
} as const;

// ============================================================================
// Camera Settings
// ============================================================================

/** Settings that may be written while the camera is open and idle */
export const ALL_SETTINGS: readonly WritableSetting[] = [
  "exposure_ms",
  "binning_x",
  "binning_y",
  "roi_x",
  "roi_y",
  "roi_width",
  "roi_height",
  "trigger_type",
  "trigger_count",
  "frame_queue_size",
  "gain",
  "black_level",
  "freq",
  "taps",
  "color_gain",
];

/** Settings that may be written while frames are being acquired */
export const PLAY_SETTINGS: readonly WritableSetting[] = [
  "exposure_ms",
  "gain",
  "black_level",
  "color_gain",
];

export const TRIGGER_TYPES = ["SW Trigger", "HW Trigger"] as const;

export const PIXEL_FORMATS = ["gray16le", "bgr48le"] as const;

// ============================================================================
// Drivers
// ============================================================================

/** Driver path selecting the built-in simulated driver */
export const SIMULATED_DRIVER = "simulated";

export const SIMULATED_FAILURE_MODES = [
  "none",
  "open",
  "arm",
  "poll",
  "write",
] as const;

export const SIMULATED_DEFAULTS = {
  SERIALS: ["SIM-0001", "SIM-0002"],
  SENSOR_SIZE: [64, 48],
  FRAME_INTERVAL_MS: 20,
} as const;

// ============================================================================
// Messages
// ============================================================================

export const ERROR_MESSAGES = {
  NO_SESSION: "No camera has been opened",
  SESSION_EXISTS: "Camera has already been opened",
  ALREADY_PLAYING: "Camera is already playing",
  NOT_PLAYING: "Camera is not playing",
  CONNECTION_CLOSED: "Remote end was closed",
  CLOSED_MID_FRAME: "Connection closed in the middle of a frame",
} as const;
