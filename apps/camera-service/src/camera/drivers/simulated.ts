/**
 * Simulated Camera Driver
 * Behaves like a scientific camera SDK for development and testing.
 * Supports failure simulation via ISOCAM_SIM_FAILURE_MODE.
 */

import { performance } from "perf_hooks";
import {
  SIMULATED_DEFAULTS,
  SIMULATED_FAILURE_MODES,
  TRIGGER_TYPES,
} from "@isocam/config";
import type { CameraSettings, FrameEnvelope, SettingChanges } from "@isocam/types";
import type { CameraDriver, DriverCamera } from "../types";
import { cameraLogger } from "../logger";
import { frameSize, mergeSettings } from "../settings";

export type SimulatedFailureMode = (typeof SIMULATED_FAILURE_MODES)[number];

export interface SimulatedDriverOptions {
  serials?: readonly string[];
  sensorSize?: readonly [width: number, height: number];
  supportsColor?: boolean;
  /** Minimum time between two frames of one acquisition */
  frameIntervalMs?: number;
  failureMode?: SimulatedFailureMode;
}

type ResolvedOptions = Readonly<Required<SimulatedDriverOptions>>;

/**
 * Settings a freshly opened simulated camera reports
 */
export function defaultSimulatedSettings(
  sensorSize: readonly [number, number],
  supportsColor: boolean,
): CameraSettings {
  const [width, height] = sensorSize;
  return {
    exposure_ms: 5,
    exposure_range: { min: 0, max: 100 },
    binning_x: 1,
    binning_x_range: { min: 1, max: 4 },
    binning_y: 1,
    binning_y_range: { min: 1, max: 4 },
    sensor_size: [width, height],
    roi_x: 0,
    roi_y: 0,
    roi_width: width,
    roi_height: height,
    trigger_type: "SW Trigger",
    supported_triggers: [...TRIGGER_TYPES],
    trigger_count: 0,
    frame_queue_size: 1,
    gain: 0,
    gain_range: { min: 0, max: 480 },
    black_level: 0,
    black_level_range: { min: 0, max: 100 },
    freq: "20 MHz",
    supported_freqs: ["20 MHz", "40 MHz"],
    taps: "1",
    supported_taps: ["1", "2"],
    supports_color: supportsColor,
    color_gain: [1, 1, 1],
  };
}

class SimulatedCamera implements DriverCamera {
  private settings: CameraSettings;
  private armed = false;
  private triggered = false;
  private disposed = false;
  private frameIndex = 0;
  private releasedFrames = 0;
  private lastFrameAt = 0;

  constructor(
    readonly serial: string,
    private readonly options: ResolvedOptions,
    private readonly onDispose: (serial: string) => void,
  ) {
    this.settings = defaultSimulatedSettings(options.sensorSize, options.supportsColor);
  }

  async readSettings(): Promise<CameraSettings> {
    this.assertUsable("readSettings");
    return structuredClone(this.settings);
  }

  async writeSettings(changes: SettingChanges): Promise<SettingChanges> {
    this.assertUsable("writeSettings");
    if (this.options.failureMode === "write") {
      throw new Error("Simulated failure writing camera settings");
    }

    cameraLogger.debug("SimulatedCamera: Write settings", {
      serial: this.serial,
      changes,
    });
    this.settings = mergeSettings(this.settings, changes).settings;
    return { ...changes };
  }

  async arm(): Promise<void> {
    this.assertUsable("arm");
    if (this.options.failureMode === "arm") {
      throw new Error("Simulated failure arming camera");
    }

    this.armed = true;
    // Hardware triggers arrive on their own once armed
    this.triggered = this.settings.trigger_type === "HW Trigger";
    this.releasedFrames = 0;
    this.lastFrameAt = performance.now();
    cameraLogger.info("SimulatedCamera: Armed", {
      serial: this.serial,
      triggerType: this.settings.trigger_type,
    });
  }

  async issueSoftwareTrigger(): Promise<void> {
    this.assertUsable("issueSoftwareTrigger");
    if (!this.armed) {
      throw new Error("Cannot trigger a camera that is not armed");
    }

    this.triggered = true;
    this.releasedFrames = 0;
    this.lastFrameAt = performance.now();
  }

  async disarm(): Promise<void> {
    this.assertUsable("disarm");
    this.armed = false;
    this.triggered = false;
    cameraLogger.info("SimulatedCamera: Disarmed", { serial: this.serial });
  }

  isArmed(): boolean {
    return this.armed;
  }

  async pollFrame(): Promise<FrameEnvelope | null> {
    this.assertUsable("pollFrame");
    if (this.options.failureMode === "poll") {
      throw new Error("Simulated frame transfer failure");
    }
    if (!this.armed || !this.triggered) {
      return null;
    }

    const limit = this.settings.trigger_count;
    const remaining = limit > 0 ? limit - this.releasedFrames : Infinity;
    if (remaining <= 0) {
      return null;
    }

    const interval = this.options.frameIntervalMs;
    const now = performance.now();
    const elapsed = now - this.lastFrameAt;
    if (elapsed < interval) {
      return null;
    }

    // Frames that came due since the last poll sit in the camera's buffer
    const due = interval > 0 ? Math.floor(elapsed / interval) : 1;
    const queuedCount = Math.max(
      0,
      Math.min(due - 1, this.settings.frame_queue_size - 1, remaining - 1),
    );

    this.lastFrameAt = now;
    this.releasedFrames++;
    return this.buildFrame(now, queuedCount);
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.armed = false;
    this.disposed = true;
    this.onDispose(this.serial);
    cameraLogger.info("SimulatedCamera: Disposed", { serial: this.serial });
  }

  private buildFrame(now: number, queuedCount: number): FrameEnvelope {
    const [width, height] = frameSize(this.settings);
    const color = this.settings.supports_color;
    const bytesPerPixel = color ? 6 : 2;
    const frameIndex = this.frameIndex++;

    return {
      pixels: Buffer.alloc(width * height * bytesPerPixel, frameIndex & 0xff),
      pixelFormat: color ? "bgr48le" : "gray16le",
      width,
      height,
      frameIndex,
      queuedCount,
      captureTime: now / 1000,
    };
  }

  private assertUsable(operation: string): void {
    if (this.disposed) {
      throw new Error(`Camera ${this.serial} was disposed (${operation})`);
    }
  }
}

export class SimulatedCameraDriver implements CameraDriver {
  private readonly options: ResolvedOptions;
  private readonly openSerials = new Set<string>();
  private closed = false;

  constructor(options: SimulatedDriverOptions = {}) {
    this.options = Object.freeze({
      serials: options.serials ?? SIMULATED_DEFAULTS.SERIALS,
      sensorSize: options.sensorSize ?? SIMULATED_DEFAULTS.SENSOR_SIZE,
      supportsColor: options.supportsColor ?? false,
      frameIntervalMs: options.frameIntervalMs ?? SIMULATED_DEFAULTS.FRAME_INTERVAL_MS,
      failureMode: options.failureMode ?? "none",
    });

    cameraLogger.info(
      `SimulatedCameraDriver: Initialized with failure mode: ${this.options.failureMode}`,
      { serials: this.options.serials },
    );
  }

  async discover(): Promise<string[]> {
    this.assertOpen();
    return [...this.options.serials].sort();
  }

  async open(serial: string): Promise<DriverCamera> {
    this.assertOpen();
    cameraLogger.info("SimulatedCameraDriver: Opening camera", { serial });

    if (this.options.failureMode === "open") {
      throw new Error(`Simulated failure opening camera ${serial}`);
    }
    if (!this.options.serials.includes(serial)) {
      throw new Error(`No camera with serial ${serial}`);
    }
    if (this.openSerials.has(serial)) {
      throw new Error(`Camera ${serial} is already in use`);
    }

    this.openSerials.add(serial);
    return new SimulatedCamera(serial, this.options, (disposed) => {
      this.openSerials.delete(disposed);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    cameraLogger.info("SimulatedCameraDriver: Closed");
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Simulated camera SDK was closed");
    }
  }
}
