/**
 * Camera Driver Adapter
 *
 * The worker talks to camera hardware only through these interfaces.
 * Driver methods may throw; the controller maps anything thrown into a
 * DriverError and tears the session down.
 */

import type { CameraSettings, FrameEnvelope, SettingChanges } from "@isocam/types";

/**
 * Entry point of a camera SDK
 */
export interface CameraDriver {
  /** Serial numbers of the cameras currently attached */
  discover(): Promise<string[]>;

  /**
   * Open a camera by serial number
   * @throws if the serial is unknown or the camera is in use
   */
  open(serial: string): Promise<DriverCamera>;

  /** Release the SDK; called once when the worker shuts down */
  close(): Promise<void>;
}

/**
 * One opened camera
 */
export interface DriverCamera {
  readonly serial: string;

  /** Current settings and capabilities */
  readSettings(): Promise<CameraSettings>;

  /**
   * Program already-validated changes
   * @returns the values the camera actually took
   */
  writeSettings(changes: SettingChanges): Promise<SettingChanges>;

  /** Prepare acquisition */
  arm(): Promise<void>;

  /** Release frames in software trigger mode */
  issueSoftwareTrigger(): Promise<void>;

  /** Stop acquisition */
  disarm(): Promise<void>;

  isArmed(): boolean;

  /**
   * Take the next queued frame without waiting
   * @returns null if no frame is ready
   */
  pollFrame(): Promise<FrameEnvelope | null>;

  /** Release the camera; the instance is unusable afterwards */
  dispose(): Promise<void>;
}

export interface DriverFactoryOptions {
  /** The driver path the worker was started with */
  driverPath: string;
}

/**
 * Shape of a module loaded from a driver path
 */
export interface DriverModule {
  createCameraDriver(options: DriverFactoryOptions): CameraDriver | Promise<CameraDriver>;
}
