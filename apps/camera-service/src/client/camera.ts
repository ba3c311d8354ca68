/**
 * Remote Camera
 *
 * Application-side view of a camera running in the worker process. Mirrors
 * the worker's state from the events it sends and re-emits them:
 *
 * - "serials"   (serials: string[])
 * - "open"      ()
 * - "closed"    ()
 * - "playing"   (playing: boolean)
 * - "settings"  (settings: CameraSettings, changed: WritableSetting[])
 * - "image"     (frame: FrameEnvelope)
 * - "exception" (error: Error, trace: string)
 */

import { EventEmitter } from "events";
import type {
  CameraSettings,
  ServerMessage,
  SettingValue,
  WritableSetting,
} from "@isocam/types";
import { ALL_SETTINGS } from "@isocam/config";
import { cameraLogger } from "../camera/logger";
import { mergeSettings } from "../camera/settings";
import { imageValueToFrame } from "../protocol/messages";
import {
  CameraSupervisor,
  type CameraResponseHandler,
  type StopOptions,
  type SupervisorOptions,
} from "./supervisor";

export interface CameraException {
  error: Error;
  trace: string;
}

export class RemoteCamera extends EventEmitter implements CameraResponseHandler {
  readonly supervisor: CameraSupervisor;

  serials: string[] = [];
  camOpen = false;
  camPlaying = false;
  settings: CameraSettings | null = null;
  lastException: CameraException | null = null;
  framesReceived = 0;

  constructor(options: SupervisorOptions = {}) {
    super();
    this.supervisor = new CameraSupervisor(this, options);
  }

  start(): Promise<void> {
    return this.supervisor.start();
  }

  stop(options?: StopOptions): Promise<void> {
    return this.supervisor.stop(options);
  }

  refreshCameras(): void {
    this.supervisor.sendCameraRequest({ tag: "serials", value: null });
  }

  openCamera(serial: string): void {
    this.supervisor.sendCameraRequest({ tag: "open_cam", value: serial });
  }

  closeCamera(): void {
    this.supervisor.sendCameraRequest({ tag: "close_cam", value: null });
  }

  playCamera(): void {
    this.supervisor.sendCameraRequest({ tag: "play", value: null });
  }

  stopPlayingCamera(): void {
    this.supervisor.sendCameraRequest({ tag: "stop", value: null });
  }

  setSetting(name: WritableSetting, value: SettingValue): void {
    this.supervisor.sendCameraRequest({ tag: "setting", value: [name, value] });
  }

  receivedCameraResponse(message: ServerMessage): void {
    switch (message.tag) {
      case "serials":
        this.serials = message.value;
        this.emit("serials", message.value);
        break;

      case "cam_open":
        this.camOpen = true;
        this.emit("open");
        break;

      case "cam_closed":
        this.camOpen = false;
        this.camPlaying = false;
        this.settings = null;
        this.emit("closed");
        break;

      case "playing":
        this.camPlaying = message.value;
        this.emit("playing", message.value);
        break;

      case "settings":
        this.settings = message.value;
        this.emit("settings", message.value, [...ALL_SETTINGS]);
        break;

      case "setting": {
        if (!this.settings) {
          cameraLogger.warn("RemoteCamera: Setting change without a settings snapshot");
          break;
        }
        const { settings, changed } = mergeSettings(this.settings, message.value);
        this.settings = settings;
        if (changed.length > 0) {
          this.emit("settings", settings, changed);
        }
        break;
      }

      case "image":
        this.framesReceived++;
        this.emit("image", imageValueToFrame(message.value));
        break;

      case "exception": {
        const [text, trace] = message.value;
        this.handleException(new Error(text), trace);
        break;
      }
    }
  }

  handleException(error: Error, trace: string): void {
    this.lastException = { error, trace };
    cameraLogger.error("RemoteCamera: Camera exception", { error: error.message });
    this.emit("exception", error, trace);
  }
}
