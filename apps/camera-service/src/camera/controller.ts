/**
 * Camera Controller
 *
 * Owns one driver camera for the lifetime of a session. The control loop
 * consumes SessionRequests from `requests` and publishes ServerMessages on
 * `events`, in the order they happen:
 *
 * - start: settings, cam_open
 * - play / stop: playing true / false
 * - setting: setting (the changes the driver applied)
 * - while playing: image, one per frame
 * - rejected request: exception, nothing else happens
 * - driver failure: exception, then the session is torn down
 * - always last: cam_closed
 */

import { setImmediate, setTimeout as sleep } from "timers/promises";
import { nanoid } from "nanoid";
import { ERROR_MESSAGES, SERVICE_DEFAULTS } from "@isocam/config";
import type { CameraSettings, ServerMessage, SessionRequest } from "@isocam/types";
import type { CameraDriver, DriverCamera } from "./types";
import { AsyncQueue } from "./queue";
import { assertTransition, type CameraState } from "./state";
import { mergeSettings, planSettingWrite } from "./settings";
import { InvalidStateError, mapDriverError } from "./errors";
import { cameraLogger } from "./logger";
import { exceptionMessage, frameToImageValue } from "../protocol/messages";

export interface CameraControllerOptions {
  /** Sleep between frame polls when the driver had nothing queued */
  framePollIntervalMs?: number;
}

type RequestOutcome = "continue" | "close";

export class CameraController {
  readonly sessionId = nanoid(10);
  readonly requests = new AsyncQueue<SessionRequest>();
  readonly events = new AsyncQueue<ServerMessage>();

  private state: CameraState = "CLOSED";
  private settings: CameraSettings | null = null;
  private running = false;
  private loop: Promise<void> | null = null;
  private readonly framePollIntervalMs: number;

  constructor(
    private readonly driver: CameraDriver,
    readonly serial: string,
    options: CameraControllerOptions = {},
  ) {
    this.framePollIntervalMs =
      options.framePollIntervalMs ?? SERVICE_DEFAULTS.FRAME_POLL_INTERVAL_MS;
  }

  getState(): CameraState {
    return this.state;
  }

  getSettings(): CameraSettings | null {
    return this.settings;
  }

  /** True from start() until the loop has emitted cam_closed */
  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.loop) return;
    this.running = true;
    this.loop = this.run();
  }

  send(request: SessionRequest): void {
    this.requests.put(request);
  }

  /** Resolves once the control loop has finished */
  join(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  // ==========================================================================
  // Control loop
  // ==========================================================================

  private async run(): Promise<void> {
    let camera: DriverCamera | null = null;
    cameraLogger.info("CameraController: Opening camera", {
      serial: this.serial,
      sessionId: this.sessionId,
    });

    try {
      camera = await this.driver.open(this.serial);
      const settings = await camera.readSettings();
      this.settings = settings;
      this.transitionTo("OPEN");
      this.emit({ tag: "settings", value: settings });
      this.emit({ tag: "cam_open", value: null });

      let outcome: RequestOutcome = "continue";
      while (outcome === "continue") {
        outcome = await this.step(camera);
      }

      await this.shutdown(camera);
    } catch (error) {
      const typed = mapDriverError(error, {
        operation: "control_loop",
        serial: this.serial,
        sessionId: this.sessionId,
        cameraState: this.state,
      });
      cameraLogger.error("CameraController: Camera failure, closing session", typed.toJSON());
      this.emit(exceptionMessage(typed));
      if (camera) {
        await this.teardownAfterFailure(camera);
      }
    } finally {
      this.finishSession();
    }
  }

  /**
   * One loop iteration. Idle: wait for one request. Playing: handle what is
   * already queued, then poll for a frame.
   */
  private async step(camera: DriverCamera): Promise<RequestOutcome> {
    if (this.state !== "PLAYING") {
      return this.handleRequest(camera, await this.requests.get());
    }

    let request = this.requests.getNowait();
    while (request !== undefined) {
      if ((await this.handleRequest(camera, request)) === "close") {
        return "close";
      }
      if (this.state !== "PLAYING") {
        return "continue";
      }
      request = this.requests.getNowait();
    }

    const frame = await camera.pollFrame();
    if (frame) {
      this.emit({ tag: "image", value: frameToImageValue(frame) });
      await setImmediate();
    } else {
      await sleep(this.framePollIntervalMs);
    }
    return "continue";
  }

  private async handleRequest(camera: DriverCamera, request: SessionRequest): Promise<RequestOutcome> {
    switch (request.tag) {
      case "close_cam":
        return "close";

      case "play":
        if (this.state === "PLAYING") {
          this.reject(new InvalidStateError(ERROR_MESSAGES.ALREADY_PLAYING, this.errorContext("play")));
          return "continue";
        }
        await camera.arm();
        if (this.currentSettings().trigger_type === "SW Trigger") {
          await camera.issueSoftwareTrigger();
        }
        this.transitionTo("PLAYING");
        this.emit({ tag: "playing", value: true });
        return "continue";

      case "stop":
        if (this.state !== "PLAYING") {
          this.reject(new InvalidStateError(ERROR_MESSAGES.NOT_PLAYING, this.errorContext("stop")));
          return "continue";
        }
        await camera.disarm();
        this.transitionTo("OPEN");
        this.emit({ tag: "playing", value: false });
        return "continue";

      case "setting": {
        const [name, value] = request.value;
        const plan = planSettingWrite(this.currentSettings(), this.state, name, value);
        if (!plan.ok) {
          this.reject(plan.error);
          return "continue";
        }
        const applied = await camera.writeSettings(plan.changes);
        this.settings = mergeSettings(this.currentSettings(), applied).settings;
        this.emit({ tag: "setting", value: applied });
        return "continue";
      }
    }
  }

  // ==========================================================================
  // Teardown
  // ==========================================================================

  private async shutdown(camera: DriverCamera): Promise<void> {
    cameraLogger.info("CameraController: Closing camera", {
      serial: this.serial,
      sessionId: this.sessionId,
    });
    if (camera.isArmed()) {
      await camera.disarm();
    }
    await camera.dispose();
  }

  private async teardownAfterFailure(camera: DriverCamera): Promise<void> {
    try {
      await this.shutdown(camera);
    } catch (error) {
      cameraLogger.warn("CameraController: Teardown after failure also failed", {
        serial: this.serial,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private finishSession(): void {
    if (this.state !== "CLOSED") {
      this.transitionTo("CLOSED");
    }
    this.settings = null;
    this.running = false;
    this.emit({ tag: "cam_closed", value: null });

    const dropped = this.requests.drain();
    if (dropped.length > 0) {
      cameraLogger.warn("CameraController: Dropping requests received after close", {
        sessionId: this.sessionId,
        tags: dropped.map((request) => request.tag),
      });
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private emit(message: ServerMessage): void {
    this.events.put(message);
  }

  private reject(error: Error): void {
    cameraLogger.warn("CameraController: Request rejected", {
      sessionId: this.sessionId,
      error: error.message,
    });
    this.emit(exceptionMessage(error));
  }

  private transitionTo(next: CameraState): void {
    assertTransition(this.state, next);
    cameraLogger.debug(`CameraController: ${this.state} -> ${next}`, {
      sessionId: this.sessionId,
    });
    this.state = next;
  }

  private currentSettings(): CameraSettings {
    if (!this.settings) {
      throw new InvalidStateError("Camera settings are not available", this.errorContext("settings"));
    }
    return this.settings;
  }

  private errorContext(operation: string) {
    return {
      operation,
      serial: this.serial,
      sessionId: this.sessionId,
      cameraState: this.state,
    };
  }
}
