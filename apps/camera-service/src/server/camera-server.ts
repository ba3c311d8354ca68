/**
 * Camera Server
 *
 * Runs inside the worker process. Accepts exactly one supervisor connection
 * and bridges it to at most one CameraController at a time:
 *
 * - session requests (close_cam, play, stop, setting) go to the controller
 * - serials is answered here, straight from driver discovery
 * - controller events are drained to the socket between reads
 * - eof, a closed socket or a protocol error ends the session and the server
 */

import net, { type AddressInfo } from "net";
import type { Duplex } from "stream";
import type { ClientMessage, RawMessage, ServerMessage } from "@isocam/types";
import { CameraController, type CameraControllerOptions } from "../camera/controller";
import type { CameraDriver } from "../camera/types";
import {
  CameraAlreadyOpenError,
  CameraNotOpenError,
  isConnectionError,
  mapDriverError,
} from "../camera/errors";
import { cameraLogger } from "../camera/logger";
import { FramedConnection } from "../protocol/connection";
import { encodeServerMessage } from "../protocol/codec";
import { exceptionMessage } from "../protocol/messages";
import { parseClientMessage } from "../protocol/schemas";

export interface CameraServerOptions {
  driver: CameraDriver;
  host: string;
  port: number;
  /** How long one socket read waits before controller events are drained */
  recvTimeoutMs: number;
  controller?: CameraControllerOptions;
}

type DispatchOutcome = "continue" | "eof";

export class CameraServer {
  private controller: CameraController | null = null;
  private listener: net.Server | null = null;

  constructor(private readonly options: CameraServerOptions) {}

  /** The live session, if any */
  get session(): CameraController | null {
    return this.controller;
  }

  async listen(): Promise<AddressInfo> {
    const listener = net.createServer();
    this.listener = listener;

    await new Promise<void>((resolve, reject) => {
      listener.once("error", reject);
      listener.listen(this.options.port, this.options.host, () => {
        listener.off("error", reject);
        resolve();
      });
    });

    const address = listener.address();
    if (address === null || typeof address === "string") {
      throw new Error(`Unexpected listen address: ${String(address)}`);
    }
    cameraLogger.info("CameraServer: Listening", {
      host: address.address,
      port: address.port,
    });
    return address;
  }

  /**
   * Accept one connection, stop listening, and serve it until it ends
   */
  async run(): Promise<void> {
    const listener = this.listener;
    if (!listener) {
      throw new Error("CameraServer.run() called before listen()");
    }

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      listener.once("error", reject);
      listener.once("connection", (accepted: net.Socket) => {
        listener.off("error", reject);
        resolve(accepted);
      });
    });
    cameraLogger.info("CameraServer: Client connected", {
      remote: `${socket.remoteAddress}:${socket.remotePort}`,
    });

    this.close();
    await this.serve(socket);
  }

  /** Stop accepting connections; open connections are not affected */
  close(): void {
    const listener = this.listener;
    if (!listener) return;
    this.listener = null;
    listener.close(() => {
      cameraLogger.debug("CameraServer: Listener closed");
    });
  }

  /**
   * Pump messages between one connection and the camera session
   */
  async serve(socket: Duplex): Promise<void> {
    const connection = new FramedConnection(socket, "server");

    try {
      for (;;) {
        const raw = await connection.receive(this.options.recvTimeoutMs);
        if (raw && (await this.dispatch(connection, raw)) === "eof") {
          cameraLogger.info("CameraServer: Client finished");
          break;
        }
        this.drainCameraEvents(connection);
      }
    } catch (error) {
      if (!isConnectionError(error)) {
        cameraLogger.error("CameraServer: Serving failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
      cameraLogger.info("CameraServer: Client connection ended", {
        reason: error instanceof Error ? error.message : String(error),
      });
    } finally {
      await this.closeSession();
      connection.close();
    }
  }

  // ==========================================================================
  // Client messages
  // ==========================================================================

  private async dispatch(connection: FramedConnection, raw: RawMessage): Promise<DispatchOutcome> {
    // A session that already ended must hand over its cam_closed first
    this.drainCameraEvents(connection);

    const parsed = parseClientMessage(raw);
    if (!parsed.ok) {
      this.send(connection, exceptionMessage(parsed.error));
      return "continue";
    }

    const message: ClientMessage = parsed.message;
    cameraLogger.debug("CameraServer: Received", { tag: message.tag });

    switch (message.tag) {
      case "eof":
        return "eof";

      case "serials":
        await this.sendSerials(connection);
        return "continue";

      case "open_cam":
        if (this.controller) {
          this.send(
            connection,
            exceptionMessage(
              new CameraAlreadyOpenError({
                serial: this.controller.serial,
                sessionId: this.controller.sessionId,
              }),
            ),
          );
          return "continue";
        }
        this.controller = new CameraController(
          this.options.driver,
          message.value,
          this.options.controller,
        );
        this.controller.start();
        return "continue";

      case "close_cam":
      case "play":
      case "stop":
      case "setting":
        if (!this.controller) {
          this.send(connection, exceptionMessage(new CameraNotOpenError({ operation: message.tag })));
          return "continue";
        }
        this.controller.send(message);
        return "continue";
    }
  }

  private async sendSerials(connection: FramedConnection): Promise<void> {
    let serials: string[];
    try {
      serials = await this.options.driver.discover();
    } catch (error) {
      this.send(connection, exceptionMessage(mapDriverError(error, { operation: "serials" })));
      return;
    }
    this.send(connection, { tag: "serials", value: [...serials].sort() });
  }

  // ==========================================================================
  // Camera events
  // ==========================================================================

  private drainCameraEvents(connection: FramedConnection): void {
    const controller = this.controller;
    if (!controller) return;

    let event = controller.events.getNowait();
    while (event !== undefined) {
      this.send(connection, event);
      if (event.tag === "cam_closed") {
        this.controller = null;
        return;
      }
      event = controller.events.getNowait();
    }
  }

  private async closeSession(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    this.controller = null;

    cameraLogger.info("CameraServer: Closing camera session", {
      serial: controller.serial,
      sessionId: controller.sessionId,
    });
    controller.send({ tag: "close_cam", value: null });
    await controller.join();

    const undelivered = controller.events.drain();
    cameraLogger.debug("CameraServer: Discarded session events", {
      count: undelivered.length,
    });
  }

  private send(connection: FramedConnection, message: ServerMessage): void {
    connection.send(encodeServerMessage(message));
  }
}
