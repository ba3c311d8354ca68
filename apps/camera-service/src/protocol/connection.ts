/**
 * Framed message connection over a byte stream.
 *
 * Incoming chunks are decoded into an inbox so a pump can wait for the next
 * message with a timeout and do other work in between. Once the peer is
 * gone, every receive() throws the error that ended the connection.
 */

import type { Duplex } from "stream";
import { ERROR_MESSAGES } from "@isocam/config";
import type { RawMessage } from "@isocam/types";
import { AsyncQueue } from "../camera/queue";
import { CameraError, ConnectionClosedError, ProtocolError } from "../camera/errors";
import { cameraLogger } from "../camera/logger";
import { FrameDecoder } from "./codec";

type InboxItem =
  | { kind: "message"; message: RawMessage }
  | { kind: "end"; error: CameraError };

export class FramedConnection {
  private readonly decoder = new FrameDecoder();
  private readonly inbox = new AsyncQueue<InboxItem>();
  private endError: CameraError | null = null;
  private ended = false;
  private closed = false;

  constructor(
    private readonly socket: Duplex,
    private readonly label: string,
  ) {
    socket.on("data", this.handleData);
    socket.once("end", this.handleEnd);
    socket.on("error", this.handleError);
    socket.once("close", this.handleClose);
  }

  get isClosed(): boolean {
    return this.closed || this.ended;
  }

  /**
   * Wait for the next message
   * @returns null if none arrived within timeoutMs
   * @throws ConnectionClosedError or ProtocolError once the connection is gone
   */
  async receive(timeoutMs?: number): Promise<RawMessage | null> {
    if (this.endError) {
      throw this.endError;
    }

    const item = timeoutMs === undefined ? await this.inbox.get() : await this.inbox.get(timeoutMs);
    if (item === undefined) {
      return null;
    }
    if (item.kind === "end") {
      this.endError = item.error;
      throw item.error;
    }
    return item.message;
  }

  send(frame: Buffer): void {
    if (this.closed || this.socket.destroyed || this.socket.writableEnded) {
      throw new ConnectionClosedError({ operation: "send" });
    }
    this.socket.write(frame);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.off("data", this.handleData);
    if (!this.socket.destroyed && !this.socket.writableEnded) {
      this.socket.end();
    }
    cameraLogger.debug(`FramedConnection[${this.label}]: Closed`);
  }

  private handleData = (chunk: Buffer | string): void => {
    if (this.ended) return;

    try {
      this.decoder.feed(typeof chunk === "string" ? Buffer.from(chunk) : chunk, (message) => {
        this.inbox.put({ kind: "message", message });
      });
    } catch (error) {
      this.finish(
        error instanceof CameraError
          ? error
          : new ProtocolError("Cannot decode frame", { operation: "decode" }, error),
      );
      this.socket.destroy();
    }
  };

  private handleEnd = (): void => {
    this.finish(
      this.decoder.pendingBytes > 0
        ? new ProtocolError(ERROR_MESSAGES.CLOSED_MID_FRAME, {
            metadata: { pendingBytes: this.decoder.pendingBytes },
          })
        : new ConnectionClosedError(),
    );
    if (!this.socket.destroyed && !this.socket.writableEnded) {
      this.socket.end();
    }
  };

  private handleError = (error: Error): void => {
    cameraLogger.warn(`FramedConnection[${this.label}]: Socket error`, {
      error: error.message,
    });
    this.finish(new ConnectionClosedError({ operation: "socket" }, error));
  };

  private handleClose = (): void => {
    this.finish(new ConnectionClosedError());
  };

  private finish(error: CameraError): void {
    if (this.ended) return;
    this.ended = true;
    cameraLogger.debug(`FramedConnection[${this.label}]: Connection ended`, {
      reason: error.message,
    });
    this.inbox.put({ kind: "end", error });
  }
}
