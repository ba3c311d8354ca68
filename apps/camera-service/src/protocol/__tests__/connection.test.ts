/**
 * Framed Connection Tests
 *
 * Critical Invariants:
 * - Messages arrive in send order
 * - receive(timeout) resolves null when nothing arrived in time
 * - Once the peer closes, every receive() throws ConnectionClosedError
 * - A peer closing in the middle of a frame is a ProtocolError
 * - Messages decoded before a malformed frame are delivered before the error
 */

import { describe, it, expect } from "vitest";
import { FramedConnection } from "../connection";
import { encodeClientMessage } from "../codec";
import { ConnectionClosedError, ProtocolError } from "../../camera/errors";
import { createSocketPair } from "./memory-socket";

describe("FramedConnection", () => {
  it("delivers messages in order", async () => {
    const [a, b] = createSocketPair();
    const sender = new FramedConnection(a, "a");
    const receiver = new FramedConnection(b, "b");

    sender.send(encodeClientMessage({ tag: "open_cam", value: "SIM-0001" }));
    sender.send(encodeClientMessage({ tag: "play", value: null }));

    expect(await receiver.receive(1000)).toEqual({ tag: "open_cam", value: "SIM-0001" });
    expect(await receiver.receive(1000)).toEqual({ tag: "play", value: null });
  });

  it("returns null when the timeout passes without a message", async () => {
    const [, b] = createSocketPair();
    const receiver = new FramedConnection(b, "b");

    expect(await receiver.receive(5)).toBeNull();
  });

  it("throws ConnectionClosedError after the peer closes", async () => {
    const [a, b] = createSocketPair();
    const sender = new FramedConnection(a, "a");
    const receiver = new FramedConnection(b, "b");

    sender.send(encodeClientMessage({ tag: "eof", value: null }));
    sender.close();

    expect(await receiver.receive(1000)).toEqual({ tag: "eof", value: null });
    await expect(receiver.receive(1000)).rejects.toBeInstanceOf(ConnectionClosedError);
    await expect(receiver.receive(1000)).rejects.toBeInstanceOf(ConnectionClosedError);
    expect(receiver.isClosed).toBe(true);
  });

  it("reports a close in the middle of a frame as a ProtocolError", async () => {
    const [a, b] = createSocketPair();
    const receiver = new FramedConnection(b, "b");

    a.write(Buffer.from([0, 0, 0, 10, 0, 0]));
    a.end();

    await expect(receiver.receive(1000)).rejects.toBeInstanceOf(ProtocolError);
  });

  it("delivers messages that precede a malformed frame in the same chunk", async () => {
    const [a, b] = createSocketPair();
    const receiver = new FramedConnection(b, "b");
    const malformed = Buffer.from([0, 0, 0, 9, 0, 0, 0, 0, ...Buffer.from("[unclosed")]);

    a.write(
      Buffer.concat([
        encodeClientMessage({ tag: "serials", value: null }),
        encodeClientMessage({ tag: "play", value: null }),
        malformed,
      ]),
    );

    expect(await receiver.receive(1000)).toEqual({ tag: "serials", value: null });
    expect(await receiver.receive(1000)).toEqual({ tag: "play", value: null });
    await expect(receiver.receive(1000)).rejects.toBeInstanceOf(ProtocolError);
  });

  it("refuses to send after close", () => {
    const [a] = createSocketPair();
    const connection = new FramedConnection(a, "a");
    connection.close();

    expect(() => connection.send(encodeClientMessage({ tag: "play", value: null }))).toThrow(
      ConnectionClosedError,
    );
  });
});
