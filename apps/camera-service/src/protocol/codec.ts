/**
 * Wire framing
 *
 * Frame layout:
 * - 4 bytes: text length (u32 big-endian)
 * - 4 bytes: binary length (u32 big-endian)
 * - text: YAML sequence [tag, value]
 * - binary: raw payload, only used by image messages
 *
 * For an image the pixel bytes travel as the binary payload and are put back
 * at the head of the value tuple on decode.
 */

import { dump, load } from "js-yaml";
import { PROTOCOL } from "@isocam/config";
import type { ClientMessage, RawMessage, ServerMessage } from "@isocam/types";
import { ProtocolError } from "../camera/errors";

const EMPTY = Buffer.alloc(0);

export function encodeFrame(tag: string, value: unknown, binary: Uint8Array = EMPTY): Buffer {
  const text = Buffer.from(dump([tag, value], { noRefs: true }), "utf8");
  const header = Buffer.alloc(PROTOCOL.HEADER_SIZE);
  header.writeUInt32BE(text.length, 0);
  header.writeUInt32BE(binary.length, 4);
  return Buffer.concat([header, text, binary]);
}

export function encodeClientMessage(message: ClientMessage): Buffer {
  return encodeFrame(message.tag, message.value);
}

export function encodeServerMessage(message: ServerMessage): Buffer {
  if (message.tag === "image") {
    const [pixels, ...meta] = message.value;
    return encodeFrame(message.tag, meta, pixels);
  }
  return encodeFrame(message.tag, message.value);
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode the text and binary parts of one frame
 */
export function decodeFrame(text: Buffer, binary: Buffer): RawMessage {
  let source: string;
  try {
    source = utf8.decode(text);
  } catch (error) {
    throw new ProtocolError("Message text is not valid UTF-8", { operation: "decode" }, error);
  }

  let decoded: unknown;
  try {
    decoded = load(source);
  } catch (error) {
    throw new ProtocolError("Message text is not valid YAML", { operation: "decode" }, error);
  }

  if (!Array.isArray(decoded) || decoded.length !== 2) {
    throw new ProtocolError("Message text must be a [tag, value] sequence");
  }
  const parts: unknown[] = decoded;
  const [tag, value] = parts;
  if (typeof tag !== "string") {
    throw new ProtocolError("Message tag must be a string");
  }

  if (tag === "image") {
    if (!Array.isArray(value)) {
      throw new ProtocolError("Image message value must be a sequence");
    }
    const meta: unknown[] = value;
    return { tag, value: [binary, ...meta] };
  }

  if (binary.length !== 0) {
    throw new ProtocolError(`Unexpected binary payload on "${tag}" message`, {
      metadata: { binaryLength: binary.length },
    });
  }
  return { tag, value: value ?? null };
}

/**
 * Incremental frame decoder fed with arbitrary stream chunks.
 * Chunks are kept as received and copied once per completed frame.
 */
export class FrameDecoder {
  private chunks: Buffer[] = [];
  private buffered = 0;

  /**
   * Append a chunk and return every frame it completes
   * @throws ProtocolError on a malformed frame; the decoder is unusable afterwards
   */
  push(chunk: Buffer): RawMessage[] {
    const messages: RawMessage[] = [];
    this.feed(chunk, (message) => messages.push(message));
    return messages;
  }

  /**
   * Append a chunk and hand over each completed frame as soon as it is decoded.
   * Frames before a malformed one are delivered before the ProtocolError is thrown.
   */
  feed(chunk: Buffer, onMessage: (message: RawMessage) => void): void {
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
    }

    while (this.buffered >= PROTOCOL.HEADER_SIZE) {
      const header = this.peek(PROTOCOL.HEADER_SIZE);
      const textLength = header.readUInt32BE(0);
      const binaryLength = header.readUInt32BE(4);
      if (textLength > PROTOCOL.MAX_TEXT_LENGTH) {
        throw new ProtocolError(`Message text length ${textLength} exceeds limit`);
      }

      const textEnd = PROTOCOL.HEADER_SIZE + textLength;
      const frameEnd = textEnd + binaryLength;
      if (this.buffered < frameEnd) {
        return;
      }

      const frame = this.take(frameEnd);
      onMessage(
        decodeFrame(frame.subarray(PROTOCOL.HEADER_SIZE, textEnd), frame.subarray(textEnd)),
      );
    }
  }

  /** Bytes of an incomplete frame still waiting for the rest */
  get pendingBytes(): number {
    return this.buffered;
  }

  private peek(length: number): Buffer {
    const first = this.chunks[0];
    if (first && first.length >= length) {
      return first.subarray(0, length);
    }
    return Buffer.concat(this.chunks, length);
  }

  private take(length: number): Buffer {
    const taken = this.peek(length);

    let remaining = length;
    while (remaining > 0) {
      const head = this.chunks[0];
      if (!head) break;
      if (head.length <= remaining) {
        this.chunks.shift();
        remaining -= head.length;
      } else {
        this.chunks[0] = head.subarray(remaining);
        remaining = 0;
      }
    }
    this.buffered -= length;
    return taken;
  }
}
