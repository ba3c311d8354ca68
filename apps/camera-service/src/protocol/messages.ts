import type { FrameEnvelope, ImageMessageValue, ServerMessage } from "@isocam/types";
import { toExceptionPayload } from "../camera/errors";

export function frameToImageValue(frame: FrameEnvelope): ImageMessageValue {
  return [
    frame.pixels,
    frame.pixelFormat,
    [frame.width, frame.height],
    frame.frameIndex,
    frame.queuedCount,
    frame.captureTime,
  ];
}

export function imageValueToFrame(value: ImageMessageValue): FrameEnvelope {
  const [pixels, pixelFormat, [width, height], frameIndex, queuedCount, captureTime] = value;
  return { pixels, pixelFormat, width, height, frameIndex, queuedCount, captureTime };
}

export function exceptionMessage(error: unknown): ServerMessage {
  return { tag: "exception", value: toExceptionPayload(error) };
}
