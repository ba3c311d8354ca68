import { createLogger } from "@isocam/utils";

export const cameraLogger = createLogger("camera");
