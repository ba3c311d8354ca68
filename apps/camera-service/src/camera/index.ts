/**
 * Camera module exports
 */

export * from "./types";
export * from "./errors";
export * from "./state";
export * from "./settings";
export { AsyncQueue } from "./queue";
export { CameraController, type CameraControllerOptions } from "./controller";
export {
  SimulatedCameraDriver,
  defaultSimulatedSettings,
  type SimulatedDriverOptions,
  type SimulatedFailureMode,
} from "./drivers/simulated";
export { loadCameraDriver } from "./drivers/loader";
export { cameraLogger } from "./logger";
