import path from "path";
import { pathToFileURL } from "url";
import { SIMULATED_DRIVER } from "@isocam/config";
import type { CameraDriver, DriverModule } from "../types";
import { DriverError } from "../errors";
import { cameraLogger } from "../logger";
import { env } from "../../config/env";
import { SimulatedCameraDriver } from "./simulated";

function isDriverModule(value: unknown): value is DriverModule {
  return (
    typeof value === "object" &&
    value !== null &&
    "createCameraDriver" in value &&
    typeof value.createCameraDriver === "function"
  );
}

/**
 * Create the driver named by the worker's driver path.
 *
 * An empty path or "simulated" selects the built-in simulated driver;
 * anything else is imported as a module exporting createCameraDriver().
 */
export async function loadCameraDriver(driverPath: string): Promise<CameraDriver> {
  if (driverPath === "" || driverPath === SIMULATED_DRIVER) {
    cameraLogger.info("Using simulated camera driver");
    return new SimulatedCameraDriver(env.simulated);
  }

  const resolved = path.resolve(driverPath);
  cameraLogger.info("Loading camera driver module", { path: resolved });

  let loaded: unknown;
  try {
    loaded = await import(pathToFileURL(resolved).href);
  } catch (error) {
    throw new DriverError(
      `Cannot load camera driver from ${resolved}`,
      { operation: "load_driver" },
      error,
    );
  }

  if (!isDriverModule(loaded)) {
    throw new DriverError(
      `Camera driver module ${resolved} does not export createCameraDriver()`,
      { operation: "load_driver" },
    );
  }

  return loaded.createCameraDriver({ driverPath: resolved });
}
