import { logLevelFromNumber, setLogLevel } from "@isocam/utils";
import { loadCameraDriver } from "../camera/drivers/loader";
import { cameraLogger } from "../camera/logger";
import { env } from "../config/env";
import { CameraServer } from "./camera-server";
import { parseWorkerArgs } from "./worker-args";

/**
 * Worker process body: load the driver, serve one supervisor connection,
 * release everything.
 */
export async function runWorker(argv: readonly string[]): Promise<void> {
  const args = parseWorkerArgs(argv);
  setLogLevel(logLevelFromNumber(args.logLevel));

  const driver = await loadCameraDriver(args.driverPath);
  const server = new CameraServer({
    driver,
    host: args.host,
    port: args.port,
    recvTimeoutMs: args.recvTimeoutS * 1000,
    controller: { framePollIntervalMs: env.framePollIntervalMs },
  });

  try {
    await server.listen();
    await server.run();
  } finally {
    server.close();
    await driver.close();
    cameraLogger.info("Camera worker finished", { pid: process.pid });
  }
}
