/**
 * Camera worker process entry point
 *
 * Usage: tsx src/worker.ts <log_level> <driver_bin_path> <host> <port> <recv_timeout>
 */

import { formatErrorTrace } from "@isocam/utils";
import { runWorker } from "./server/worker-runner";

runWorker(process.argv.slice(2)).then(
  () => {
    process.exitCode = 0;
  },
  (error: unknown) => {
    process.stderr.write(`${formatErrorTrace(error)}\n`);
    process.exitCode = 1;
  },
);
