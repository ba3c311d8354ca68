import { spawn } from "child_process";
import { fileURLToPath } from "url";
import { SERVICE_DEFAULTS } from "@isocam/config";
import { cameraLogger } from "../camera/logger";
import { formatWorkerArgs, type WorkerArgs } from "../server/worker-args";

export interface WorkerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Tail of everything the worker wrote to stderr */
  stderr: string;
  /** Set when the process could not be started */
  error?: Error;
}

export interface WorkerHandle {
  readonly pid: number | undefined;
  /** Resolves when the process has exited and its stderr is closed; never rejects */
  readonly exited: Promise<WorkerExit>;
  kill(signal?: NodeJS.Signals): void;
}

/** Command used to start the worker; the worker arguments are appended */
export interface WorkerCommand {
  command: string;
  args: string[];
}

export type WorkerLauncher = (args: WorkerArgs) => WorkerHandle;

export const WORKER_ENTRY = fileURLToPath(new URL("../worker.ts", import.meta.url));

export const DEFAULT_WORKER_COMMAND: WorkerCommand = {
  command: process.execPath,
  args: ["--import", "tsx", WORKER_ENTRY],
};

/**
 * Spawn the camera worker. stdout is shared with this process, stderr is
 * captured for error reports.
 */
export function launchWorker(
  args: WorkerArgs,
  workerCommand: WorkerCommand = DEFAULT_WORKER_COMMAND,
): WorkerHandle {
  const argv = [...workerCommand.args, ...formatWorkerArgs(args)];
  cameraLogger.info("Launching camera worker", {
    command: workerCommand.command,
    args: argv,
  });

  const child = spawn(workerCommand.command, argv, {
    stdio: ["ignore", "inherit", "pipe"],
  });

  let stderr = "";
  child.stderr?.setEncoding("utf8");
  child.stderr?.on("data", (chunk: string) => {
    stderr = (stderr + chunk).slice(-SERVICE_DEFAULTS.STDERR_CAPTURE_BYTES);
  });

  const exited = new Promise<WorkerExit>((resolve) => {
    child.once("error", (error) => {
      resolve({ code: null, signal: null, stderr, error });
    });
    child.once("close", (code, signal) => {
      resolve({ code, signal, stderr });
    });
  });

  return {
    pid: child.pid,
    exited,
    kill(signal: NodeJS.Signals = "SIGKILL") {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    },
  };
}
