import { z } from "zod";

/**
 * Positional arguments of the worker process:
 * [log_level, driver_bin_path, host, port, recv_timeout]
 */
export interface WorkerArgs {
  /** Numeric log level, see logLevelToNumber() */
  logLevel: number;
  driverPath: string;
  host: string;
  port: number;
  /** Seconds */
  recvTimeoutS: number;
}

const workerArgsSchema = z.tuple([
  z.coerce.number().int().min(0),
  z.string(),
  z.string().min(1),
  z.coerce.number().int().min(1).max(65535),
  z.coerce.number().positive(),
]);

export function parseWorkerArgs(argv: readonly string[]): WorkerArgs {
  const parsed = workerArgsSchema.safeParse(argv);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `argument ${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(
      `Usage: worker <log_level> <driver_bin_path> <host> <port> <recv_timeout> (${detail})`,
    );
  }

  const [logLevel, driverPath, host, port, recvTimeoutS] = parsed.data;
  return { logLevel, driverPath, host, port, recvTimeoutS };
}

export function formatWorkerArgs(args: WorkerArgs): string[] {
  return [
    String(args.logLevel),
    args.driverPath,
    args.host,
    String(args.port),
    String(args.recvTimeoutS),
  ];
}
