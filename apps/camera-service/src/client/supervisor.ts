/**
 * Camera Supervisor
 *
 * Runs in the controlling process. Spawns the camera worker, connects to it,
 * and pumps messages both ways:
 * - requests queued with sendCameraRequest() are written to the worker
 * - events from the worker are validated and handed to the response handler
 *
 * Failures of the connection or of the worker process are reported through
 * handler.handleException(); nothing here throws into the application.
 */

import type { Duplex } from "stream";
import { setTimeout as sleep } from "timers/promises";
import type { ClientMessage, RawMessage, ServerMessage } from "@isocam/types";
import {
  formatDuration,
  formatErrorTrace,
  getLogLevel,
  logLevelToNumber,
  type LogLevel,
} from "@isocam/utils";
import { AsyncQueue } from "../camera/queue";
import { ProcessError } from "../camera/errors";
import { cameraLogger } from "../camera/logger";
import { env } from "../config/env";
import { FramedConnection } from "../protocol/connection";
import { encodeClientMessage } from "../protocol/codec";
import { parseServerMessage } from "../protocol/schemas";
import type { WorkerArgs } from "../server/worker-args";
import { connectSocket, connectWithRetry, getOpenPort } from "./connect";
import {
  DEFAULT_WORKER_COMMAND,
  launchWorker,
  type WorkerCommand,
  type WorkerHandle,
  type WorkerLauncher,
} from "./process";

/**
 * Receives everything the worker reports
 */
export interface CameraResponseHandler {
  receivedCameraResponse(message: ServerMessage): void;
  handleException(error: Error, trace: string): void;
}

export interface SupervisorOptions {
  host?: string;
  /** Worker port; a free port is picked at start when omitted */
  port?: number;
  /** Seconds a socket read waits before the outbound queue is drained */
  recvTimeoutS?: number;
  connectTimeoutMs?: number;
  connectRetryDelayMs?: number;
  /** How long stop({ join: true }) waits for the worker before killing it */
  killDelayMs?: number;
  driverPath?: string;
  /** Log level handed to the worker; defaults to this process's level */
  logLevel?: LogLevel;
  workerCommand?: WorkerCommand;
  /** Replaces process spawning, mainly for tests */
  launch?: WorkerLauncher;
  /** Replaces the TCP connect, mainly for tests */
  connect?: (host: string, port: number) => Promise<Duplex>;
}

export interface SupervisorConfig {
  readonly host: string;
  readonly port: number | undefined;
  readonly recvTimeoutS: number;
  readonly connectTimeoutMs: number;
  readonly connectRetryDelayMs: number;
  readonly killDelayMs: number;
  readonly driverPath: string;
  readonly logLevel: LogLevel;
  readonly workerCommand: WorkerCommand;
}

export function resolveSupervisorConfig(options: SupervisorOptions = {}): SupervisorConfig {
  return Object.freeze({
    host: options.host ?? env.host,
    port: options.port ?? env.port,
    recvTimeoutS: options.recvTimeoutS ?? env.recvTimeoutS,
    connectTimeoutMs: options.connectTimeoutMs ?? env.connectTimeoutMs,
    connectRetryDelayMs: options.connectRetryDelayMs ?? env.connectRetryDelayMs,
    killDelayMs: options.killDelayMs ?? env.killDelayMs,
    driverPath: options.driverPath ?? env.driverPath,
    logLevel: options.logLevel ?? getLogLevel(),
    workerCommand: options.workerCommand ?? DEFAULT_WORKER_COMMAND,
  });
}

export interface StopOptions {
  /** Wait for the client loop and the worker process to finish */
  join?: boolean;
  /** Overrides the configured kill delay for this call */
  killDelayMs?: number;
}

export class CameraSupervisor {
  readonly config: SupervisorConfig;

  private readonly outbound = new AsyncQueue<ClientMessage>();
  private readonly launch: WorkerLauncher;
  private readonly connect: (host: string, port: number) => Promise<Duplex>;

  private worker: WorkerHandle | null = null;
  private processRun: Promise<void> | null = null;
  private clientRun: Promise<void> | null = null;
  private starting = false;
  private processRunning = false;
  private clientRunning = false;
  private connected = false;
  private activePort: number | null = null;

  constructor(
    private readonly handler: CameraResponseHandler,
    options: SupervisorOptions = {},
  ) {
    this.config = resolveSupervisorConfig(options);
    this.launch =
      options.launch ?? ((args) => launchWorker(args, this.config.workerCommand));
    this.connect = options.connect ?? connectSocket;
  }

  get isProcessRunning(): boolean {
    return this.processRunning;
  }

  get isClientRunning(): boolean {
    return this.clientRunning;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /** Port of the running worker */
  get port(): number | null {
    return this.activePort;
  }

  /**
   * Launch the worker and the client loop. Does nothing if already running.
   */
  async start(): Promise<void> {
    if (this.starting || this.processRunning || this.clientRunning) {
      return;
    }
    this.starting = true;

    try {
      const { host } = this.config;
      const port = this.config.port ?? (await getOpenPort(host));
      this.activePort = port;

      const args: WorkerArgs = {
        logLevel: logLevelToNumber(this.config.logLevel),
        driverPath: this.config.driverPath,
        host,
        port,
        recvTimeoutS: this.config.recvTimeoutS,
      };

      const worker = this.launch(args);
      this.worker = worker;
      this.processRunning = true;
      this.processRun = this.watchProcess(worker, Date.now());

      this.clientRunning = true;
      this.clientRun = this.pump(host, port);
    } finally {
      this.starting = false;
    }
  }

  sendCameraRequest(message: ClientMessage): void {
    this.outbound.put(message);
  }

  /**
   * Ask the worker to finish. With join, wait for the client loop and the
   * process, killing the process if it outlives the kill delay.
   */
  async stop(options: StopOptions = {}): Promise<void> {
    if (this.clientRunning) {
      this.outbound.put({ tag: "eof", value: null });
    }
    if (!options.join) {
      return;
    }

    await this.clientRun;
    await this.waitForProcess(options.killDelayMs ?? this.config.killDelayMs);
  }

  /** Terminate the worker immediately */
  kill(): void {
    if (this.worker) {
      cameraLogger.warn("CameraSupervisor: Killing camera worker", {
        pid: this.worker.pid,
      });
      this.worker.kill("SIGKILL");
    }
  }

  // ==========================================================================
  // Process
  // ==========================================================================

  private async watchProcess(worker: WorkerHandle, startedAt: number): Promise<void> {
    const exit = await worker.exited;
    this.processRunning = false;
    this.worker = null;

    const uptime = formatDuration(Date.now() - startedAt);
    if (exit.error === undefined && exit.code === 0) {
      cameraLogger.info("CameraSupervisor: Camera worker exited", { uptime });
      return;
    }

    const error = new ProcessError(exit.code, exit.signal, exit.stderr, exit.error);
    cameraLogger.error("CameraSupervisor: Camera worker failed", {
      ...error.toJSON(),
      uptime,
    });
    this.handler.handleException(error, exit.stderr || formatErrorTrace(error));
  }

  private async waitForProcess(killDelayMs: number): Promise<void> {
    const processRun = this.processRun;
    if (!processRun || !this.processRunning) {
      await processRun;
      return;
    }

    const timer = new AbortController();
    const outcome = await Promise.race([
      processRun.then(() => "exited" as const),
      sleep(killDelayMs, "timeout" as const, { signal: timer.signal }).catch(
        () => "cancelled" as const,
      ),
    ]);
    timer.abort();

    if (outcome === "timeout") {
      cameraLogger.warn("CameraSupervisor: Worker did not exit in time", { killDelayMs });
      this.kill();
      await processRun;
    }
  }

  // ==========================================================================
  // Client loop
  // ==========================================================================

  private async pump(host: string, port: number): Promise<void> {
    let connection: FramedConnection | null = null;

    try {
      const socket = await connectWithRetry(() => this.connect(host, port), {
        timeoutMs: this.config.connectTimeoutMs,
        retryDelayMs: this.config.connectRetryDelayMs,
      });
      connection = new FramedConnection(socket, "client");
      this.connected = true;
      cameraLogger.info("CameraSupervisor: Connected to camera worker", { host, port });

      const recvTimeoutMs = this.config.recvTimeoutS * 1000;
      let finished = false;
      while (!finished) {
        const raw = await connection.receive(recvTimeoutMs);
        if (raw) {
          this.dispatch(raw);
        }
        finished = this.flushOutbound(connection);
      }
    } catch (error) {
      const typed = error instanceof Error ? error : new Error(String(error));
      cameraLogger.error("CameraSupervisor: Client loop failed", { error: typed.message });
      this.handler.handleException(typed, formatErrorTrace(typed));
    } finally {
      this.connected = false;
      connection?.close();
      this.clientRunning = false;
    }
  }

  private dispatch(raw: RawMessage): void {
    const parsed = parseServerMessage(raw);
    if (!parsed.ok) {
      cameraLogger.warn("CameraSupervisor: Ignoring invalid message", {
        error: parsed.error.message,
      });
      this.handler.handleException(parsed.error, formatErrorTrace(parsed.error));
      return;
    }
    this.handler.receivedCameraResponse(parsed.message);
  }

  /** Send everything queued; true once eof has been sent */
  private flushOutbound(connection: FramedConnection): boolean {
    let request = this.outbound.getNowait();
    while (request !== undefined) {
      connection.send(encodeClientMessage(request));
      if (request.tag === "eof") {
        return true;
      }
      request = this.outbound.getNowait();
    }
    return false;
  }
}
