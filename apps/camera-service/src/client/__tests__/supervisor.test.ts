/**
 * Camera Supervisor Tests
 *
 * Source: apps/camera-service/src/client/supervisor.ts
 *
 * The worker process is replaced by a CameraServer serving one end of an
 * in-memory socket pair; the supervisor connects to the other end.
 *
 * Critical Invariants:
 * - Requests reach the worker and its events reach the handler in order
 * - A worker exiting with an error is reported with its stderr
 * - stop({ join: true }) kills a worker that outlives the kill delay
 */

import { describe, it, expect, vi } from "vitest";
import type { ServerMessage } from "@isocam/types";
import { RemoteCamera } from "../camera";
import { CameraSupervisor, type CameraResponseHandler } from "../supervisor";
import type { WorkerExit, WorkerLauncher } from "../process";
import { ProcessError } from "../../camera/errors";
import { SimulatedCameraDriver } from "../../camera/drivers/simulated";
import { CameraServer } from "../../server/camera-server";
import { createSocketPair } from "../../protocol/__tests__/memory-socket";

function inProcessWorker() {
  const [clientSide, serverSide] = createSocketPair();
  const driver = new SimulatedCameraDriver({
    serials: ["SIM-0001"],
    sensorSize: [8, 4],
    frameIntervalMs: 0,
  });

  const launch = vi.fn<Parameters<WorkerLauncher>, ReturnType<WorkerLauncher>>((args) => {
    const server = new CameraServer({
      driver,
      host: args.host,
      port: args.port,
      recvTimeoutMs: args.recvTimeoutS * 1000,
      controller: { framePollIntervalMs: 1 },
    });
    const exited = server.serve(serverSide).then(
      (): WorkerExit => ({ code: 0, signal: null, stderr: "" }),
      (error: unknown): WorkerExit => ({ code: 1, signal: null, stderr: String(error) }),
    );
    return { pid: 4242, exited, kill: vi.fn() };
  });

  return { launch, connect: async () => clientSide, serverSide };
}

function recordingHandler() {
  const messages: ServerMessage[] = [];
  const exceptions: Array<{ error: Error; trace: string }> = [];
  const handler: CameraResponseHandler = {
    receivedCameraResponse: (message) => {
      messages.push(message);
    },
    handleException: (error, trace) => {
      exceptions.push({ error, trace });
    },
  };
  return { handler, messages, exceptions };
}

describe("RemoteCamera over an in-process worker", () => {
  it("opens, plays, stops and closes a camera", async () => {
    const worker = inProcessWorker();
    const camera = new RemoteCamera({
      port: 5000,
      recvTimeoutS: 0.005,
      launch: worker.launch,
      connect: worker.connect,
    });
    const images = vi.fn();
    camera.on("image", images);

    await camera.start();
    await camera.start();
    expect(worker.launch).toHaveBeenCalledTimes(1);
    expect(worker.launch.mock.calls[0]?.[0]).toMatchObject({
      driverPath: "simulated",
      port: 5000,
      recvTimeoutS: 0.005,
    });

    camera.refreshCameras();
    await vi.waitFor(() => expect(camera.serials).toEqual(["SIM-0001"]));

    camera.openCamera("SIM-0001");
    await vi.waitFor(() => expect(camera.camOpen).toBe(true));
    expect(camera.settings?.sensor_size).toEqual([8, 4]);

    camera.setSetting("trigger_count", 2);
    await vi.waitFor(() => expect(camera.settings?.trigger_count).toBe(2));

    camera.playCamera();
    await vi.waitFor(() => expect(camera.framesReceived).toBe(2));
    expect(camera.camPlaying).toBe(true);
    expect(images.mock.calls.map(([frame]) => frame.frameIndex)).toEqual([0, 1]);
    expect(images.mock.calls[0]?.[0]).toMatchObject({ pixelFormat: "gray16le", width: 8, height: 4 });

    camera.stopPlayingCamera();
    await vi.waitFor(() => expect(camera.camPlaying).toBe(false));

    camera.closeCamera();
    await vi.waitFor(() => expect(camera.camOpen).toBe(false));
    expect(camera.settings).toBeNull();

    await camera.stop({ join: true });
    expect(camera.supervisor.isClientRunning).toBe(false);
    expect(camera.supervisor.isProcessRunning).toBe(false);
    expect(camera.lastException).toBeNull();
  });

  it("closes an open camera when stopped", async () => {
    const worker = inProcessWorker();
    const camera = new RemoteCamera({
      port: 5000,
      recvTimeoutS: 0.005,
      launch: worker.launch,
      connect: worker.connect,
    });

    await camera.start();
    camera.openCamera("SIM-0001");
    await vi.waitFor(() => expect(camera.camOpen).toBe(true));

    await camera.stop({ join: true });
    expect(camera.supervisor.isProcessRunning).toBe(false);
    expect(camera.lastException).toBeNull();
  });
});

describe("CameraSupervisor process failures", () => {
  it("reports a worker that exits with an error", async () => {
    const [clientSide, serverSide] = createSocketPair();
    const { handler, exceptions } = recordingHandler();
    const supervisor = new CameraSupervisor(handler, {
      port: 5000,
      recvTimeoutS: 0.005,
      connect: async () => clientSide,
      launch: () => ({
        pid: 4242,
        exited: Promise.resolve({ code: 3, signal: null, stderr: "driver module not found" }),
        kill: vi.fn(),
      }),
    });

    await supervisor.start();
    serverSide.end();
    await supervisor.stop({ join: true });

    const failure = exceptions.find(({ error }) => error instanceof ProcessError);
    expect(failure?.trace).toBe("driver module not found");
    expect(failure?.error.message).toBe("Camera worker process exited with code 3");
    if (failure?.error instanceof ProcessError) {
      expect(failure.error.exitCode).toBe(3);
      expect(failure.error.stderr).toBe("driver module not found");
    }
  });

  it("kills a worker that outlives the kill delay", async () => {
    const [clientSide] = createSocketPair();
    const { handler, exceptions } = recordingHandler();

    let finishExit: (exit: WorkerExit) => void = () => undefined;
    const exited = new Promise<WorkerExit>((resolve) => {
      finishExit = resolve;
    });
    const kill = vi.fn(() => finishExit({ code: null, signal: "SIGKILL", stderr: "" }));

    const supervisor = new CameraSupervisor(handler, {
      port: 5000,
      recvTimeoutS: 0.005,
      connect: async () => clientSide,
      launch: () => ({ pid: 4242, exited, kill }),
    });

    await supervisor.start();
    await vi.waitFor(() => expect(supervisor.isConnected).toBe(true));
    await supervisor.stop({ join: true, killDelayMs: 20 });

    expect(kill).toHaveBeenCalledWith("SIGKILL");
    expect(supervisor.isProcessRunning).toBe(false);
    expect(exceptions.map(({ error }) => error.message)).toEqual([
      "Camera worker process was terminated by SIGKILL",
    ]);
  });
});
