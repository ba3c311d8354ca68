export * from "./camera";
export * from "./protocol/codec";
export * from "./protocol/schemas";
export * from "./protocol/messages";
export { FramedConnection } from "./protocol/connection";
export { CameraServer, type CameraServerOptions } from "./server/camera-server";
export { parseWorkerArgs, formatWorkerArgs, type WorkerArgs } from "./server/worker-args";
export * from "./client/supervisor";
export * from "./client/process";
export { connectSocket, connectWithRetry, getOpenPort } from "./client/connect";
export { RemoteCamera, type CameraException } from "./client/camera";
