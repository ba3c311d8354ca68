import net from "net";
import { setTimeout as sleep } from "timers/promises";
import { ConnectTimeoutError, isConnectionRefused } from "../camera/errors";
import { cameraLogger } from "../camera/logger";

export interface ConnectRetryOptions {
  /** Give up once this much time has passed since the first attempt */
  timeoutMs: number;
  retryDelayMs: number;
}

/**
 * Open a TCP connection, resolving once it is established
 */
export function connectSocket(host: string, port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const onError = (error: Error): void => {
      socket.destroy();
      reject(error);
    };
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}

/**
 * Retry a connect attempt while it is refused, until the deadline.
 * The worker needs a moment after spawn before it listens.
 */
export async function connectWithRetry<T>(
  attempt: () => Promise<T>,
  options: ConnectRetryOptions,
): Promise<T> {
  const deadline = Date.now() + options.timeoutMs;
  let attempts = 0;

  for (;;) {
    attempts++;
    try {
      return await attempt();
    } catch (error) {
      if (!isConnectionRefused(error)) {
        throw error;
      }
      if (Date.now() >= deadline) {
        throw new ConnectTimeoutError(attempts, options.timeoutMs, error);
      }
      cameraLogger.debug("Connection refused, retrying", { attempts });
      await sleep(options.retryDelayMs);
    }
  }
}

/**
 * Find a free TCP port by binding to port 0 and releasing it
 */
export function getOpenPort(host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = net.createServer();
    probe.once("error", reject);
    probe.listen(0, host, () => {
      const address = probe.address();
      const port = address !== null && typeof address !== "string" ? address.port : 0;
      probe.close((error) => {
        if (error) {
          reject(error);
        } else if (port === 0) {
          reject(new Error(`Could not determine a free port on ${host}`));
        } else {
          resolve(port);
        }
      });
    });
  });
}
