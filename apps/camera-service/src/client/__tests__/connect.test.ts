import { describe, it, expect, vi } from "vitest";
import { connectWithRetry } from "../connect";
import { ConnectTimeoutError } from "../../camera/errors";

function refused(): Error {
  return Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:1"), { code: "ECONNREFUSED" });
}

describe("connectWithRetry", () => {
  it("retries refused attempts until one succeeds", async () => {
    const attempt = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(refused())
      .mockRejectedValueOnce(refused())
      .mockResolvedValue("connected");

    await expect(connectWithRetry(attempt, { timeoutMs: 1000, retryDelayMs: 1 })).resolves.toBe(
      "connected",
    );
    expect(attempt).toHaveBeenCalledTimes(3);
  });

  it("gives up with ConnectTimeoutError after the deadline", async () => {
    const attempt = vi.fn<[], Promise<string>>().mockRejectedValue(refused());

    const error = await connectWithRetry(attempt, { timeoutMs: 20, retryDelayMs: 5 }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(ConnectTimeoutError);
    if (error instanceof ConnectTimeoutError) {
      expect(error.attempts).toBe(attempt.mock.calls.length);
      expect(error.timeoutMs).toBe(20);
    }
  });

  it("rethrows other errors at once", async () => {
    const failure = Object.assign(new Error("getaddrinfo ENOTFOUND"), { code: "ENOTFOUND" });
    const attempt = vi.fn<[], Promise<string>>().mockRejectedValue(failure);

    await expect(connectWithRetry(attempt, { timeoutMs: 1000, retryDelayMs: 1 })).rejects.toBe(
      failure,
    );
    expect(attempt).toHaveBeenCalledTimes(1);
  });
});
