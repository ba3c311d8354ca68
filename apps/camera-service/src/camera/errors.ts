/**
 * Camera Service Error Types
 *
 * Typed error hierarchy shared by the worker and the supervisor.
 * All errors include structured context for logging and exception reports.
 */

import { ERROR_MESSAGES } from "@isocam/config";
import { formatErrorTrace } from "@isocam/utils";

// ============================================================================
// Error Context Types
// ============================================================================

export interface CameraErrorContext {
  /** Operation being performed when error occurred */
  operation: string;
  /** Camera serial if applicable */
  serial?: string;
  /** Controller session ID if applicable */
  sessionId?: string;
  /** Camera state at time of error */
  cameraState?: string;
  /** Error timestamp (ISO string) */
  timestamp: string;
  /** Stack trace */
  stack?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

type ErrorContextInput = Partial<Omit<CameraErrorContext, "timestamp">>;

// ============================================================================
// Base Camera Error
// ============================================================================

export class CameraError extends Error {
  public readonly context: CameraErrorContext;
  public readonly timestamp: string;

  constructor(
    message: string,
    context: Partial<CameraErrorContext> & { operation: string },
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CameraError";
    this.timestamp = new Date().toISOString();
    this.context = {
      ...context,
      timestamp: context.timestamp || this.timestamp,
      stack: context.stack || this.stack,
    };

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, CameraError.prototype);
  }

  /**
   * Get formatted error details for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

// ============================================================================
// Connection Errors
// ============================================================================

/** Malformed frame or frame that violates the framing rules */
export class ProtocolError extends CameraError {
  constructor(message: string, context?: ErrorContextInput, cause?: unknown) {
    super(
      message,
      {
        operation: context?.operation || "decode",
        ...context,
        timestamp: new Date().toISOString(),
      },
      { cause },
    );
    this.name = "ProtocolError";
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

export class ConnectionClosedError extends CameraError {
  constructor(context?: ErrorContextInput, cause?: unknown) {
    super(
      ERROR_MESSAGES.CONNECTION_CLOSED,
      {
        operation: context?.operation || "receive",
        ...context,
        timestamp: new Date().toISOString(),
      },
      { cause },
    );
    this.name = "ConnectionClosedError";
    Object.setPrototypeOf(this, ConnectionClosedError.prototype);
  }
}

export class ConnectTimeoutError extends CameraError {
  public readonly attempts: number;
  public readonly timeoutMs: number;

  constructor(
    attempts: number,
    timeoutMs: number,
    lastError: unknown,
    context?: ErrorContextInput,
  ) {
    super(
      `Could not connect to the camera worker within ${timeoutMs}ms (${attempts} attempts)`,
      {
        operation: context?.operation || "connect",
        ...context,
        timestamp: new Date().toISOString(),
      },
      { cause: lastError },
    );
    this.name = "ConnectTimeoutError";
    this.attempts = attempts;
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, ConnectTimeoutError.prototype);
  }
}

// ============================================================================
// Session Errors
// ============================================================================

export class CameraNotOpenError extends CameraError {
  constructor(context?: ErrorContextInput) {
    super(ERROR_MESSAGES.NO_SESSION, {
      operation: context?.operation || "unknown",
      ...context,
      timestamp: new Date().toISOString(),
    });
    this.name = "CameraNotOpenError";
    Object.setPrototypeOf(this, CameraNotOpenError.prototype);
  }
}

export class CameraAlreadyOpenError extends CameraError {
  constructor(context?: ErrorContextInput) {
    super(ERROR_MESSAGES.SESSION_EXISTS, {
      operation: context?.operation || "open_cam",
      ...context,
      timestamp: new Date().toISOString(),
    });
    this.name = "CameraAlreadyOpenError";
    Object.setPrototypeOf(this, CameraAlreadyOpenError.prototype);
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class SettingValidationError extends CameraError {
  public readonly setting: string;

  constructor(setting: string, reason: string, context?: ErrorContextInput) {
    super(`Cannot set "${setting}": ${reason}`, {
      operation: context?.operation || "setting",
      ...context,
      timestamp: new Date().toISOString(),
    });
    this.name = "SettingValidationError";
    this.setting = setting;
    Object.setPrototypeOf(this, SettingValidationError.prototype);
  }
}

/** Request that is not allowed in the current camera state */
export class InvalidStateError extends CameraError {
  constructor(message: string, context?: ErrorContextInput) {
    super(message, {
      operation: context?.operation || "unknown",
      ...context,
      timestamp: new Date().toISOString(),
    });
    this.name = "InvalidStateError";
    Object.setPrototypeOf(this, InvalidStateError.prototype);
  }
}

/** Well-framed message whose tag or value is not understood */
export class InvalidRequestError extends CameraError {
  constructor(message: string, context?: ErrorContextInput) {
    super(message, {
      operation: context?.operation || "dispatch",
      ...context,
      timestamp: new Date().toISOString(),
    });
    this.name = "InvalidRequestError";
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

// ============================================================================
// Driver & Process Errors
// ============================================================================

export class DriverError extends CameraError {
  constructor(message: string, context?: ErrorContextInput, cause?: unknown) {
    super(
      message,
      {
        operation: context?.operation || "driver_call",
        ...context,
        timestamp: new Date().toISOString(),
      },
      { cause },
    );
    this.name = "DriverError";
    Object.setPrototypeOf(this, DriverError.prototype);
  }
}

export class ProcessError extends CameraError {
  public readonly exitCode: number | null;
  public readonly signal: string | null;
  public readonly stderr: string;

  constructor(
    exitCode: number | null,
    signal: string | null,
    stderr: string,
    cause?: unknown,
  ) {
    const reason =
      exitCode !== null
        ? `exited with code ${exitCode}`
        : signal !== null
          ? `was terminated by ${signal}`
          : "failed to start";
    super(
      `Camera worker process ${reason}`,
      {
        operation: "worker",
        metadata: { exitCode, signal },
        timestamp: new Date().toISOString(),
      },
      { cause },
    );
    this.name = "ProcessError";
    this.exitCode = exitCode;
    this.signal = signal;
    this.stderr = stderr;
    Object.setPrototypeOf(this, ProcessError.prototype);
  }
}

// ============================================================================
// Error Mapping
// ============================================================================

/**
 * Wrap anything thrown by a driver into a DriverError.
 * Errors that are already typed pass through unchanged.
 */
export function mapDriverError(
  error: unknown,
  context?: ErrorContextInput,
): CameraError {
  if (error instanceof CameraError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DriverError(`Driver failure: ${message}`, context, error);
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

/**
 * Check if an error means the connection can no longer be used
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof ConnectionClosedError) return true;
  if (error instanceof ProtocolError) return true;

  const code = errorCode(error);
  return code === "ECONNRESET" || code === "ECONNABORTED" || code === "EPIPE";
}

/**
 * Check if a connect attempt failed only because nothing is listening yet
 */
export function isConnectionRefused(error: unknown): boolean {
  return errorCode(error) === "ECONNREFUSED";
}

/**
 * Build the [message, trace] pair carried by an exception event
 */
export function toExceptionPayload(error: unknown): [message: string, trace: string] {
  const message = error instanceof Error ? error.message : String(error);
  return [message, formatErrorTrace(error)];
}
