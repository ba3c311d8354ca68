/**
 * Camera Session State Machine Types
 */

import { InvalidStateError } from "./errors";

// ============================================================================
// States
// ============================================================================

export type CameraState = "CLOSED" | "OPEN" | "PLAYING";

// ============================================================================
// State Transitions
// ============================================================================

export interface StateTransition {
  from: CameraState;
  to: CameraState;
}

export const VALID_TRANSITIONS: StateTransition[] = [
  // Open
  { from: "CLOSED", to: "OPEN" },

  // Acquisition
  { from: "OPEN", to: "PLAYING" },
  { from: "PLAYING", to: "OPEN" },

  // Close, requested or after a driver failure
  { from: "OPEN", to: "CLOSED" },
  { from: "PLAYING", to: "CLOSED" },
];

export function isValidTransition(from: CameraState, to: CameraState): boolean {
  return VALID_TRANSITIONS.some((t) => t.from === from && t.to === to);
}

export function assertTransition(from: CameraState, to: CameraState): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidStateError(`Invalid camera state transition ${from} -> ${to}`, {
      operation: "transition",
      cameraState: from,
    });
  }
}
