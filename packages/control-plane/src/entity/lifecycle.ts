/**
 * Agent lifecycle transitions.
 *
 * States:
 * - OFFLINE: no link to the vehicle
 * - ONLINE_IDLE: connected, disarmed, available for work
 * - ONLINE_ARMED: armed without a confirmed session (detection candidate)
 * - IN_MISSION: owns exactly one active mission, planned or detected
 * - ERROR: hardware fault reported; only an operator ClearFault leaves it
 */

import type { LifecycleState } from "@aether/shared/fleet"

/**
 * Valid lifecycle transitions. Each key maps to the set of states it can
 * transition to.
 */
export const VALID_TRANSITIONS: Record<LifecycleState, LifecycleState[]> = {
  OFFLINE: ["ONLINE_IDLE", "IN_MISSION", "ERROR"],
  ONLINE_IDLE: ["ONLINE_ARMED", "IN_MISSION", "OFFLINE", "ERROR"],
  ONLINE_ARMED: ["IN_MISSION", "ONLINE_IDLE", "OFFLINE", "ERROR"],
  IN_MISSION: ["ONLINE_IDLE", "OFFLINE", "ERROR"],
  ERROR: ["ONLINE_IDLE", "OFFLINE"],
}

export class InvalidTransitionError extends Error {
  readonly from: LifecycleState
  readonly to: LifecycleState

  constructor(from: LifecycleState, to: LifecycleState) {
    super(`Invalid lifecycle transition: ${from} -> ${to}`)
    this.name = "InvalidTransitionError"
    this.from = from
    this.to = to
  }
}

export function isValidTransition(from: LifecycleState, to: LifecycleState): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

/** Throws InvalidTransitionError if the transition is not allowed. */
export function assertValidTransition(from: LifecycleState, to: LifecycleState): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidTransitionError(from, to)
  }
}

export interface LifecycleTransitionEvent {
  agentId: string
  from: LifecycleState
  to: LifecycleState
  /** Logical timestamp of the message that caused the transition. */
  timestamp: number
  reason: string
  /** Extra context, e.g. the start location of a detected session. */
  details?: Record<string, unknown>
}

export type LifecycleListener = (event: LifecycleTransitionEvent) => void
