import type {
  AgentAttributes,
  GeoPoint,
  LifecycleState,
  MissionPhase,
  RouteStep,
} from "./schemas.js"

// ---------------------------------------------------------------------------
// Failure taxonomy
// ---------------------------------------------------------------------------

export type FailureKind =
  | "ValidationFailure"
  | "ResourceConflict"
  | "ConnectivityLoss"
  | "ConstraintBreach"
  | "CommandTimeout"
  | "HistoryOverflow"

/** Why a mission reached ABORTED. */
export type AbortReason =
  | "ValidationFailure"
  | "ConstraintBreach"
  | "CommandTimeout"
  | "ConnectivityTimeout"
  | "EmergencyStop"
  | "Rejected"
  | "Decommissioned"

// ---------------------------------------------------------------------------
// Agent
// ---------------------------------------------------------------------------

/**
 * Mutable per-agent state. Owned by exactly one entity actor; everything
 * outside the actor sees it only as a frozen AgentSnapshot.
 */
export interface AgentState {
  agentId: string
  lifecycleState: LifecycleState
  attributes: AgentAttributes
  position: GeoPoint | null
  homePosition: GeoPoint | null
  battery: number | null
  gpsFix: number | null
  windMps: number | null
  armed: boolean
  connected: boolean
  activeMissionId: string | null
  suspendedMissionId: string | null
  faultReason: string | null
  lastEventAt: number | null
  /** Number of events applied since enrollment. */
  sequence: number
}

export type AgentSnapshot = Readonly<
  Omit<AgentState, "attributes" | "position" | "homePosition"> & {
    attributes: Readonly<AgentAttributes>
    position: Readonly<GeoPoint> | null
    homePosition: Readonly<GeoPoint> | null
  }
>

// ---------------------------------------------------------------------------
// Mission execution
// ---------------------------------------------------------------------------

export type MissionOrigin = "planned" | "detected"

export interface MissionMetrics {
  distanceMeters: number
  maxAltitudeMeters: number
  batteryConsumed: number
  durationSec: number
}

export interface MissionExecution {
  missionId: string
  agentId: string
  origin: MissionOrigin
  planId: string | null
  phase: MissionPhase
  currentStepIndex: number
  /** Logical ms timestamp of acceptance (planned) or confirmation (detected). */
  startTime: number
  endTime: number | null
  abortReason: AbortReason | null
  abortDetail: string | null
  metrics: MissionMetrics
  startBattery: number | null
  lastPosition: GeoPoint | null
  suspendedAt: number | null
}

export interface MissionStatus {
  missionId: string
  agentId: string
  origin: MissionOrigin
  phase: MissionPhase
  currentStepIndex: number
  currentStep: RouteStep | null
  metrics: MissionMetrics
  abortReason: AbortReason | null
  abortDetail: string | null
  suspended: boolean
}

// ---------------------------------------------------------------------------
// Signal results
// ---------------------------------------------------------------------------

export type AssignResult =
  | { status: "Accepted"; missionId: string; phase: MissionPhase }
  | { status: "Busy"; activeMissionId: string | null }
  | { status: "Unreachable" }
  | { status: "ConstraintViolation"; reason: string }

export type DecisionResult =
  | { status: "Applied"; missionId: string; phase: MissionPhase }
  | { status: "NoSuchDraft"; draftId: string }

export type DispatchResult =
  | { status: "Found"; agentId: string; distanceMeters: number | null }
  | { status: "NoCandidate" }

// ---------------------------------------------------------------------------
// Directives to the transport collaborator
// ---------------------------------------------------------------------------

export type DirectiveKind =
  | "TAKEOFF"
  | "GOTO"
  | "ACTION"
  | "LAND"
  | "RTL"
  | "HOLD"
  | "EMERGENCY_STOP"

export interface Directive {
  /** Stable across retries so the receiving side can de-duplicate. */
  commandId: string
  agentId: string
  missionId: string | null
  kind: DirectiveKind
  params: Record<string, unknown>
}

export interface DirectiveAck {
  commandId: string
  accepted: boolean
  detail?: string
}
