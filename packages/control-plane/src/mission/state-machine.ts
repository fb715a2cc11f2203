/**
 * Mission execution state machine.
 *
 * DRAFT -> VALIDATING -> EXECUTING -> COMPLETED | ABORTED
 *
 * The machine owns no I/O. Every operation mutates the execution record
 * and returns the effects the owning actor must carry out: directives to
 * send and, once a terminal phase is reached, the record to archive.
 */

import type {
  AbortReason,
  AgentSnapshot,
  BreachAction,
  Directive,
  DirectiveKind,
  GeoPoint,
  MissionExecution,
  MissionOrigin,
  MissionPhase,
  MissionPlan,
  MissionStatus,
  RouteStep,
  TelemetryPayload,
} from "@aether/shared/fleet"
import { distance3d, haversineDistance } from "@aether/shared/geo"

import { evaluateInFlight, validateMission } from "./safety.js"

export const VALID_PHASE_TRANSITIONS: Record<MissionPhase, MissionPhase[]> = {
  DRAFT: ["VALIDATING", "ABORTED"],
  VALIDATING: ["EXECUTING", "ABORTED"],
  EXECUTING: ["COMPLETED", "ABORTED"],
  COMPLETED: [],
  ABORTED: [],
}

export class InvalidPhaseTransitionError extends Error {
  readonly missionId: string
  readonly from: MissionPhase
  readonly to: MissionPhase

  constructor(missionId: string, from: MissionPhase, to: MissionPhase) {
    super(`Invalid mission phase transition for ${missionId}: ${from} -> ${to}`)
    this.name = "InvalidPhaseTransitionError"
    this.missionId = missionId
    this.from = from
    this.to = to
  }
}

export function isTerminalPhase(phase: MissionPhase): boolean {
  return VALID_PHASE_TRANSITIONS[phase].length === 0
}

export interface MissionOptions {
  /** A waypoint counts as reached inside this 3-D distance. */
  waypointToleranceMeters: number
  /** A takeoff counts as complete this close below its target altitude. */
  altitudeToleranceMeters: number
}

export type MissionEffect =
  | { type: "directive"; directive: Directive }
  | { type: "terminal"; execution: MissionExecution }

const BREACH_DIRECTIVE: Record<BreachAction, DirectiveKind> = {
  RTL: "RTL",
  LAND: "LAND",
  HOLD: "HOLD",
}

export class MissionStateMachine {
  readonly plan: MissionPlan | null
  private readonly exec: MissionExecution
  private readonly options: MissionOptions

  private constructor(plan: MissionPlan | null, execution: MissionExecution, options: MissionOptions) {
    this.plan = plan
    this.exec = execution
    this.options = options
  }

  /** A planned mission, held in DRAFT when the plan asks for approval. */
  static planned(
    missionId: string,
    agentId: string,
    plan: MissionPlan,
    timestamp: number,
    snapshot: AgentSnapshot,
    options: MissionOptions,
  ): MissionStateMachine {
    return new MissionStateMachine(
      plan,
      newExecution(missionId, agentId, "planned", plan.planId, plan.requiresApproval ? "DRAFT" : "VALIDATING", timestamp, snapshot),
      options,
    )
  }

  /** A session confirmed by detection; it starts out executing. */
  static detected(
    missionId: string,
    agentId: string,
    startTime: number,
    snapshot: AgentSnapshot,
    options: MissionOptions,
  ): MissionStateMachine {
    return new MissionStateMachine(
      null,
      newExecution(missionId, agentId, "detected", null, "EXECUTING", startTime, snapshot),
      options,
    )
  }

  static restore(plan: MissionPlan | null, execution: MissionExecution, options: MissionOptions): MissionStateMachine {
    return new MissionStateMachine(plan, structuredClone(execution), options)
  }

  get missionId(): string {
    return this.exec.missionId
  }

  get phase(): MissionPhase {
    return this.exec.phase
  }

  get origin(): MissionOrigin {
    return this.exec.origin
  }

  get isTerminal(): boolean {
    return isTerminalPhase(this.exec.phase)
  }

  get isSuspended(): boolean {
    return this.exec.suspendedAt !== null
  }

  /** Deep copy of the execution record. */
  get execution(): MissionExecution {
    return structuredClone(this.exec)
  }

  status(): MissionStatus {
    return {
      missionId: this.exec.missionId,
      agentId: this.exec.agentId,
      origin: this.exec.origin,
      phase: this.exec.phase,
      currentStepIndex: this.exec.currentStepIndex,
      currentStep: this.plan?.route[this.exec.currentStepIndex] ?? null,
      metrics: { ...this.exec.metrics },
      abortReason: this.exec.abortReason,
      abortDetail: this.exec.abortDetail,
      suspended: this.exec.suspendedAt !== null,
    }
  }

  // -------------------------------------------------------------------------
  // Approval
  // -------------------------------------------------------------------------

  approve(): MissionEffect[] {
    this.transition("VALIDATING")
    return []
  }

  reject(feedback: string, timestamp: number): MissionEffect[] {
    return this.abort("Rejected", feedback, timestamp)
  }

  // -------------------------------------------------------------------------
  // Validation
  // -------------------------------------------------------------------------

  validate(snapshot: AgentSnapshot, timestamp: number): MissionEffect[] {
    if (this.exec.phase !== "VALIDATING" || !this.plan) return []

    const result = validateMission(this.plan, snapshot)
    if (!result.ok) {
      return this.abort("ValidationFailure", `${result.reason}: ${result.detail}`, timestamp)
    }

    this.transition("EXECUTING")
    this.exec.currentStepIndex = 0
    return this.directiveForCurrentStep()
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  /**
   * Fold a telemetry update into the metrics, run the in-flight checks and
   * advance the route. `snapshot` already reflects the update.
   */
  onTelemetry(snapshot: AgentSnapshot, telemetry: TelemetryPayload, timestamp: number): MissionEffect[] {
    if (this.exec.phase !== "EXECUTING") return []

    this.updateMetrics(telemetry, timestamp)
    if (!this.plan) return []

    const breach = evaluateInFlight(this.plan, snapshot, telemetry, timestamp - this.exec.startTime)
    if (breach) {
      return this.abort("ConstraintBreach", `${breach.check}: ${breach.detail}`, timestamp, this.breachDirective())
    }

    const step = this.plan.route[this.exec.currentStepIndex]
    if (step && this.isAchieved(step, snapshot, telemetry)) {
      return this.advance(timestamp)
    }
    return []
  }

  /**
   * Telemetry that still arrives while the link is suspended. Metrics and
   * in-flight checks run as usual; the route does not advance and a breach
   * aborts without a directive, since there is no link to send it over.
   */
  onSuspendedTelemetry(snapshot: AgentSnapshot, telemetry: TelemetryPayload, timestamp: number): MissionEffect[] {
    if (this.exec.phase !== "EXECUTING" || !this.isSuspended) return []

    this.updateMetrics(telemetry, timestamp)
    if (!this.plan) return []

    const breach = evaluateInFlight(this.plan, snapshot, telemetry, timestamp - this.exec.startTime)
    return breach ? this.abort("ConstraintBreach", `${breach.check}: ${breach.detail}`, timestamp) : []
  }

  onCommandAcked(commandId: string, timestamp: number): MissionEffect[] {
    if (this.exec.phase !== "EXECUTING" || !this.plan) return []
    const step = this.plan.route[this.exec.currentStepIndex]
    if (step?.type === "action" && commandId === this.currentCommandId()) {
      return this.advance(timestamp)
    }
    return []
  }

  onCommandFailed(commandId: string, detail: string, timestamp: number): MissionEffect[] {
    if (this.exec.phase !== "EXECUTING" || commandId !== this.currentCommandId()) return []
    return this.abort("CommandTimeout", detail, timestamp, this.breachDirective())
  }

  emergencyStop(timestamp: number): MissionEffect[] {
    if (this.isTerminal) return []
    const directive: Directive | null =
      this.exec.phase === "EXECUTING"
        ? {
            commandId: `${this.exec.missionId}:estop`,
            agentId: this.exec.agentId,
            missionId: this.exec.missionId,
            kind: "EMERGENCY_STOP",
            params: {},
          }
        : null
    return this.abort("EmergencyStop", "operator emergency stop", timestamp, directive)
  }

  /** A hardware fault aborts the mission and triggers the geofence breach action. */
  fault(detail: string, timestamp: number): MissionEffect[] {
    const directive = this.exec.phase === "EXECUTING" && !this.isSuspended ? this.breachDirective() : null
    return this.abort("ConstraintBreach", `fault: ${detail}`, timestamp, directive)
  }

  /** Detected sessions end when detection confirms the disarm. */
  complete(timestamp: number): MissionEffect[] {
    if (this.exec.phase !== "EXECUTING") return []
    this.transition("COMPLETED")
    this.finish(timestamp)
    return [{ type: "terminal", execution: this.execution }]
  }

  // -------------------------------------------------------------------------
  // Connectivity
  // -------------------------------------------------------------------------

  suspend(timestamp: number): void {
    if (this.isTerminal) return
    this.exec.suspendedAt = timestamp
  }

  /** Leave suspension; an executing mission re-sends its current directive. */
  resume(): MissionEffect[] {
    this.exec.suspendedAt = null
    return this.exec.phase === "EXECUTING" ? this.directiveForCurrentStep() : []
  }

  expire(timestamp: number): MissionEffect[] {
    if (this.isTerminal) return []
    return this.abort("ConnectivityTimeout", "link not restored within the grace window", timestamp)
  }

  abort(
    reason: AbortReason,
    detail: string,
    timestamp: number,
    directive: Directive | null = null,
  ): MissionEffect[] {
    if (this.isTerminal) return []
    this.transition("ABORTED")
    this.exec.abortReason = reason
    this.exec.abortDetail = detail
    this.finish(timestamp)

    const effects: MissionEffect[] = []
    if (directive) effects.push({ type: "directive", directive })
    effects.push({ type: "terminal", execution: this.execution })
    return effects
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private transition(to: MissionPhase): void {
    if (!VALID_PHASE_TRANSITIONS[this.exec.phase].includes(to)) {
      throw new InvalidPhaseTransitionError(this.exec.missionId, this.exec.phase, to)
    }
    this.exec.phase = to
  }

  private finish(timestamp: number): void {
    this.exec.endTime = timestamp
    this.exec.suspendedAt = null
    this.exec.metrics.durationSec = Math.max(0, (timestamp - this.exec.startTime) / 1000)
  }

  private advance(timestamp: number): MissionEffect[] {
    this.exec.currentStepIndex++
    if (this.plan && this.exec.currentStepIndex >= this.plan.route.length) {
      this.transition("COMPLETED")
      this.finish(timestamp)
      return [{ type: "terminal", execution: this.execution }]
    }
    return this.directiveForCurrentStep()
  }

  private isAchieved(step: RouteStep, snapshot: AgentSnapshot, telemetry: TelemetryPayload): boolean {
    const position = telemetry.position ?? snapshot.position
    switch (step.type) {
      case "takeoff":
        return position !== null && (position.alt ?? 0) >= step.altitude - this.options.altitudeToleranceMeters
      case "waypoint":
        return (
          position !== null &&
          distance3d(position, { lat: step.lat, lon: step.lon, alt: step.alt }) < this.options.waypointToleranceMeters
        )
      case "action":
        return false
      case "land":
        return !snapshot.armed
    }
  }

  private currentCommandId(): string {
    return `${this.exec.missionId}:${String(this.exec.currentStepIndex)}`
  }

  private directiveForCurrentStep(): MissionEffect[] {
    const step = this.plan?.route[this.exec.currentStepIndex]
    if (!step) return []

    const base = {
      commandId: this.currentCommandId(),
      agentId: this.exec.agentId,
      missionId: this.exec.missionId,
    }
    let directive: Directive
    switch (step.type) {
      case "takeoff":
        directive = { ...base, kind: "TAKEOFF", params: { altitude: step.altitude } }
        break
      case "waypoint":
        directive = {
          ...base,
          kind: "GOTO",
          params: { lat: step.lat, lon: step.lon, alt: step.alt, holdSec: step.holdSec, speedMps: step.speedMps },
        }
        break
      case "action":
        directive = { ...base, kind: "ACTION", params: { name: step.name, ...step.params } }
        break
      case "land":
        directive = { ...base, kind: "LAND", params: {} }
        break
    }
    return [{ type: "directive", directive }]
  }

  private breachDirective(): Directive | null {
    if (!this.plan) return null
    const kind = BREACH_DIRECTIVE[this.plan.geofence.breachAction]
    return {
      commandId: `${this.exec.missionId}:breach`,
      agentId: this.exec.agentId,
      missionId: this.exec.missionId,
      kind,
      params: kind === "RTL" ? { rallyPoint: this.plan.emergencyRallyPoint } : {},
    }
  }

  private updateMetrics(telemetry: TelemetryPayload, timestamp: number): void {
    const metrics = this.exec.metrics
    const position = telemetry.position
    if (position) {
      if (this.exec.lastPosition) {
        metrics.distanceMeters += haversineDistance(this.exec.lastPosition, position)
      }
      this.exec.lastPosition = { ...position }
      metrics.maxAltitudeMeters = Math.max(metrics.maxAltitudeMeters, position.alt ?? 0)
    }

    if (telemetry.battery !== undefined) {
      if (this.exec.startBattery === null) {
        this.exec.startBattery = telemetry.battery
      } else {
        metrics.batteryConsumed = Math.max(0, this.exec.startBattery - telemetry.battery)
      }
    }

    metrics.durationSec = Math.max(0, (timestamp - this.exec.startTime) / 1000)
  }
}

function newExecution(
  missionId: string,
  agentId: string,
  origin: MissionOrigin,
  planId: string | null,
  phase: MissionPhase,
  startTime: number,
  snapshot: AgentSnapshot,
): MissionExecution {
  const position: GeoPoint | null = snapshot.position ? { ...snapshot.position } : null
  return {
    missionId,
    agentId,
    origin,
    planId,
    phase,
    currentStepIndex: 0,
    startTime,
    endTime: null,
    abortReason: null,
    abortDetail: null,
    metrics: {
      distanceMeters: 0,
      maxAltitudeMeters: position?.alt ?? 0,
      batteryConsumed: 0,
      durationSec: 0,
    },
    startBattery: snapshot.battery,
    lastPosition: position,
    suspendedAt: null,
  }
}
