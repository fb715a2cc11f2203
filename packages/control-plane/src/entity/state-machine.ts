/**
 * EntityStateMachine: the actor that owns one agent.
 *
 * Every message that can change the agent's state (fleet events, operator
 * signals and the actor's own internal messages) runs through a priority
 * mailbox, one at a time. A message is appended to the agent's history
 * before it is applied; external effects (directives, archival, timers)
 * run only after the new state is committed and never during replay.
 *
 * Readers never touch the live state: `query()` returns the frozen
 * snapshot of the last commit, and the same commit publishes the agent's
 * record to the fleet index.
 */

import {
  type AgentAttributes,
  type AgentSnapshot,
  type AgentState,
  type AssignResult,
  type ConnectivityChange,
  type DecisionResult,
  type DetectionProfile,
  type Directive,
  type FleetEvent,
  type LifecycleState,
  type MissionExecution,
  type MissionPlan,
  MissionPlanSchema,
  type MissionStatus,
  type OperatorSignal,
  type OperatorSignalEvent,
  type TelemetryPayload,
  type TelemetryUpdate,
} from "@aether/shared/fleet"
import type { HistoryWriter } from "@aether/shared/history"
import { addSpanEvent, AetherAttributes, type TracingLogger, withSpan } from "@aether/shared/tracing"
import type { ZodIssue } from "zod"

import {
  type DetectionDecision,
  type DetectorMemory,
  evaluateDetection,
  INITIAL_DETECTOR_MEMORY,
} from "../detection/engine.js"
import type { FleetIndex, IndexRecord } from "../dispatch/fleet-index.js"
import { EntityStoppedError } from "../errors.js"
import type { MissionArchive, PlanFeedback, PlanFeedbackSink, TransportLink } from "../fleet/collaborators.js"
import { CommandDispatcher, type CommandOptions } from "../mission/commands.js"
import { validateMission } from "../mission/safety.js"
import { type MissionEffect, type MissionOptions, MissionStateMachine } from "../mission/state-machine.js"
import type { Checkpoint, MissionSlot } from "./checkpoint.js"
import { type CompactionAlert, type CompactionOptions, type CompactionOutcome, HistoryCompactor } from "./compactor.js"
import {
  assertValidTransition,
  type LifecycleListener,
  type LifecycleTransitionEvent,
} from "./lifecycle.js"
import { type MessagePriority, PriorityMailbox } from "./mailbox.js"
import type { ActorMessage, InternalMessage } from "./messages.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EntityDeps {
  index: FleetIndex
  transport: TransportLink
  archive: MissionArchive
  feedback: PlanFeedbackSink
  history: HistoryWriter
  logger: TracingLogger
  /** Wall clock for compaction intervals and signals sent before any telemetry. */
  now?: () => number
}

export interface EntityOptions {
  /** Distinguishes mission ids across re-enrollments of the same agent id. */
  incarnation: string
  detection: DetectionProfile
  commands: CommandOptions
  mission: MissionOptions
  connectivityGraceMs: number
  compaction: CompactionOptions
  onAlert?: (alert: CompactionAlert) => void
}

export interface HandleOutcome {
  agentId: string
  /** False when the message was dropped or had nothing to act on. */
  applied: boolean
  from: LifecycleState
  to: LifecycleState
  /** Detection engine verdict, when detection ran. */
  decision: DetectionDecision | null
  assign: AssignResult | null
  approval: DecisionResult | null
}

export interface RecoveredHistory {
  checkpoint: Checkpoint | null
  messages: ActorMessage[]
}

type ActorEffect =
  | MissionEffect
  | { type: "validate"; missionId: string }
  | { type: "feedback"; feedback: PlanFeedback }
  | { type: "startGrace"; missionId: string; suspendedAt: number }
  | { type: "cancelGrace" }
  | { type: "armDisarmTimer"; disarmedSince: number }
  | { type: "cancelDisarmTimer" }

interface Applied {
  applied: boolean
  effects: ActorEffect[]
  decision?: DetectionDecision
  assign?: AssignResult
  approval?: DecisionResult
}

function skipped(): Applied {
  return { applied: false, effects: [] }
}

// ---------------------------------------------------------------------------
// Actor
// ---------------------------------------------------------------------------

export class EntityStateMachine {
  readonly agentId: string
  private state: AgentState
  private mission: MissionStateMachine | null = null
  private suspended: MissionStateMachine | null = null
  private detector: DetectorMemory = INITIAL_DETECTOR_MEMORY
  private snapshot: AgentSnapshot

  private readonly deps: EntityDeps
  private readonly options: EntityOptions
  private readonly now: () => number
  private readonly logger: TracingLogger
  private readonly mailbox = new PriorityMailbox()
  private readonly commands: CommandDispatcher
  private readonly compactor: HistoryCompactor
  private readonly listeners = new Set<LifecycleListener>()
  private readonly background = new Set<Promise<void>>()

  private pendingTransitions: LifecycleTransitionEvent[] = []
  private graceTimer: ReturnType<typeof setTimeout> | null = null
  private disarmTimer: ReturnType<typeof setTimeout> | null = null
  private compactionQueued = false
  private replaying = false
  private stopped = false

  constructor(agentId: string, attributes: AgentAttributes, deps: EntityDeps, options: EntityOptions) {
    this.agentId = agentId
    this.deps = deps
    this.options = options
    this.now = deps.now ?? Date.now
    this.logger = deps.logger.child({ agentId })
    this.state = initialState(agentId, attributes)
    this.snapshot = freezeSnapshot(this.state)
    this.commands = new CommandDispatcher(deps.transport, options.commands, this.logger)
    this.compactor = new HistoryCompactor({
      agentId,
      history: deps.history,
      archive: deps.archive,
      options: options.compaction,
      logger: this.logger,
      now: this.now,
      onAlert: options.onAlert,
    })
    deps.index.publish(indexRecord(this.state))
  }

  /** Subscribe to lifecycle transitions. Returns an unsubscribe function. */
  onTransition(listener: LifecycleListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // -------------------------------------------------------------------------
  // Signals
  // -------------------------------------------------------------------------

  handle(event: FleetEvent): Promise<HandleOutcome> {
    const priority: MessagePriority =
      event.kind === "OperatorSignal" && event.signal.type === "EmergencyStop" ? "emergency" : "normal"

    return this.enqueue(priority, () =>
      withSpan(
        "aether.entity.handle",
        { [AetherAttributes.AGENT_ID]: this.agentId, [AetherAttributes.EVENT_KIND]: event.kind },
        async (span) => {
          const outcome = this.process(event)
          span.setAttribute(AetherAttributes.LIFECYCLE_FROM, outcome.from)
          span.setAttribute(AetherAttributes.LIFECYCLE_TO, outcome.to)
          return outcome
        },
      ),
    )
  }

  /** Send an operator signal stamped with the agent's logical clock. */
  signal(signal: OperatorSignal, timestamp?: number): Promise<HandleOutcome> {
    return this.handle({
      kind: "OperatorSignal",
      agentId: this.agentId,
      timestamp: timestamp ?? this.logicalNow(),
      signal,
    })
  }

  /**
   * Assign a plan. `plan` is validated here, so callers may pass an
   * unparsed document; a schema failure is a ConstraintViolation.
   */
  assignMission(plan: unknown, options: { timestamp?: number } = {}): Promise<AssignResult> {
    return this.enqueue("normal", () =>
      withSpan("aether.entity.assign", { [AetherAttributes.AGENT_ID]: this.agentId }, async (span) => {
        const result = this.assignNow(plan, options.timestamp)
        span.setAttribute(AetherAttributes.ASSIGN_STATUS, result.status)
        if (result.status === "Accepted") {
          span.setAttribute(AetherAttributes.MISSION_ID, result.missionId)
          const planId = this.mission?.plan?.planId
          if (planId) span.setAttribute(AetherAttributes.PLAN_ID, planId)
        }
        return result
      }),
    )
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  query(): AgentSnapshot {
    return this.snapshot
  }

  /** Status of the active or suspended mission with this id, or null. */
  missionStatus(missionId: string): MissionStatus | null {
    for (const mission of [this.mission, this.suspended]) {
      if (mission?.missionId === missionId) return mission.status()
    }
    return null
  }

  get activeMission(): MissionStatus | null {
    return this.mission?.status() ?? null
  }

  get pendingHistoryEvents(): number {
    return this.compactor.pendingEvents
  }

  get isStopped(): boolean {
    return this.stopped
  }

  // -------------------------------------------------------------------------
  // Recovery
  // -------------------------------------------------------------------------

  /**
   * Rebuild state from the latest checkpoint and the messages logged after
   * it. Must run before any live message. Timers and the current directive
   * are re-armed afterwards.
   */
  recover(history: RecoveredHistory): void {
    if (history.checkpoint) {
      this.restore(history.checkpoint)
    }

    this.replaying = true
    try {
      for (const message of history.messages) {
        this.process(message)
        this.compactor.recordEvent()
      }
    } finally {
      this.replaying = false
      this.pendingTransitions = []
    }

    this.commit()
    this.resumeEffects()
    this.logger.info("entity recovered", {
      fromCheckpoint: history.checkpoint !== null,
      replayed: history.messages.length,
      lifecycleState: this.state.lifecycleState,
    })
  }

  /** Serializable state; taken between messages only. */
  checkpoint(): Checkpoint {
    return {
      agent: structuredClone(this.state),
      mission: this.mission ? missionSlot(this.mission) : null,
      suspended: this.suspended ? missionSlot(this.suspended) : null,
      detector: structuredClone(this.detector),
      appliedSequence: this.state.sequence,
    }
  }

  // -------------------------------------------------------------------------
  // Compaction
  // -------------------------------------------------------------------------

  /** Compact now if the threshold or interval has been reached. */
  compactIfDue(): Promise<CompactionOutcome | null> {
    if (!this.compactor.isDue()) return Promise.resolve(null)
    return this.compact()
  }

  compact(): Promise<CompactionOutcome> {
    return this.enqueue("background", () => this.compactNow())
  }

  // -------------------------------------------------------------------------
  // Shutdown
  // -------------------------------------------------------------------------

  /** Wait until no message, delivery or archival is outstanding. */
  async settle(): Promise<void> {
    do {
      await this.mailbox.idle()
      await this.commands.settle()
      await Promise.all([...this.background])
    } while (this.mailbox.size > 0 || this.commands.pending > 0)
  }

  /**
   * Drain the mailbox and dispose timers. Unless `checkpoint` is false, a
   * final compaction leaves recovery with an empty tail.
   */
  async stop(options: { checkpoint?: boolean } = {}): Promise<void> {
    if (this.stopped) return

    if ((options.checkpoint ?? true) && this.compactor.pendingEvents > 0) {
      await this.compact()
    }
    this.stopped = true
    await this.mailbox.close()
    this.clearGraceTimer()
    this.clearDisarmTimer()
    await this.commands.stop()
    await Promise.all([...this.background])
    await this.compactor.flush()
    this.deps.history.close()
    this.logger.debug("entity stopped")
  }

  /** Abort any mission as Decommissioned, then stop without a checkpoint. */
  async decommission(): Promise<void> {
    await this.enqueue("emergency", () => {
      const timestamp = this.logicalNow()
      const effects: ActorEffect[] = []
      for (const mission of [this.mission, this.suspended]) {
        if (mission) effects.push(...mission.abort("Decommissioned", "agent decommissioned", timestamp))
      }
      this.mission = null
      this.suspended = null
      this.state.activeMissionId = null
      this.state.suspendedMissionId = null
      this.runEffects(effects)
    })
    await this.stop({ checkpoint: false })
    this.deps.index.remove(this.agentId)
  }

  // -------------------------------------------------------------------------
  // Message processing
  // -------------------------------------------------------------------------

  private enqueue<T>(priority: MessagePriority, work: () => Promise<T> | T): Promise<T> {
    if (this.stopped || this.mailbox.isClosed) {
      return Promise.reject(new EntityStoppedError(this.agentId))
    }
    return this.mailbox.enqueue(priority, work)
  }

  private post(message: InternalMessage, priority: MessagePriority = "normal"): void {
    this.enqueue(priority, () => this.process(message)).catch((err: unknown) => {
      if (err instanceof EntityStoppedError) {
        this.logger.debug("internal message dropped after stop", { kind: message.kind })
        return
      }
      this.logger.error("internal message failed", {
        kind: message.kind,
        error: err,
      })
    })
  }

  private process(message: ActorMessage): HandleOutcome {
    const from = this.state.lifecycleState

    if (!this.replaying) {
      this.deps.history.append({
        version: "1.0",
        timestamp: new Date().toISOString(),
        agentId: this.agentId,
        type: "EVENT",
        data: { message },
      })
      this.compactor.recordEvent()
    }

    const result = this.apply(message)
    if (result.applied) {
      this.state.sequence++
    }

    const transitions = this.pendingTransitions
    this.pendingTransitions = []

    if (!this.replaying) {
      this.commit()
      this.runEffects(result.effects)
      this.notify(transitions)
      if (this.compactor.isDue()) this.scheduleCompaction()
    }

    return {
      agentId: this.agentId,
      applied: result.applied,
      from,
      to: this.state.lifecycleState,
      decision: result.decision ?? null,
      assign: result.assign ?? null,
      approval: result.approval ?? null,
    }
  }

  private apply(message: ActorMessage): Applied {
    switch (message.kind) {
      case "TelemetryUpdate":
        return this.applyTelemetry(message)
      case "ConnectivityChange":
        return this.applyConnectivity(message)
      case "OperatorSignal":
        return this.applySignal(message)
      case "ValidateMission": {
        const mission = this.mission
        if (!mission || mission.missionId !== message.missionId) return skipped()
        const effects: ActorEffect[] = mission.validate(this.state, message.timestamp)
        effects.push(...this.releaseIfDone(message.timestamp))
        return { applied: true, effects }
      }
      case "CommandAcked": {
        const mission = this.mission
        if (!mission || mission.missionId !== message.missionId) return skipped()
        const effects: ActorEffect[] = mission.onCommandAcked(message.commandId, message.timestamp)
        effects.push(...this.releaseIfDone(message.timestamp))
        return { applied: effects.length > 0, effects }
      }
      case "CommandFailed": {
        const mission = this.mission
        if (!mission || mission.missionId !== message.missionId) {
          this.logger.warn("directive failed", { commandId: message.commandId, detail: message.detail })
          return skipped()
        }
        if (mission.isTerminal) {
          this.logger.warn("directive failed after mission ended", {
            missionId: mission.missionId,
            phase: mission.phase,
            abortReason: mission.execution.abortReason,
            commandId: message.commandId,
            detail: message.detail,
          })
          return skipped()
        }
        const effects: ActorEffect[] = mission.onCommandFailed(message.commandId, message.detail, message.timestamp)
        effects.push(...this.releaseIfDone(message.timestamp))
        return { applied: effects.length > 0, effects }
      }
      case "GraceExpired": {
        const mission = this.suspended
        if (!mission || mission.missionId !== message.missionId) return skipped()
        const effects: ActorEffect[] = mission.expire(message.timestamp)
        this.suspended = null
        this.state.suspendedMissionId = null
        effects.push(...this.resetDetector())
        return { applied: true, effects }
      }
      case "DisarmTimeout":
        return this.applyDisarmTimeout(message.timestamp)
    }
  }

  // -------------------------------------------------------------------------
  // Telemetry
  // -------------------------------------------------------------------------

  private applyTelemetry(event: TelemetryUpdate): Applied {
    const { timestamp, telemetry } = event
    if (this.state.lastEventAt !== null && timestamp < this.state.lastEventAt) {
      this.logger.debug("stale telemetry dropped", { timestamp, lastEventAt: this.state.lastEventAt })
      return skipped()
    }
    this.state.lastEventAt = timestamp
    this.fold(telemetry)

    if (telemetry.fault !== undefined) {
      return this.applyFault(telemetry.fault, timestamp)
    }

    const lifecycle = this.state.lifecycleState
    if (lifecycle === "ERROR" || lifecycle === "OFFLINE") {
      return { applied: true, effects: this.checkSuspended(telemetry, timestamp) }
    }

    const mission = this.mission
    if (mission) {
      const effects: ActorEffect[] = mission.onTelemetry(this.state, telemetry, timestamp)
      let decision: DetectionDecision | undefined
      if (mission.origin === "detected") {
        const detected = this.detect(timestamp)
        decision = detected.decision
        effects.push(...detected.effects)
        if (detected.decision === "ConfirmSessionEnd") {
          effects.push(...mission.complete(timestamp))
        }
      }
      effects.push(...this.releaseIfDone(timestamp))
      return { applied: true, effects, decision }
    }

    const detected = this.detect(timestamp)
    switch (detected.decision) {
      case "ConfirmSessionStart":
        this.startDetectedMission(timestamp)
        break
      case "RevertFalseStart":
        this.transition("ONLINE_IDLE", "false start reverted", timestamp)
        break
      case "ConfirmSessionEnd":
      case "Continue":
        if (lifecycle === "ONLINE_IDLE" && this.detector.phase === "CANDIDATE") {
          this.transition("ONLINE_ARMED", "armed", timestamp)
        }
        break
    }
    return { applied: true, effects: detected.effects, decision: detected.decision }
  }

  /** A breach reported during suspension ends the mission before the grace window does. */
  private checkSuspended(telemetry: TelemetryPayload, timestamp: number): ActorEffect[] {
    const mission = this.suspended
    if (!mission) return []
    const effects: ActorEffect[] = mission.onSuspendedTelemetry(this.state, telemetry, timestamp)
    if (!mission.isTerminal) return effects

    this.suspended = null
    this.state.suspendedMissionId = null
    effects.push({ type: "cancelGrace" }, ...this.resetDetector())
    this.logger.warn("suspended mission aborted", {
      missionId: mission.missionId,
      reason: mission.execution.abortReason,
      detail: mission.execution.abortDetail,
    })
    return effects
  }

  private applyFault(fault: string, timestamp: number): Applied {
    this.state.faultReason = fault
    const effects: ActorEffect[] = []

    if (this.mission) {
      effects.push(...this.mission.fault(fault, timestamp))
    }
    if (this.suspended) {
      effects.push(...this.suspended.fault(fault, timestamp), { type: "cancelGrace" })
    }
    this.mission = null
    this.suspended = null
    this.state.activeMissionId = null
    this.state.suspendedMissionId = null
    effects.push(...this.resetDetector())

    if (this.state.connected && this.state.lifecycleState !== "ERROR") {
      this.transition("ERROR", `fault: ${fault}`, timestamp)
    }
    this.logger.warn("agent fault reported", { fault })
    return { applied: true, effects }
  }

  private applyDisarmTimeout(timestamp: number): Applied {
    const mission = this.mission
    if (!mission || mission.origin !== "detected" || this.state.armed || this.detector.disarmedSince === null) {
      return skipped()
    }

    const detected = this.detect(timestamp)
    const effects: ActorEffect[] = [...detected.effects]
    if (detected.decision === "ConfirmSessionEnd") {
      effects.push(...mission.complete(timestamp))
    }
    effects.push(...this.releaseIfDone(timestamp))
    return { applied: true, effects, decision: detected.decision }
  }

  private detect(timestamp: number): { decision: DetectionDecision; effects: ActorEffect[] } {
    const before = this.detector
    const result = evaluateDetection(
      {
        memory: before,
        sample: {
          timestamp,
          armed: this.state.armed,
          position: this.state.position,
          gpsFix: this.state.gpsFix,
        },
        homePosition: this.state.homePosition,
      },
      this.options.detection,
    )
    this.detector = result.memory

    const effects: ActorEffect[] = []
    if (before.disarmedSince === null && result.memory.disarmedSince !== null) {
      effects.push({ type: "armDisarmTimer", disarmedSince: result.memory.disarmedSince })
    } else if (before.disarmedSince !== null && result.memory.disarmedSince === null) {
      effects.push({ type: "cancelDisarmTimer" })
    }
    return { decision: result.decision, effects }
  }

  private startDetectedMission(timestamp: number): void {
    const missionId = this.nextMissionId()
    const startTime = this.detector.candidateSince ?? timestamp
    this.mission = MissionStateMachine.detected(missionId, this.agentId, startTime, this.state, this.options.mission)
    this.state.activeMissionId = missionId
    this.transition("IN_MISSION", "session.started", timestamp, {
      missionId,
      startPosition: this.detector.startPosition,
      homePosition: this.state.homePosition,
      attributes: this.state.attributes,
    })
  }

  // -------------------------------------------------------------------------
  // Connectivity
  // -------------------------------------------------------------------------

  private applyConnectivity(event: ConnectivityChange): Applied {
    const { timestamp, connected } = event
    if (connected === this.state.connected) return skipped()
    if (this.state.lastEventAt === null || timestamp > this.state.lastEventAt) {
      this.state.lastEventAt = timestamp
    }
    this.state.connected = connected

    return connected ? this.reconnect(timestamp) : this.disconnect(timestamp)
  }

  private disconnect(timestamp: number): Applied {
    const effects: ActorEffect[] = []
    const mission = this.mission

    if (mission && !mission.isTerminal) {
      mission.suspend(timestamp)
      this.suspended = mission
      this.state.suspendedMissionId = mission.missionId
      effects.push({ type: "startGrace", missionId: mission.missionId, suspendedAt: timestamp })
    } else if (this.detector.phase === "CANDIDATE") {
      effects.push(...this.resetDetector())
    }
    this.mission = null
    this.state.activeMissionId = null

    this.transition("OFFLINE", "link lost", timestamp)
    return { applied: true, effects }
  }

  private reconnect(timestamp: number): Applied {
    if (this.state.faultReason !== null) {
      this.transition("ERROR", `fault: ${this.state.faultReason}`, timestamp)
      return { applied: true, effects: [] }
    }

    const mission = this.suspended
    if (mission) {
      this.suspended = null
      this.mission = mission
      this.state.suspendedMissionId = null
      this.state.activeMissionId = mission.missionId
      this.transition("IN_MISSION", "link restored within grace window", timestamp)
      return { applied: true, effects: [{ type: "cancelGrace" }, ...mission.resume()] }
    }

    this.transition("ONLINE_IDLE", "link established", timestamp)
    return { applied: true, effects: [] }
  }

  // -------------------------------------------------------------------------
  // Operator signals
  // -------------------------------------------------------------------------

  private applySignal(event: OperatorSignalEvent): Applied {
    const { signal, timestamp } = event
    switch (signal.type) {
      case "Assign":
        return this.applyAssign(signal.plan, timestamp)

      case "Approve": {
        const mission = this.mission
        if (!mission || mission.missionId !== signal.draftId || mission.phase !== "DRAFT") {
          return { applied: false, effects: [], approval: { status: "NoSuchDraft", draftId: signal.draftId } }
        }
        mission.approve()
        return {
          applied: true,
          effects: [{ type: "validate", missionId: mission.missionId }],
          approval: { status: "Applied", missionId: mission.missionId, phase: mission.phase },
        }
      }

      case "Reject": {
        const mission = this.mission
        if (!mission || mission.missionId !== signal.draftId || mission.phase !== "DRAFT") {
          return { applied: false, effects: [], approval: { status: "NoSuchDraft", draftId: signal.draftId } }
        }
        const effects: ActorEffect[] = mission.reject(signal.feedback, timestamp)
        effects.push({
          type: "feedback",
          feedback: {
            draftId: mission.missionId,
            agentId: this.agentId,
            planId: mission.plan?.planId ?? null,
            feedback: signal.feedback,
          },
        })
        const approval: DecisionResult = { status: "Applied", missionId: mission.missionId, phase: mission.phase }
        effects.push(...this.releaseIfDone(timestamp))
        return { applied: true, effects, approval }
      }

      case "EmergencyStop": {
        const effects: ActorEffect[] = []
        if (this.mission) {
          effects.push(...this.mission.emergencyStop(timestamp))
        }
        if (this.suspended) {
          effects.push(...this.suspended.emergencyStop(timestamp), { type: "cancelGrace" })
          this.suspended = null
          this.state.suspendedMissionId = null
        }
        if (effects.length === 0 && this.state.connected && this.state.armed) {
          effects.push({ type: "directive", directive: this.standaloneStop() })
        }
        effects.push(...this.releaseIfDone(timestamp))
        return { applied: effects.length > 0, effects }
      }

      case "ClearFault": {
        if (this.state.faultReason === null) return skipped()
        this.state.faultReason = null
        if (this.state.lifecycleState === "ERROR") {
          this.transition("ONLINE_IDLE", "fault cleared by operator", timestamp)
        }
        return { applied: true, effects: [] }
      }
    }
  }

  private assignNow(plan: unknown, timestamp: number | undefined): AssignResult {
    const refusal = this.refuseAssignment()
    if (refusal) return refusal

    const parsed = MissionPlanSchema.safeParse(plan)
    if (!parsed.success) {
      return { status: "ConstraintViolation", reason: `InvalidPlan: ${formatIssues(parsed.error.issues)}` }
    }

    const outcome = this.process({
      kind: "OperatorSignal",
      agentId: this.agentId,
      timestamp: timestamp ?? this.logicalNow(),
      signal: { type: "Assign", plan: parsed.data },
    })
    return outcome.assign ?? { status: "ConstraintViolation", reason: "assignment not applied" }
  }

  private refuseAssignment(): AssignResult | null {
    switch (this.state.lifecycleState) {
      case "IN_MISSION":
        return { status: "Busy", activeMissionId: this.state.activeMissionId }
      case "OFFLINE":
        return { status: "Unreachable" }
      case "ERROR":
        return { status: "ConstraintViolation", reason: "AgentFault" }
      case "ONLINE_IDLE":
      case "ONLINE_ARMED":
        return null
    }
  }

  private applyAssign(plan: MissionPlan, timestamp: number): Applied {
    const refusal = this.refuseAssignment()
    if (refusal) return { applied: false, effects: [], assign: refusal }

    const check = validatePlan(plan, this.state)
    if (check) return { applied: false, effects: [], assign: check }

    const missionId = this.nextMissionId()
    const mission = MissionStateMachine.planned(missionId, this.agentId, plan, timestamp, this.state, this.options.mission)
    const effects: ActorEffect[] = this.resetDetector()
    this.mission = mission
    this.state.activeMissionId = missionId
    this.transition("IN_MISSION", `mission ${missionId} accepted`, timestamp)

    if (mission.phase === "VALIDATING") {
      effects.push({ type: "validate", missionId })
    }
    this.logger.info("mission accepted", { missionId, planId: plan.planId, phase: mission.phase })
    return { applied: true, effects, assign: { status: "Accepted", missionId, phase: mission.phase } }
  }

  private standaloneStop(): Directive {
    return {
      commandId: `${this.agentId}:estop:${String(this.state.sequence + 1)}`,
      agentId: this.agentId,
      missionId: null,
      kind: "EMERGENCY_STOP",
      params: {},
    }
  }

  // -------------------------------------------------------------------------
  // State helpers
  // -------------------------------------------------------------------------

  private fold(telemetry: TelemetryPayload): void {
    const state = this.state
    if (telemetry.position) state.position = { ...telemetry.position }
    if (telemetry.homePosition) state.homePosition = { ...telemetry.homePosition }
    if (telemetry.battery !== undefined) state.battery = telemetry.battery
    if (telemetry.gpsFix !== undefined) state.gpsFix = telemetry.gpsFix
    if (telemetry.windMps !== undefined) state.windMps = telemetry.windMps
    if (telemetry.armed !== undefined) state.armed = telemetry.armed
  }

  /** A terminal mission holds the agent until it reports disarmed. */
  private releaseIfDone(timestamp: number): ActorEffect[] {
    const mission = this.mission
    if (!mission || !mission.isTerminal || this.state.armed || this.state.lifecycleState !== "IN_MISSION") {
      return []
    }
    this.mission = null
    this.state.activeMissionId = null
    const effects = this.resetDetector()
    this.transition("ONLINE_IDLE", `mission ${mission.phase.toLowerCase()}`, timestamp)
    return effects
  }

  private resetDetector(): ActorEffect[] {
    const hadTimer = this.detector.disarmedSince !== null
    this.detector = INITIAL_DETECTOR_MEMORY
    return hadTimer ? [{ type: "cancelDisarmTimer" }] : []
  }

  private transition(
    to: LifecycleState,
    reason: string,
    timestamp: number,
    details?: Record<string, unknown>,
  ): void {
    const from = this.state.lifecycleState
    assertValidTransition(from, to)
    this.state.lifecycleState = to
    this.pendingTransitions.push({ agentId: this.agentId, from, to, timestamp, reason, details })
    addSpanEvent("aether.lifecycle.transition", {
      [AetherAttributes.LIFECYCLE_FROM]: from,
      [AetherAttributes.LIFECYCLE_TO]: to,
      "aether.lifecycle.reason": reason,
    })
  }

  private nextMissionId(): string {
    return `${this.agentId}-${this.options.incarnation}-${String(this.state.sequence + 1)}`
  }

  private logicalNow(): number {
    return this.state.lastEventAt ?? this.now()
  }

  private restore(checkpoint: Checkpoint): void {
    this.state = structuredClone(checkpoint.agent)
    this.mission = checkpoint.mission ? this.restoreMission(checkpoint.mission) : null
    this.suspended = checkpoint.suspended ? this.restoreMission(checkpoint.suspended) : null
    this.detector = { ...checkpoint.detector }
  }

  private restoreMission(slot: MissionSlot): MissionStateMachine {
    return MissionStateMachine.restore(slot.plan, slot.execution, this.options.mission)
  }

  private commit(): void {
    this.snapshot = freezeSnapshot(this.state)
    this.deps.index.publish(indexRecord(this.state))
  }

  // -------------------------------------------------------------------------
  // Effects
  // -------------------------------------------------------------------------

  private runEffects(effects: ActorEffect[]): void {
    for (const effect of effects) {
      switch (effect.type) {
        case "directive":
          this.sendDirective(effect.directive)
          break
        case "terminal":
          this.archiveMission(effect.execution)
          break
        case "validate":
          this.post({
            kind: "ValidateMission",
            agentId: this.agentId,
            timestamp: this.logicalNow(),
            missionId: effect.missionId,
          })
          break
        case "feedback":
          this.track(this.deps.feedback.submit(effect.feedback), "plan feedback submission failed", {
            draftId: effect.feedback.draftId,
          })
          break
        case "startGrace":
          this.startGraceTimer(effect.missionId, effect.suspendedAt)
          break
        case "cancelGrace":
          this.clearGraceTimer()
          break
        case "armDisarmTimer":
          this.armDisarmTimer(effect.disarmedSince)
          break
        case "cancelDisarmTimer":
          this.clearDisarmTimer()
          break
      }
    }
  }

  /** Re-arm what replay suppressed: timers, validation and the current directive. */
  private resumeEffects(): void {
    const suspended = this.suspended
    if (suspended) {
      this.startGraceTimer(suspended.missionId, suspended.execution.suspendedAt ?? this.logicalNow())
    }

    const mission = this.mission
    if (mission?.phase === "VALIDATING") {
      this.runEffects([{ type: "validate", missionId: mission.missionId }])
    } else if (mission?.phase === "EXECUTING" && mission.origin === "planned") {
      this.runEffects(mission.resume())
    }

    if (this.detector.phase === "IN_SESSION" && this.detector.disarmedSince !== null) {
      this.armDisarmTimer(this.detector.disarmedSince)
    }
  }

  private sendDirective(directive: Directive): void {
    const priority: MessagePriority = directive.kind === "EMERGENCY_STOP" ? "emergency" : "normal"
    this.commands.send(directive, (outcome) => {
      const base = {
        agentId: this.agentId,
        timestamp: this.logicalNow(),
        missionId: directive.missionId,
        commandId: directive.commandId,
      }
      if (outcome.status === "failed") {
        this.post({ kind: "CommandFailed", ...base, detail: outcome.error.message }, priority)
      } else if (directive.kind === "ACTION") {
        this.post({ kind: "CommandAcked", ...base }, priority)
      }
    })
  }

  private archiveMission(execution: MissionExecution): void {
    this.deps.history.append({
      version: "1.0",
      timestamp: new Date().toISOString(),
      agentId: this.agentId,
      type: "MISSION_ARCHIVED",
      data: { execution },
    })
    this.track(this.deps.archive.archiveMission(execution), "mission archival failed", {
      missionId: execution.missionId,
    })
    this.logger.info("mission finished", {
      missionId: execution.missionId,
      phase: execution.phase,
      abortReason: execution.abortReason,
    })
  }

  private track(work: Promise<void>, failure: string, fields: Record<string, unknown>): void {
    const job: Promise<void> = work
      .catch((err: unknown) => {
        this.logger.error(failure, { ...fields, error: err })
      })
      .finally(() => this.background.delete(job))
    this.background.add(job)
  }

  private notify(transitions: LifecycleTransitionEvent[]): void {
    for (const event of transitions) {
      this.logger.info("lifecycle transition", {
        from: event.from,
        to: event.to,
        reason: event.reason,
      })
      for (const listener of this.listeners) {
        try {
          listener(event)
        } catch (err) {
          this.logger.error("lifecycle listener failed", {
            error: err,
          })
        }
      }
    }
  }

  private scheduleCompaction(): void {
    if (this.compactionQueued) return
    this.compactionQueued = true
    this.enqueue("background", () => this.compactNow()).catch((err: unknown) => {
      this.compactionQueued = false
      if (err instanceof EntityStoppedError) return
      this.logger.error("compaction scheduling failed", {
        error: err,
      })
    })
  }

  private compactNow(): Promise<CompactionOutcome> {
    this.compactionQueued = false
    return withSpan("aether.entity.compact", { [AetherAttributes.AGENT_ID]: this.agentId }, async (span) => {
      const outcome = this.compactor.compact(this.checkpoint())
      if (outcome.status === "compacted") {
        span.setAttribute(AetherAttributes.COMPACTION_SEGMENT, outcome.segmentNumber)
      }
      return outcome
    })
  }

  // -------------------------------------------------------------------------
  // Timers
  // -------------------------------------------------------------------------

  private startGraceTimer(missionId: string, suspendedAt: number): void {
    this.clearGraceTimer()
    const graceMs = this.options.connectivityGraceMs
    this.graceTimer = setTimeout(() => {
      this.graceTimer = null
      this.post({ kind: "GraceExpired", agentId: this.agentId, timestamp: suspendedAt + graceMs, missionId })
    }, graceMs)
  }

  private clearGraceTimer(): void {
    if (this.graceTimer !== null) {
      clearTimeout(this.graceTimer)
      this.graceTimer = null
    }
  }

  private armDisarmTimer(disarmedSince: number): void {
    const timeoutMs = this.options.detection.disarmTimeoutSec * 1000
    if (timeoutMs <= 0) return
    this.clearDisarmTimer()
    this.disarmTimer = setTimeout(() => {
      this.disarmTimer = null
      this.post({ kind: "DisarmTimeout", agentId: this.agentId, timestamp: disarmedSince + timeoutMs })
    }, timeoutMs)
  }

  private clearDisarmTimer(): void {
    if (this.disarmTimer !== null) {
      clearTimeout(this.disarmTimer)
      this.disarmTimer = null
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function validatePlan(plan: MissionPlan, state: AgentState): AssignResult | null {
  const result = validateMission(plan, state)
  return result.ok ? null : { status: "ConstraintViolation", reason: `${result.reason}: ${result.detail}` }
}

function initialState(agentId: string, attributes: AgentAttributes): AgentState {
  return {
    agentId,
    lifecycleState: "OFFLINE",
    attributes: structuredClone(attributes),
    position: null,
    homePosition: null,
    battery: null,
    gpsFix: null,
    windMps: null,
    armed: false,
    connected: false,
    activeMissionId: null,
    suspendedMissionId: null,
    faultReason: null,
    lastEventAt: null,
    sequence: 0,
  }
}

function freezeSnapshot(state: AgentState): AgentSnapshot {
  const sensors = [...state.attributes.sensors]
  Object.freeze(sensors)
  return Object.freeze({
    ...state,
    attributes: Object.freeze({ ...state.attributes, sensors }),
    position: state.position ? Object.freeze({ ...state.position }) : null,
    homePosition: state.homePosition ? Object.freeze({ ...state.homePosition }) : null,
  })
}

function indexRecord(state: AgentState): IndexRecord {
  return {
    agentId: state.agentId,
    lifecycleState: state.lifecycleState,
    connected: state.connected,
    sensors: state.attributes.sensors,
    maxRangeMeters: state.attributes.maxRangeMeters,
    payloadCapacityKg: state.attributes.payloadCapacityKg,
    serviceArea: state.attributes.serviceArea,
    position: state.position,
    battery: state.battery,
    updatedAt: state.lastEventAt,
  }
}

function missionSlot(mission: MissionStateMachine): MissionSlot {
  return { plan: mission.plan, execution: mission.execution }
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")
}
