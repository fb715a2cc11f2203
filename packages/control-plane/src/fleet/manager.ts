/**
 * FleetManager: owns every entity actor and the surfaces shared across them.
 *
 * - enroll / decommission / start: actor lifecycle, backed by the registry
 * - publish: event ingestion through the EventBus
 * - assignMission / signal: operator surface, routed to one actor
 * - getAgentState / getMissionStatus / findAgent: read-only queries
 * - compactDue / shutdown: housekeeping for the worker and the process
 */

import { rmSync } from "node:fs"
import { basename, dirname, resolve } from "node:path"

import type {
  AgentAttributes,
  AgentSnapshot,
  AssignResult,
  DispatchQuery,
  DispatchResult,
  MissionExecution,
  MissionStatus,
  OperatorSignal,
} from "@aether/shared/fleet"
import { HistoryWriter } from "@aether/shared/history"
import type { TracingLogger } from "@aether/shared/tracing"

import { EventBus, type PublishResult } from "../bus/event-bus.js"
import { type Config, detectionProfileFor } from "../config.js"
import { FleetDispatcher } from "../dispatch/dispatcher.js"
import { FleetIndex } from "../dispatch/fleet-index.js"
import {
  type CompactionAlert,
  EntityStateMachine,
  type HandleOutcome,
  type LifecycleListener,
  loadEntityHistory,
} from "../entity/index.js"
import { InvalidAgentIdError, UnknownAgentError } from "../errors.js"
import type {
  DroneRegistry,
  EnrolledDrone,
  MissionArchive,
  PlanFeedbackSink,
  TransportLink,
} from "./collaborators.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FleetConfig = Pick<
  Config,
  "historyDir" | "compaction" | "detection" | "commands" | "mission" | "telemetry"
>

export interface FleetManagerDeps {
  registry: DroneRegistry
  archive: MissionArchive
  feedback: PlanFeedbackSink
  transport: TransportLink
  config: FleetConfig
  logger: TracingLogger
  index?: FleetIndex
  now?: () => number
  onLifecycleEvent?: LifecycleListener
  onAlert?: (alert: CompactionAlert) => void
}

export type MissionLookup =
  | { source: "live"; status: MissionStatus }
  | { source: "archive"; execution: MissionExecution }

export interface CompactionSweep {
  compacted: number
  failed: number
}

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export class FleetManager {
  readonly index: FleetIndex
  readonly bus: EventBus
  private readonly dispatcher: FleetDispatcher
  private readonly deps: FleetManagerDeps
  private readonly logger: TracingLogger
  private readonly actors = new Map<string, EntityStateMachine>()

  constructor(deps: FleetManagerDeps) {
    this.deps = deps
    this.logger = deps.logger
    this.index = deps.index ?? new FleetIndex()
    this.dispatcher = new FleetDispatcher(this.index)
    this.bus = new EventBus(this.actors, deps.config.telemetry, deps.logger)
  }

  // -------------------------------------------------------------------------
  // Actor lifecycle
  // -------------------------------------------------------------------------

  /** Start an actor for every enrolled drone, recovering it from history. */
  async start(): Promise<number> {
    const drones = await this.deps.registry.list()
    for (const drone of drones) {
      if (this.actors.has(drone.agentId)) continue
      try {
        this.spawn(drone)
      } catch (err) {
        this.logger.error("entity recovery failed", {
          agentId: drone.agentId,
          error: err instanceof Error ? err.message : String(err),
        })
      }
    }
    this.logger.info("fleet started", { agents: this.actors.size, enrolled: drones.length })
    return this.actors.size
  }

  /** Throws AgentAlreadyEnrolledError when the id is taken. */
  async enroll(agentId: string, attributes: AgentAttributes): Promise<AgentSnapshot> {
    const historyPath = this.historyPath(agentId)
    const drone = await this.deps.registry.enroll(agentId, attributes)
    // A previous enrollment under the same id must not be recovered.
    rmSync(historyPath, { recursive: true, force: true })
    const actor = this.spawn(drone)
    this.logger.info("agent enrolled", { agentId, serviceArea: attributes.serviceArea })
    return actor.query()
  }

  /** Abort any mission, stop the actor and forget the agent. */
  async decommission(agentId: string): Promise<void> {
    const actor = this.require(agentId)
    await actor.decommission()
    this.actors.delete(agentId)
    this.bus.forget(agentId)
    await this.deps.registry.remove(agentId)
    rmSync(this.historyPath(agentId), { recursive: true, force: true })
    this.logger.info("agent decommissioned", { agentId })
  }

  /** Stop every actor, writing a final checkpoint for each. */
  async shutdown(): Promise<void> {
    const actors = [...this.actors.values()]
    this.actors.clear()
    const results = await Promise.allSettled(actors.map((a) => a.stop()))
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        this.logger.error("entity stop failed", {
          agentId: actors[i]?.agentId,
          error: result.reason,
        })
      }
    })
  }

  // -------------------------------------------------------------------------
  // Signals
  // -------------------------------------------------------------------------

  publish(raw: unknown): Promise<PublishResult> {
    return this.bus.publish(raw)
  }

  assignMission(agentId: string, plan: unknown): Promise<AssignResult> {
    return this.require(agentId).assignMission(plan)
  }

  signal(agentId: string, signal: OperatorSignal): Promise<HandleOutcome> {
    return this.require(agentId).signal(signal)
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  get(agentId: string): EntityStateMachine | undefined {
    return this.actors.get(agentId)
  }

  /** Throws UnknownAgentError. */
  require(agentId: string): EntityStateMachine {
    const actor = this.actors.get(agentId)
    if (!actor) throw new UnknownAgentError(agentId)
    return actor
  }

  getAgentState(agentId: string): AgentSnapshot {
    return this.require(agentId).query()
  }

  listAgents(): AgentSnapshot[] {
    return [...this.actors.values()]
      .map((a) => a.query())
      .sort((a, b) => a.agentId.localeCompare(b.agentId))
  }

  /** Live status of an active or suspended mission, else its archived record. */
  async getMissionStatus(missionId: string): Promise<MissionLookup | null> {
    for (const actor of this.actors.values()) {
      const status = actor.missionStatus(missionId)
      if (status) return { source: "live", status }
    }
    const execution = await this.deps.archive.getMission(missionId)
    return execution ? { source: "archive", execution } : null
  }

  findAgent(query: DispatchQuery): DispatchResult {
    return this.dispatcher.find(query)
  }

  get size(): number {
    return this.actors.size
  }

  // -------------------------------------------------------------------------
  // Housekeeping
  // -------------------------------------------------------------------------

  /** Compact every actor whose threshold or interval has been reached. */
  async compactDue(): Promise<CompactionSweep> {
    const outcomes = await Promise.allSettled([...this.actors.values()].map((a) => a.compactIfDue()))
    const sweep: CompactionSweep = { compacted: 0, failed: 0 }
    for (const outcome of outcomes) {
      if (outcome.status === "rejected" || outcome.value?.status === "failed") {
        sweep.failed++
      } else if (outcome.value?.status === "compacted") {
        sweep.compacted++
      }
    }
    return sweep
  }

  /**
   * The agent's history directory. Throws InvalidAgentIdError unless it is
   * a direct child of the history root.
   */
  private historyPath(agentId: string): string {
    const root = resolve(this.deps.config.historyDir)
    const path = resolve(root, agentId)
    if (dirname(path) !== root || basename(path) !== agentId) {
      throw new InvalidAgentIdError(agentId)
    }
    return path
  }

  private spawn(drone: EnrolledDrone): EntityStateMachine {
    const { config } = this.deps
    const { agentId, attributes } = drone
    const logger = this.logger

    this.historyPath(agentId)
    const history = loadEntityHistory(config.historyDir, agentId, logger)
    const actor = new EntityStateMachine(
      agentId,
      attributes,
      {
        index: this.index,
        transport: this.deps.transport,
        archive: this.deps.archive,
        feedback: this.deps.feedback,
        history: new HistoryWriter(config.historyDir, agentId),
        logger,
        now: this.deps.now,
      },
      {
        incarnation: drone.enrolledAt.getTime().toString(36),
        detection: detectionProfileFor(config.detection, attributes.serviceArea),
        commands: config.commands,
        mission: config.mission,
        connectivityGraceMs: config.mission.connectivityGraceMs,
        compaction: config.compaction,
        onAlert: this.deps.onAlert,
      },
    )

    actor.onTransition((event) => {
      if (event.reason === "session.started") {
        logger.info("session.started", { agentId: event.agentId, ...event.details })
      }
    })
    if (this.deps.onLifecycleEvent) {
      actor.onTransition(this.deps.onLifecycleEvent)
    }

    actor.recover(history)
    this.actors.set(agentId, actor)
    return actor
  }
}
