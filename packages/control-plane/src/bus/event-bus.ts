/**
 * EventBus: validates inbound fleet events and routes each one to the
 * actor that owns its agent.
 *
 * Per-agent order is arrival order: `publish()` enqueues into the actor's
 * mailbox before its first await. There is no ordering across agents.
 *
 * Idle agents stream a lot of identical disarmed telemetry. While an agent
 * sits in ONLINE_IDLE and was last seen disarmed, further disarmed updates
 * are dropped at ingress, except those carrying a fault or a home position
 * and one refresh per `idleRefreshMs` so battery and fix stay current.
 */

import { type FleetEvent, FleetEventSchema, type TelemetryUpdate } from "@aether/shared/fleet"
import type { TracingLogger } from "@aether/shared/tracing"

import type { EntityStateMachine, HandleOutcome } from "../entity/index.js"
import { EventValidationError, UnknownAgentError } from "../errors.js"

export type PublishResult =
  | { status: "forwarded"; outcome: HandleOutcome }
  | { status: "suppressed"; agentId: string }

export interface EntityResolver {
  get(agentId: string): EntityStateMachine | undefined
}

export interface EventBusOptions {
  suppression: boolean
  idleRefreshMs: number
}

interface IngressMemory {
  armed: boolean
  lastForwardedAt: number | null
}

export class EventBus {
  private readonly resolver: EntityResolver
  private readonly options: EventBusOptions
  private readonly logger: TracingLogger
  private readonly memory = new Map<string, IngressMemory>()
  private suppressed = 0

  constructor(resolver: EntityResolver, options: EventBusOptions, logger: TracingLogger) {
    this.resolver = resolver
    this.options = options
    this.logger = logger
  }

  /**
   * Validate `raw` and hand it to the owning actor.
   * Throws EventValidationError or UnknownAgentError.
   */
  async publish(raw: unknown): Promise<PublishResult> {
    const parsed = FleetEventSchema.safeParse(raw)
    if (!parsed.success) {
      throw new EventValidationError(parsed.error.issues)
    }
    const event: FleetEvent = parsed.data

    const actor = this.resolver.get(event.agentId)
    if (!actor) {
      throw new UnknownAgentError(event.agentId)
    }

    if (event.kind === "TelemetryUpdate" && this.shouldSuppress(actor, event)) {
      this.suppressed++
      this.logger.debug("telemetry suppressed", { agentId: event.agentId, timestamp: event.timestamp })
      return { status: "suppressed", agentId: event.agentId }
    }

    const outcome = await actor.handle(event)
    return { status: "forwarded", outcome }
  }

  /** Drop ingress memory for a decommissioned agent. */
  forget(agentId: string): void {
    this.memory.delete(agentId)
  }

  get suppressedCount(): number {
    return this.suppressed
  }

  private shouldSuppress(actor: EntityStateMachine, event: TelemetryUpdate): boolean {
    const { telemetry } = event
    const memory = this.memory.get(event.agentId) ?? { armed: actor.query().armed, lastForwardedAt: null }
    this.memory.set(event.agentId, memory)

    const suppress =
      this.options.suppression &&
      actor.query().lifecycleState === "ONLINE_IDLE" &&
      !memory.armed &&
      telemetry.armed !== true &&
      telemetry.fault === undefined &&
      telemetry.homePosition === undefined &&
      memory.lastForwardedAt !== null &&
      event.timestamp - memory.lastForwardedAt < this.options.idleRefreshMs

    if (!suppress) {
      if (telemetry.armed !== undefined) memory.armed = telemetry.armed
      memory.lastForwardedAt = event.timestamp
    }
    return suppress
  }
}
