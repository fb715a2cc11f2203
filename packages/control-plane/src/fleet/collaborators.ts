/**
 * Interfaces of the systems the orchestrator talks to. Each has a
 * production implementation in this package and an in-memory stand-in in
 * the tests.
 */

import type { AgentAttributes, Directive, DirectiveAck, MissionExecution } from "@aether/shared/fleet"

/** Delivers directives to a vehicle and returns its acknowledgement. */
export interface TransportLink {
  send(directive: Directive, signal?: AbortSignal): Promise<DirectiveAck>
}

export interface PlanFeedback {
  draftId: string
  agentId: string
  planId: string | null
  feedback: string
}

/** Receives operator rejections so the planner can revise the plan. */
export interface PlanFeedbackSink {
  submit(feedback: PlanFeedback): Promise<void>
}

export interface ArchivedSegment {
  agentId: string
  segmentName: string
  content: string
}

/** Long-term store for finished missions and superseded history segments. */
export interface MissionArchive {
  archiveMission(execution: MissionExecution): Promise<void>
  getMission(missionId: string): Promise<MissionExecution | null>
  storeSegment(segment: ArchivedSegment): Promise<void>
}

export interface EnrolledDrone {
  agentId: string
  attributes: AgentAttributes
  enrolledAt: Date
}

/** Enrollment records; the source of truth for which actors exist. */
export interface DroneRegistry {
  /** Throws AgentAlreadyEnrolledError when the id is taken. */
  enroll(agentId: string, attributes: AgentAttributes): Promise<EnrolledDrone>
  list(): Promise<EnrolledDrone[]>
  remove(agentId: string): Promise<boolean>
}
