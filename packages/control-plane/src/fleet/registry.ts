/**
 * PostgreSQL implementations of the fleet collaborators.
 */

import type { AgentAttributes, MissionExecution } from "@aether/shared/fleet"
import type { Kysely } from "kysely"

import type { Database, Drone } from "../db/types.js"
import { MissionExecutionSchema } from "../entity/checkpoint.js"
import { AgentAlreadyEnrolledError } from "../errors.js"
import type {
  ArchivedSegment,
  DroneRegistry,
  EnrolledDrone,
  MissionArchive,
  PlanFeedback,
  PlanFeedbackSink,
} from "./collaborators.js"

// ---------------------------------------------------------------------------
// DroneRegistry
// ---------------------------------------------------------------------------

export class KyselyDroneRegistry implements DroneRegistry {
  constructor(private readonly db: Kysely<Database>) {}

  async enroll(agentId: string, attributes: AgentAttributes): Promise<EnrolledDrone> {
    const row = await this.db
      .insertInto("drone")
      .values({
        agent_id: agentId,
        sensors: JSON.stringify(attributes.sensors),
        max_range_m: attributes.maxRangeMeters,
        payload_capacity_kg: attributes.payloadCapacityKg,
        service_area: attributes.serviceArea,
      })
      .onConflict((oc) => oc.column("agent_id").doNothing())
      .returningAll()
      .executeTakeFirst()

    if (!row) throw new AgentAlreadyEnrolledError(agentId)
    return toEnrolledDrone(row)
  }

  async list(): Promise<EnrolledDrone[]> {
    const rows = await this.db.selectFrom("drone").selectAll().orderBy("agent_id").execute()
    return rows.map(toEnrolledDrone)
  }

  async remove(agentId: string): Promise<boolean> {
    const result = await this.db.deleteFrom("drone").where("agent_id", "=", agentId).executeTakeFirst()
    return result.numDeletedRows > 0n
  }
}

function toEnrolledDrone(row: Drone): EnrolledDrone {
  return {
    agentId: row.agent_id,
    attributes: {
      sensors: row.sensors,
      maxRangeMeters: row.max_range_m,
      payloadCapacityKg: row.payload_capacity_kg,
      serviceArea: row.service_area,
    },
    enrolledAt: row.enrolled_at,
  }
}

// ---------------------------------------------------------------------------
// MissionArchive
// ---------------------------------------------------------------------------

export class KyselyMissionArchive implements MissionArchive {
  constructor(private readonly db: Kysely<Database>) {}

  async archiveMission(execution: MissionExecution): Promise<void> {
    const row = {
      agent_id: execution.agentId,
      origin: execution.origin,
      plan_id: execution.planId,
      phase: execution.phase,
      abort_reason: execution.abortReason,
      abort_detail: execution.abortDetail,
      start_time_ms: execution.startTime,
      end_time_ms: execution.endTime,
      execution: JSON.stringify(execution),
    }
    await this.db
      .insertInto("mission_record")
      .values({ mission_id: execution.missionId, ...row })
      .onConflict((oc) => oc.column("mission_id").doUpdateSet({ ...row, archived_at: new Date() }))
      .execute()
  }

  async getMission(missionId: string): Promise<MissionExecution | null> {
    const row = await this.db
      .selectFrom("mission_record")
      .select("execution")
      .where("mission_id", "=", missionId)
      .executeTakeFirst()
    if (!row) return null

    const parsed = MissionExecutionSchema.safeParse(row.execution)
    return parsed.success ? parsed.data : null
  }

  async storeSegment(segment: ArchivedSegment): Promise<void> {
    await this.db
      .insertInto("history_blob")
      .values({
        agent_id: segment.agentId,
        segment_name: segment.segmentName,
        content: segment.content,
      })
      .onConflict((oc) =>
        oc.columns(["agent_id", "segment_name"]).doUpdateSet({
          content: segment.content,
          archived_at: new Date(),
        }),
      )
      .execute()
  }
}

// ---------------------------------------------------------------------------
// PlanFeedbackSink
// ---------------------------------------------------------------------------

export class KyselyPlanFeedbackSink implements PlanFeedbackSink {
  constructor(private readonly db: Kysely<Database>) {}

  async submit(feedback: PlanFeedback): Promise<void> {
    await this.db
      .insertInto("plan_feedback")
      .values({
        draft_id: feedback.draftId,
        agent_id: feedback.agentId,
        plan_id: feedback.planId,
        feedback: feedback.feedback,
      })
      .execute()
  }
}
