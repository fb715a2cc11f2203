/**
 * Mission requests: a plan plus a dispatch query, resolved to an agent by
 * the `mission_dispatch` worker task.
 */

import { type DispatchQuery, DispatchQuerySchema } from "@aether/shared/fleet"
import type { Kysely } from "kysely"

import type { Database, MissionRequestRow, MissionRequestStatus } from "../db/types.js"

export interface MissionRequest {
  id: string
  status: MissionRequestStatus
  plan: unknown
  query: DispatchQuery
  attempts: number
  agentId: string | null
  missionId: string | null
  lastError: string | null
  createdAt: Date
  updatedAt: Date
}

export interface MissionRequestStore {
  create(plan: unknown, query: DispatchQuery): Promise<MissionRequest>
  get(id: string): Promise<MissionRequest | null>
  /** Count one unsuccessful dispatch attempt. */
  recordAttempt(id: string, outcome: string): Promise<void>
  markAssigned(id: string, agentId: string, missionId: string): Promise<void>
  markFailed(id: string, error: string): Promise<void>
}

export class KyselyMissionRequestStore implements MissionRequestStore {
  constructor(private readonly db: Kysely<Database>) {}

  async create(plan: unknown, query: DispatchQuery): Promise<MissionRequest> {
    const row = await this.db
      .insertInto("mission_request")
      .values({ plan: JSON.stringify(plan), query: JSON.stringify(query) })
      .returningAll()
      .executeTakeFirstOrThrow()
    return toMissionRequest(row)
  }

  async get(id: string): Promise<MissionRequest | null> {
    const row = await this.db.selectFrom("mission_request").selectAll().where("id", "=", id).executeTakeFirst()
    return row ? toMissionRequest(row) : null
  }

  async recordAttempt(id: string, outcome: string): Promise<void> {
    await this.db
      .updateTable("mission_request")
      .set((eb) => ({
        attempts: eb("attempts", "+", 1),
        last_error: outcome,
        updated_at: new Date(),
      }))
      .where("id", "=", id)
      .execute()
  }

  async markAssigned(id: string, agentId: string, missionId: string): Promise<void> {
    await this.db
      .updateTable("mission_request")
      .set({ status: "ASSIGNED", agent_id: agentId, mission_id: missionId, updated_at: new Date() })
      .where("id", "=", id)
      .where("status", "=", "PENDING")
      .execute()
  }

  async markFailed(id: string, error: string): Promise<void> {
    await this.db
      .updateTable("mission_request")
      .set({ status: "FAILED", last_error: error, updated_at: new Date() })
      .where("id", "=", id)
      .where("status", "=", "PENDING")
      .execute()
  }
}

function toMissionRequest(row: MissionRequestRow): MissionRequest {
  return {
    id: row.id,
    status: row.status,
    plan: row.plan,
    query: DispatchQuerySchema.parse(row.query),
    attempts: row.attempts,
    agentId: row.agent_id,
    missionId: row.mission_id,
    lastError: row.last_error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}
