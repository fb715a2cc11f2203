import type { ColumnType, Generated, Insertable, Selectable, Updateable } from "kysely"

// ---------------------------------------------------------------------------
// Enum: mission_request_status
// ---------------------------------------------------------------------------
export type MissionRequestStatus = "PENDING" | "ASSIGNED" | "FAILED"

// ---------------------------------------------------------------------------
// Table: drone
// ---------------------------------------------------------------------------
export interface DroneTable {
  agent_id: string
  /** jsonb array; written as a JSON string. */
  sensors: ColumnType<string[], string, string>
  max_range_m: number
  payload_capacity_kg: number
  service_area: string
  enrolled_at: ColumnType<Date, Date | undefined, never>
}

export type Drone = Selectable<DroneTable>
export type NewDrone = Insertable<DroneTable>

// ---------------------------------------------------------------------------
// Table: mission_record
// ---------------------------------------------------------------------------
export interface MissionRecordTable {
  mission_id: string
  agent_id: string
  origin: string
  plan_id: string | null
  phase: string
  abort_reason: string | null
  abort_detail: string | null
  start_time_ms: number
  end_time_ms: number | null
  /** Full MissionExecution, validated on read. */
  execution: ColumnType<unknown, string, string>
  archived_at: ColumnType<Date, Date | undefined, Date>
}

export type MissionRecord = Selectable<MissionRecordTable>
export type NewMissionRecord = Insertable<MissionRecordTable>

// ---------------------------------------------------------------------------
// Table: history_blob
// ---------------------------------------------------------------------------
export interface HistoryBlobTable {
  id: Generated<string>
  agent_id: string
  segment_name: string
  content: string
  archived_at: ColumnType<Date, Date | undefined, Date>
}

export type HistoryBlob = Selectable<HistoryBlobTable>

// ---------------------------------------------------------------------------
// Table: plan_feedback
// ---------------------------------------------------------------------------
export interface PlanFeedbackTable {
  id: Generated<string>
  draft_id: string
  agent_id: string
  plan_id: string | null
  feedback: string
  created_at: ColumnType<Date, Date | undefined, never>
}

export type PlanFeedbackRow = Selectable<PlanFeedbackTable>

// ---------------------------------------------------------------------------
// Table: mission_request
// ---------------------------------------------------------------------------
export interface MissionRequestTable {
  id: Generated<string>
  status: ColumnType<MissionRequestStatus, MissionRequestStatus | undefined, MissionRequestStatus>
  /** Opaque plan document, validated when assigned. */
  plan: ColumnType<unknown, string, string>
  query: ColumnType<unknown, string, string>
  attempts: ColumnType<number, number | undefined, number>
  agent_id: string | null
  mission_id: string | null
  last_error: string | null
  created_at: ColumnType<Date, Date | undefined, never>
  updated_at: ColumnType<Date, Date | undefined, Date>
}

export type MissionRequestRow = Selectable<MissionRequestTable>
export type NewMissionRequest = Insertable<MissionRequestTable>
export type MissionRequestUpdate = Updateable<MissionRequestTable>

// ---------------------------------------------------------------------------
// Database schema
// ---------------------------------------------------------------------------
export interface Database {
  drone: DroneTable
  mission_record: MissionRecordTable
  history_blob: HistoryBlobTable
  plan_feedback: PlanFeedbackTable
  mission_request: MissionRequestTable
}
