/**
 * Checkpoint format: everything an actor needs to resume without replaying
 * its full history. Parsed with zod on recovery.
 */

import {
  AgentAttributesSchema,
  GeoPointSchema,
  LifecycleStateSchema,
  MissionPhaseSchema,
  MissionPlanSchema,
} from "@aether/shared/fleet"
import { z } from "zod"

export const AbortReasonSchema = z.enum([
  "ValidationFailure",
  "ConstraintBreach",
  "CommandTimeout",
  "ConnectivityTimeout",
  "EmergencyStop",
  "Rejected",
  "Decommissioned",
])

export const AgentStateSchema = z.object({
  agentId: z.string().min(1),
  lifecycleState: LifecycleStateSchema,
  attributes: AgentAttributesSchema,
  position: GeoPointSchema.nullable(),
  homePosition: GeoPointSchema.nullable(),
  battery: z.number().nullable(),
  gpsFix: z.number().nullable(),
  windMps: z.number().nullable(),
  armed: z.boolean(),
  connected: z.boolean(),
  activeMissionId: z.string().nullable(),
  suspendedMissionId: z.string().nullable(),
  faultReason: z.string().nullable(),
  lastEventAt: z.number().nullable(),
  sequence: z.number().int().nonnegative(),
})

export const MissionExecutionSchema = z.object({
  missionId: z.string().min(1),
  agentId: z.string().min(1),
  origin: z.enum(["planned", "detected"]),
  planId: z.string().nullable(),
  phase: MissionPhaseSchema,
  currentStepIndex: z.number().int().nonnegative(),
  startTime: z.number(),
  endTime: z.number().nullable(),
  abortReason: AbortReasonSchema.nullable(),
  abortDetail: z.string().nullable(),
  metrics: z.object({
    distanceMeters: z.number(),
    maxAltitudeMeters: z.number(),
    batteryConsumed: z.number(),
    durationSec: z.number(),
  }),
  startBattery: z.number().nullable(),
  lastPosition: GeoPointSchema.nullable(),
  suspendedAt: z.number().nullable(),
})

export const MissionSlotSchema = z.object({
  plan: MissionPlanSchema.nullable(),
  execution: MissionExecutionSchema,
})

export type MissionSlot = z.infer<typeof MissionSlotSchema>

export const DetectorMemorySchema = z.object({
  phase: z.enum(["IDLE", "CANDIDATE", "IN_SESSION"]),
  candidateSince: z.number().nullable(),
  startPosition: GeoPointSchema.nullable(),
  maxDistanceMeters: z.number(),
  disarmedSince: z.number().nullable(),
})

export const CheckpointSchema = z.object({
  agent: AgentStateSchema,
  mission: MissionSlotSchema.nullable(),
  suspended: MissionSlotSchema.nullable(),
  detector: DetectorMemorySchema,
  appliedSequence: z.number().int().nonnegative(),
})

export type Checkpoint = z.infer<typeof CheckpointSchema>
