import { z } from "zod"

// ──────────────────────────────────────────────────
// Enumerations
// ──────────────────────────────────────────────────

export const LifecycleStateSchema = z.enum([
  "OFFLINE",
  "ONLINE_IDLE",
  "ONLINE_ARMED",
  "IN_MISSION",
  "ERROR",
])

export type LifecycleState = z.infer<typeof LifecycleStateSchema>

export const MissionPhaseSchema = z.enum(["DRAFT", "VALIDATING", "EXECUTING", "COMPLETED", "ABORTED"])

export type MissionPhase = z.infer<typeof MissionPhaseSchema>

export const BreachActionSchema = z.enum(["RTL", "LAND", "HOLD"])

export type BreachAction = z.infer<typeof BreachActionSchema>

// ──────────────────────────────────────────────────
// Geometry
// ──────────────────────────────────────────────────

export const GeoPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  /** Metres above the launch point. */
  alt: z.number().optional(),
})

export type GeoPoint = z.infer<typeof GeoPointSchema>

// ──────────────────────────────────────────────────
// Agent attributes: fixed at enrollment
// ──────────────────────────────────────────────────

export const AgentAttributesSchema = z.object({
  sensors: z.array(z.string().min(1)).max(32),
  maxRangeMeters: z.number().nonnegative(),
  payloadCapacityKg: z.number().nonnegative(),
  serviceArea: z.string().min(1),
})

export type AgentAttributes = z.infer<typeof AgentAttributesSchema>

// ──────────────────────────────────────────────────
// Mission plan: produced by the planner, never mutated here
// ──────────────────────────────────────────────────

export const RouteStepSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("takeoff"),
    altitude: z.number().positive(),
  }),
  z.object({
    type: z.literal("waypoint"),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
    alt: z.number().nonnegative(),
    holdSec: z.number().nonnegative().optional(),
    speedMps: z.number().positive().optional(),
  }),
  z.object({
    type: z.literal("action"),
    name: z.string().min(1),
    params: z.record(z.string(), z.unknown()).optional(),
  }),
  z.object({
    type: z.literal("land"),
  }),
])

export type RouteStep = z.infer<typeof RouteStepSchema>

export const MissionConstraintsSchema = z.object({
  minBatteryStart: z.number().min(0).max(100).default(0),
  /** In-flight floor; dropping below it forces a return. */
  minBatteryReserve: z.number().min(0).max(100).default(15),
  maxWindMps: z.number().positive().optional(),
  maxDurationSec: z.number().positive().optional(),
  requiredSensors: z.array(z.string().min(1)).default([]),
  minGpsFix: z.number().int().min(0).max(6).default(3),
})

export type MissionConstraints = z.infer<typeof MissionConstraintsSchema>

export const GeofenceSchema = z.object({
  polygon: z.array(GeoPointSchema).min(3),
  maxAltitudeMeters: z.number().positive(),
  breachAction: BreachActionSchema.default("RTL"),
})

export type Geofence = z.infer<typeof GeofenceSchema>

export const MissionPlanSchema = z
  .object({
    planId: z.string().min(1).max(128),
    constraints: MissionConstraintsSchema,
    geofence: GeofenceSchema,
    route: z.array(RouteStepSchema).min(2).max(500),
    emergencyRallyPoint: GeoPointSchema,
    requiresApproval: z.boolean().default(false),
  })
  .superRefine((plan, ctx) => {
    if (plan.route[0]?.type !== "takeoff") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["route", 0],
        message: "route must start with a takeoff step",
      })
    }
    if (plan.route[plan.route.length - 1]?.type !== "land") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["route", plan.route.length - 1],
        message: "route must end with a land step",
      })
    }
  })

export type MissionPlan = z.infer<typeof MissionPlanSchema>

// ──────────────────────────────────────────────────
// Events: one ordered stream per agent
// ──────────────────────────────────────────────────

export const TelemetryPayloadSchema = z.object({
  position: GeoPointSchema.optional(),
  battery: z.number().min(0).max(100).optional(),
  armed: z.boolean().optional(),
  /** GPS fix type: 0 none, 2 2D, 3 3D, 4+ DGPS/RTK. */
  gpsFix: z.number().int().min(0).max(6).optional(),
  windMps: z.number().nonnegative().optional(),
  /** Hardware fault report; presence moves the agent to ERROR. */
  fault: z.string().min(1).optional(),
  homePosition: GeoPointSchema.optional(),
})

export type TelemetryPayload = z.infer<typeof TelemetryPayloadSchema>

export const OperatorSignalSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Assign"), plan: MissionPlanSchema }),
  z.object({ type: z.literal("Approve"), draftId: z.string().min(1) }),
  z.object({ type: z.literal("Reject"), draftId: z.string().min(1), feedback: z.string().max(4000) }),
  z.object({ type: z.literal("EmergencyStop") }),
  z.object({ type: z.literal("ClearFault") }),
])

export type OperatorSignal = z.infer<typeof OperatorSignalSchema>

const eventBase = {
  agentId: z.string().min(1),
  /** Logical timestamp (ms) ordering events within one agent's stream. */
  timestamp: z.number().int().nonnegative(),
}

export const FleetEventSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("TelemetryUpdate"), ...eventBase, telemetry: TelemetryPayloadSchema }),
  z.object({ kind: z.literal("ConnectivityChange"), ...eventBase, connected: z.boolean() }),
  z.object({ kind: z.literal("OperatorSignal"), ...eventBase, signal: OperatorSignalSchema }),
])

export type FleetEvent = z.infer<typeof FleetEventSchema>
export type TelemetryUpdate = Extract<FleetEvent, { kind: "TelemetryUpdate" }>
export type ConnectivityChange = Extract<FleetEvent, { kind: "ConnectivityChange" }>
export type OperatorSignalEvent = Extract<FleetEvent, { kind: "OperatorSignal" }>

// ──────────────────────────────────────────────────
// Detection profile: supplied per deployment / tenant
// ──────────────────────────────────────────────────

export const DetectionProfileSchema = z.object({
  minFlightDurationSec: z.number().nonnegative().default(30),
  minDistanceMeters: z.number().nonnegative().default(10),
  requireGpsLock: z.boolean().default(true),
  minGpsFix: z.number().int().min(0).max(6).default(3),
  /** Seconds a detected session may stay disarmed before it ends. 0 ends it on disarm. */
  disarmTimeoutSec: z.number().nonnegative().default(0),
})

export type DetectionProfile = z.infer<typeof DetectionProfileSchema>

// ──────────────────────────────────────────────────
// Dispatch query
// ──────────────────────────────────────────────────

export const DispatchQuerySchema = z.object({
  requiredSensors: z.array(z.string().min(1)).default([]),
  minRangeMeters: z.number().nonnegative().optional(),
  minPayloadKg: z.number().nonnegative().optional(),
  requiredState: LifecycleStateSchema.default("ONLINE_IDLE"),
  serviceArea: z.string().min(1).optional(),
  near: GeoPointSchema.optional(),
})

export type DispatchQuery = z.infer<typeof DispatchQuerySchema>
