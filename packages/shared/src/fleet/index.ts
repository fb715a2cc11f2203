export {
  AgentAttributesSchema,
  BreachActionSchema,
  DetectionProfileSchema,
  DispatchQuerySchema,
  FleetEventSchema,
  GeoPointSchema,
  GeofenceSchema,
  LifecycleStateSchema,
  MissionConstraintsSchema,
  MissionPhaseSchema,
  MissionPlanSchema,
  OperatorSignalSchema,
  RouteStepSchema,
  TelemetryPayloadSchema,
} from "./schemas.js"
export type {
  AgentAttributes,
  BreachAction,
  ConnectivityChange,
  DetectionProfile,
  DispatchQuery,
  FleetEvent,
  GeoPoint,
  Geofence,
  LifecycleState,
  MissionConstraints,
  MissionPhase,
  MissionPlan,
  OperatorSignal,
  OperatorSignalEvent,
  RouteStep,
  TelemetryPayload,
  TelemetryUpdate,
} from "./schemas.js"
export type {
  AbortReason,
  AgentSnapshot,
  AgentState,
  AssignResult,
  DecisionResult,
  Directive,
  DirectiveAck,
  DirectiveKind,
  DispatchResult,
  FailureKind,
  MissionExecution,
  MissionMetrics,
  MissionOrigin,
  MissionStatus,
} from "./types.js"
