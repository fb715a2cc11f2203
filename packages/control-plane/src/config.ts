/**
 * Configuration module: validates environment variables at startup.
 *
 * All config is sourced from process.env and validated eagerly.
 * Missing or malformed required values throw so the process fails fast.
 */

import { type DetectionProfile, DetectionProfileSchema } from "@aether/shared/fleet"
import type { ExporterType, TracingConfig } from "@aether/shared/tracing"
import { z } from "zod"

export interface CompactionConfig {
  /** Events since the last checkpoint that force a compaction. */
  eventThreshold: number
  /** Wall-clock interval after which a compaction is due. */
  intervalMs: number
  /** Consecutive failures before a HistoryOverflow alert. */
  alertAfterFailures: number
}

export interface DetectionConfig {
  defaults: DetectionProfile
  /** Per service-area overrides, already merged over `defaults`. */
  tenants: Record<string, DetectionProfile>
}

export interface CommandConfig {
  ackTimeoutMs: number
  maxRetries: number
}

export interface MissionConfig {
  waypointToleranceMeters: number
  altitudeToleranceMeters: number
  connectivityGraceMs: number
}

export interface TelemetryConfig {
  /** Drop repeated disarmed telemetry of idle agents at ingress. */
  suppression: boolean
  /** Forward one suppressed update per interval so idle readings stay fresh. */
  idleRefreshMs: number
}

export interface Config {
  /** PostgreSQL connection string */
  databaseUrl: string
  /** HTTP server port */
  port: number
  /** HTTP server host (bind address) */
  host: string
  /** Node environment (development, production, test) */
  nodeEnv: string
  /** Pino log level */
  logLevel: string
  /** Graphile Worker concurrency */
  workerConcurrency: number
  /** Dispatch attempts before a mission request fails. */
  dispatchMaxAttempts: number
  /** Allowed CORS origin; any origin when unset. */
  corsOrigin: string | undefined
  /** Root directory of the per-agent history segments. */
  historyDir: string
  /** Base URL of the vehicle transport gateway; directives are acked locally when unset. */
  transportUrl: string | undefined
  compaction: CompactionConfig
  detection: DetectionConfig
  commands: CommandConfig
  mission: MissionConfig
  telemetry: TelemetryConfig
  /** OpenTelemetry tracing configuration */
  tracing: Omit<TracingConfig, "serviceVersion" | "environment">
}

const TenantProfilesSchema = z.record(z.string().min(1), DetectionProfileSchema.partial())

/**
 * Load and validate configuration from environment variables.
 * Throws if required values are missing.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const databaseUrl = env.DATABASE_URL
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required")
  }

  const exporterType = env.OTEL_EXPORTER_TYPE ?? "otlp"
  if (!isExporterType(exporterType)) {
    throw new Error(
      `Invalid OTEL_EXPORTER_TYPE: ${exporterType}. Must be "otlp", "console", or "none".`,
    )
  }

  const defaults = DetectionProfileSchema.parse({
    minFlightDurationSec: parseFloatOr(env.DETECTION_MIN_DURATION_SEC, 30),
    minDistanceMeters: parseFloatOr(env.DETECTION_MIN_DISTANCE_M, 10),
    requireGpsLock: parseBoolOr(env.DETECTION_REQUIRE_GPS_LOCK, true),
    minGpsFix: parseIntOr(env.DETECTION_MIN_GPS_FIX, 3),
    disarmTimeoutSec: parseFloatOr(env.DETECTION_DISARM_TIMEOUT_SEC, 0),
  })

  return {
    databaseUrl,
    port: parseIntOr(env.PORT, 4000),
    host: env.HOST ?? "0.0.0.0",
    nodeEnv: env.NODE_ENV ?? "development",
    logLevel: env.LOG_LEVEL ?? "info",
    workerConcurrency: parseIntOr(env.GRAPHILE_WORKER_CONCURRENCY, 5),
    dispatchMaxAttempts: parseIntOr(env.DISPATCH_MAX_ATTEMPTS, 20),
    corsOrigin: env.CORS_ORIGIN,
    historyDir: env.HISTORY_DIR ?? "./data/history",
    transportUrl: env.TRANSPORT_URL,
    compaction: {
      eventThreshold: parseIntOr(env.COMPACTION_EVENT_THRESHOLD, 500),
      intervalMs: parseIntOr(env.COMPACTION_INTERVAL_MS, 300_000),
      alertAfterFailures: parseIntOr(env.COMPACTION_ALERT_AFTER, 3),
    },
    detection: {
      defaults,
      tenants: parseTenantProfiles(env.DETECTION_PROFILES_JSON, defaults),
    },
    commands: {
      ackTimeoutMs: parseIntOr(env.COMMAND_ACK_TIMEOUT_MS, 5_000),
      maxRetries: parseIntOr(env.COMMAND_MAX_RETRIES, 3),
    },
    mission: {
      waypointToleranceMeters: parseFloatOr(env.WAYPOINT_TOLERANCE_M, 2),
      altitudeToleranceMeters: parseFloatOr(env.ALTITUDE_TOLERANCE_M, 1),
      connectivityGraceMs: parseIntOr(env.CONNECTIVITY_GRACE_MS, 60_000),
    },
    telemetry: {
      suppression: parseBoolOr(env.TELEMETRY_SUPPRESSION, true),
      idleRefreshMs: parseIntOr(env.TELEMETRY_IDLE_REFRESH_MS, 10_000),
    },
    tracing: {
      enabled: env.OTEL_TRACING_ENABLED === "true",
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318",
      sampleRate: Math.max(0, Math.min(1, parseFloatOr(env.OTEL_SAMPLE_RATE, 1.0))),
      serviceName: env.OTEL_SERVICE_NAME ?? "aether-control-plane",
      exporterType,
    },
  }
}

/** Detection profile for an agent's service area, falling back to the defaults. */
export function detectionProfileFor(config: DetectionConfig, serviceArea: string): DetectionProfile {
  return config.tenants[serviceArea] ?? config.defaults
}

function parseTenantProfiles(
  raw: string | undefined,
  defaults: DetectionProfile,
): Record<string, DetectionProfile> {
  if (raw === undefined || raw.trim() === "") return {}

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new Error(`DETECTION_PROFILES_JSON is not valid JSON: ${String(err)}`)
  }

  const result = TenantProfilesSchema.safeParse(parsed)
  if (!result.success) {
    throw new Error(`Invalid DETECTION_PROFILES_JSON: ${result.error.issues[0]?.message ?? "unknown"}`)
  }

  const tenants: Record<string, DetectionProfile> = {}
  for (const [tenant, overrides] of Object.entries(result.data)) {
    tenants[tenant] = { ...defaults, ...stripUndefined(overrides) }
  }
  return tenants
}

function stripUndefined(overrides: Partial<DetectionProfile>): Partial<DetectionProfile> {
  const out: Partial<DetectionProfile> = {}
  if (overrides.minFlightDurationSec !== undefined) out.minFlightDurationSec = overrides.minFlightDurationSec
  if (overrides.minDistanceMeters !== undefined) out.minDistanceMeters = overrides.minDistanceMeters
  if (overrides.requireGpsLock !== undefined) out.requireGpsLock = overrides.requireGpsLock
  if (overrides.minGpsFix !== undefined) out.minGpsFix = overrides.minGpsFix
  if (overrides.disarmTimeoutSec !== undefined) out.disarmTimeoutSec = overrides.disarmTimeoutSec
  return out
}

function isExporterType(value: string): value is ExporterType {
  return value === "otlp" || value === "console" || value === "none"
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) return fallback
  return parsed
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseFloat(value)
  if (Number.isNaN(parsed)) return fallback
  return parsed
}

function parseBoolOr(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback
  if (value === "true" || value === "1") return true
  if (value === "false" || value === "0") return false
  return fallback
}
