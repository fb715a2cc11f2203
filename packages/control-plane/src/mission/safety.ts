/**
 * Pre-flight and in-flight safety checks. Pure functions over a plan and
 * an agent snapshot; no I/O.
 */

import type {
  AgentSnapshot,
  GeoPoint,
  MissionPlan,
  RouteStep,
  TelemetryPayload,
} from "@aether/shared/fleet"
import { pathLength, pointInPolygon } from "@aether/shared/geo"

export type ValidationCode =
  | "MalformedRoute"
  | "BatteryTooLow"
  | "GpsFixInsufficient"
  | "OutsideGeofence"
  | "AltitudeAboveCeiling"
  | "MissingSensors"
  | "RouteExceedsRange"

export type ValidationResult = { ok: true } | { ok: false; reason: ValidationCode; detail: string }

export interface BreachResult {
  check: "geofence" | "altitude" | "battery" | "wind" | "duration"
  detail: string
}

type WaypointStep = Extract<RouteStep, { type: "waypoint" }>

function isWaypoint(step: RouteStep): step is WaypointStep {
  return step.type === "waypoint"
}

function fail(reason: ValidationCode, detail: string): ValidationResult {
  return { ok: false, reason, detail }
}

/**
 * Validate a plan against the agent's current state.
 *
 * A plan that asks for no GPS fix (`minGpsFix` 0) may also start from an
 * unknown position; the takeoff-point geofence check is then skipped.
 */
export function validateMission(plan: MissionPlan, snapshot: AgentSnapshot): ValidationResult {
  const { constraints, geofence, route } = plan

  if (route[0]?.type !== "takeoff" || route[route.length - 1]?.type !== "land") {
    return fail("MalformedRoute", "route must start with takeoff and end with land")
  }

  const battery = snapshot.battery ?? 0
  if (battery < constraints.minBatteryStart) {
    return fail(
      "BatteryTooLow",
      `battery ${String(battery)}% below required ${String(constraints.minBatteryStart)}%`,
    )
  }

  if ((snapshot.gpsFix ?? 0) < constraints.minGpsFix) {
    return fail(
      "GpsFixInsufficient",
      `gps fix ${String(snapshot.gpsFix ?? 0)} below required ${String(constraints.minGpsFix)}`,
    )
  }

  const missing = constraints.requiredSensors.filter((s) => !snapshot.attributes.sensors.includes(s))
  if (missing.length > 0) {
    return fail("MissingSensors", `missing sensors: ${missing.join(", ")}`)
  }

  const launch = snapshot.position ?? snapshot.homePosition
  if (launch && !pointInPolygon(launch, geofence.polygon)) {
    return fail("OutsideGeofence", "takeoff point is outside the geofence")
  } else if (!launch && constraints.minGpsFix > 0) {
    return fail("GpsFixInsufficient", "takeoff point unknown")
  }

  for (const [index, step] of route.entries()) {
    if (step.type === "takeoff" && step.altitude > geofence.maxAltitudeMeters) {
      return fail(
        "AltitudeAboveCeiling",
        `takeoff altitude ${String(step.altitude)} m exceeds ceiling ${String(geofence.maxAltitudeMeters)} m`,
      )
    }
    if (!isWaypoint(step)) continue
    if (step.alt > geofence.maxAltitudeMeters) {
      return fail(
        "AltitudeAboveCeiling",
        `waypoint ${String(index)} altitude ${String(step.alt)} m exceeds ceiling ${String(geofence.maxAltitudeMeters)} m`,
      )
    }
    if (!pointInPolygon(step, geofence.polygon)) {
      return fail("OutsideGeofence", `waypoint ${String(index)} is outside the geofence`)
    }
  }

  const legs: GeoPoint[] = route.filter(isWaypoint).map((w) => ({ lat: w.lat, lon: w.lon }))
  const length = pathLength(launch ? [launch, ...legs] : legs)
  if (length > snapshot.attributes.maxRangeMeters) {
    return fail(
      "RouteExceedsRange",
      `route length ${length.toFixed(0)} m exceeds range ${String(snapshot.attributes.maxRangeMeters)} m`,
    )
  }

  return { ok: true }
}

/**
 * Continuous constraints evaluated on every telemetry update while a
 * mission executes. Returns the first breach, or null.
 */
export function evaluateInFlight(
  plan: MissionPlan,
  snapshot: AgentSnapshot,
  telemetry: TelemetryPayload,
  elapsedMs: number,
): BreachResult | null {
  const { constraints, geofence } = plan
  const position = telemetry.position ?? snapshot.position

  if (position) {
    const alt = position.alt ?? 0
    if (alt > geofence.maxAltitudeMeters) {
      return {
        check: "altitude",
        detail: `altitude ${String(alt)} m exceeds geofence ceiling ${String(geofence.maxAltitudeMeters)} m`,
      }
    }
    if (!pointInPolygon(position, geofence.polygon)) {
      return { check: "geofence", detail: "position left the geofence polygon" }
    }
  }

  const battery = telemetry.battery ?? snapshot.battery
  if (battery !== null && battery < constraints.minBatteryReserve) {
    return {
      check: "battery",
      detail: `battery ${String(battery)}% below reserve ${String(constraints.minBatteryReserve)}%`,
    }
  }

  const wind = telemetry.windMps ?? snapshot.windMps
  if (constraints.maxWindMps !== undefined && wind !== null && wind > constraints.maxWindMps) {
    return {
      check: "wind",
      detail: `wind ${String(wind)} m/s exceeds limit ${String(constraints.maxWindMps)} m/s`,
    }
  }

  if (constraints.maxDurationSec !== undefined && elapsedMs > constraints.maxDurationSec * 1000) {
    return {
      check: "duration",
      detail: `mission exceeded ${String(constraints.maxDurationSec)} s`,
    }
  }

  return null
}
