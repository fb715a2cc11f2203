/**
 * Session detection from raw telemetry.
 *
 * Arming alone is not a flight: props may spin up on the bench. A session
 * is confirmed only once the agent has stayed armed for the profile's
 * minimum duration and moved at least the minimum distance away from its
 * reference point. A disarm before that reverts the candidate.
 *
 * The distance reference is the candidate's start position. When arming
 * happened without a usable fix, the home position stands in; without
 * either, the first usable fix after arming is backfilled as the start.
 */

import type { DetectionProfile, GeoPoint } from "@aether/shared/fleet"
import { haversineDistance } from "@aether/shared/geo"

export type DetectorPhase = "IDLE" | "CANDIDATE" | "IN_SESSION"

export interface DetectorMemory {
  phase: DetectorPhase
  /** Logical ms timestamp of the arming sample. */
  candidateSince: number | null
  startPosition: GeoPoint | null
  /** Furthest distance from the reference seen during the candidate window. */
  maxDistanceMeters: number
  /** Logical ms timestamp of the first disarmed sample inside a session. */
  disarmedSince: number | null
}

export interface DetectionSample {
  timestamp: number
  armed: boolean
  position: GeoPoint | null
  gpsFix: number | null
}

export interface DetectionInput {
  memory: DetectorMemory
  sample: DetectionSample
  homePosition: GeoPoint | null
}

export type DetectionDecision =
  | "Continue"
  | "ConfirmSessionStart"
  | "ConfirmSessionEnd"
  | "RevertFalseStart"

export interface DetectionResult {
  decision: DetectionDecision
  memory: DetectorMemory
}

export const INITIAL_DETECTOR_MEMORY: DetectorMemory = Object.freeze({
  phase: "IDLE",
  candidateSince: null,
  startPosition: null,
  maxDistanceMeters: 0,
  disarmedSince: null,
})

export function evaluateDetection(input: DetectionInput, profile: DetectionProfile): DetectionResult {
  const { memory, sample } = input

  switch (memory.phase) {
    case "IDLE": {
      if (!sample.armed) {
        return { decision: "Continue", memory }
      }
      return {
        decision: "Continue",
        memory: {
          phase: "CANDIDATE",
          candidateSince: sample.timestamp,
          startPosition: usablePosition(sample, profile),
          maxDistanceMeters: 0,
          disarmedSince: null,
        },
      }
    }

    case "CANDIDATE": {
      if (!sample.armed) {
        return { decision: "RevertFalseStart", memory: INITIAL_DETECTOR_MEMORY }
      }

      const fix = usablePosition(sample, profile)
      const reference = memory.startPosition ?? input.homePosition
      let next: DetectorMemory = memory

      if (!reference) {
        // Backfill: nothing to measure against yet.
        if (fix) next = { ...memory, startPosition: fix }
      } else if (fix) {
        const distance = haversineDistance(reference, fix)
        if (distance > memory.maxDistanceMeters) {
          next = { ...memory, maxDistanceMeters: distance }
        }
      }

      const elapsedMs = sample.timestamp - (memory.candidateSince ?? sample.timestamp)
      if (
        elapsedMs >= profile.minFlightDurationSec * 1000 &&
        next.maxDistanceMeters >= profile.minDistanceMeters
      ) {
        return { decision: "ConfirmSessionStart", memory: { ...next, phase: "IN_SESSION" } }
      }
      return { decision: "Continue", memory: next }
    }

    case "IN_SESSION": {
      if (sample.armed) {
        return {
          decision: "Continue",
          memory: memory.disarmedSince === null ? memory : { ...memory, disarmedSince: null },
        }
      }

      const disarmedSince = memory.disarmedSince ?? sample.timestamp
      if (sample.timestamp - disarmedSince >= profile.disarmTimeoutSec * 1000) {
        return { decision: "ConfirmSessionEnd", memory: INITIAL_DETECTOR_MEMORY }
      }
      return { decision: "Continue", memory: { ...memory, disarmedSince } }
    }
  }
}

function usablePosition(sample: DetectionSample, profile: DetectionProfile): GeoPoint | null {
  if (!sample.position) return null
  if (profile.requireGpsLock && (sample.gpsFix ?? 0) < profile.minGpsFix) return null
  return sample.position
}
